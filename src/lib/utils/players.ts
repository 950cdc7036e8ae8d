import { readFile, writeFile } from 'node:fs/promises';
import { parsePlayerDirectory, type LeagueDataSource, type PlayerDirectory } from '@/lib/utils/sleeper-api';

async function readPlayersFile(file: string): Promise<PlayerDirectory | null> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[players] Cannot read player file ${file}: ${reason}`);
    return null;
  }
  try {
    return parsePlayerDirectory(JSON.parse(text));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[players] Ignoring unreadable player file ${file}: ${reason}`);
    return null;
  }
}

/**
 * Load the NFL player directory once per run: from the local players file when
 * it has entries, otherwise from the API (saving the download for next time
 * unless `persist` is false).
 */
export async function loadPlayerDirectory(params: {
  file: string;
  source: LeagueDataSource;
  persist?: boolean;
}): Promise<PlayerDirectory> {
  console.log(`[players] Loading player data from ${params.file}...`);
  const cached = await readPlayersFile(params.file);
  if (cached && Object.keys(cached).length > 0) {
    console.log(`[players] Found ${Object.keys(cached).length} players in ${params.file}`);
    return cached;
  }

  console.log('[players] No local player data; downloading the player directory');
  const players = await params.source.getPlayerDirectory();
  const count = Object.keys(players).length;
  if (count === 0) {
    console.warn('[players] Player directory is empty; player names will be unknown');
    return players;
  }
  if (params.persist !== false) {
    try {
      await writeFile(params.file, JSON.stringify(players), 'utf8');
      console.log(`[players] Saved ${count} players to ${params.file}`);
    } catch (err: unknown) {
      console.warn(`[players] Could not save ${params.file}:`, err);
    }
  }
  return players;
}
