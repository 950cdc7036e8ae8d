/**
 * Sleeper API client
 *
 * Read-only access to the league endpoints the sync needs. Every call degrades
 * to an empty result on a non-2xx response, a transport error or a body of the
 * wrong shape; the failure is logged and the caller carries on with what it has.
 */

// Base URL for Sleeper API
export const SLEEPER_API_BASE = 'https://api.sleeper.app/v1';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface SleeperClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// Types for Sleeper API responses (subset used)
export interface SleeperUser {
  user_id: string;
  username?: string;
  display_name?: string | null;
  avatar?: string | null;
}

export interface SleeperRoster {
  roster_id: number;
  owner_id: string | null;
  league_id?: string;
  players?: string[] | null;
}

export interface SleeperMatchup {
  matchup_id: number | null;
  roster_id: number;
  points: number | null;
  starters?: string[] | null;
  starters_points?: number[] | null;
}

export interface SleeperPlayer {
  player_id?: string;
  first_name?: string | null;
  last_name?: string | null;
  full_name?: string | null;
  position?: string | null;
  team?: string | null;
}

export type PlayerDirectory = Record<string, SleeperPlayer>;

export interface StarterScore {
  playerId: string;
  points: number;
}

/**
 * One roster's result for one week. Starters are paired with their points at
 * ingestion so nothing downstream indexes two arrays in lockstep.
 */
export interface LeagueMatchup {
  week: number;
  rosterId: number;
  matchupId: number | null;
  points: number;
  starters: StarterScore[];
}

export interface LeagueDataSource {
  getUsers(leagueId: string): Promise<SleeperUser[]>;
  getRosters(leagueId: string): Promise<SleeperRoster[]>;
  getMatchups(leagueId: string, week: number): Promise<LeagueMatchup[]>;
  getPlayerDirectory(): Promise<PlayerDirectory>;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function isSleeperUser(x: unknown): x is SleeperUser {
  return isRecord(x) && typeof x.user_id === 'string';
}

function isSleeperRoster(x: unknown): x is SleeperRoster {
  return isRecord(x) && typeof x.roster_id === 'number';
}

function isSleeperMatchup(x: unknown): x is SleeperMatchup {
  return isRecord(x) && typeof x.roster_id === 'number';
}

function isSleeperPlayer(x: unknown): x is SleeperPlayer {
  return isRecord(x);
}

function finiteOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function normalizeMatchup(raw: SleeperMatchup, week: number): LeagueMatchup {
  const starters = Array.isArray(raw.starters) ? raw.starters : [];
  const startersPoints = Array.isArray(raw.starters_points) ? raw.starters_points : [];
  return {
    week,
    rosterId: raw.roster_id,
    matchupId: typeof raw.matchup_id === 'number' ? raw.matchup_id : null,
    points: finiteOr(raw.points, 0),
    starters: starters.map((playerId, idx) => ({
      playerId: String(playerId),
      points: finiteOr(startersPoints[idx], 0),
    })),
  };
}

export function formatPlayerName(player: SleeperPlayer | undefined): string | null {
  if (!player) return null;
  const name = `${player.first_name || ''} ${player.last_name || ''}`.trim();
  if (name) return name;
  return player.full_name?.trim() || null;
}

export function parsePlayerDirectory(data: unknown): PlayerDirectory | null {
  if (!isRecord(data)) return null;
  const out: PlayerDirectory = {};
  for (const [id, player] of Object.entries(data)) {
    if (isSleeperPlayer(player)) out[id] = player;
  }
  return out;
}

export class SleeperClient implements LeagueDataSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private playersPromise: Promise<PlayerDirectory> | null = null;

  constructor(options: SleeperClientOptions = {}) {
    this.baseUrl = (options.baseUrl || SLEEPER_API_BASE).replace(/\/$/, '');
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * GET a path and parse JSON. Returns null on any failure after logging it.
   */
  private async fetchJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const resp = await this.fetchImpl(url, { signal: controller.signal });
      if (!resp.ok) {
        console.warn(`[sleeper-api] HTTP ${resp.status} for ${url}`);
        return null;
      }
      return await resp.json();
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[sleeper-api] Request failed for ${url}: ${reason}`);
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async fetchList<T>(path: string, guard: (x: unknown) => x is T): Promise<T[]> {
    const data = await this.fetchJson(path);
    if (data === null) return [];
    if (!Array.isArray(data)) {
      console.warn(`[sleeper-api] Expected a list from ${path}`);
      return [];
    }
    return data.filter(guard);
  }

  async getUsers(leagueId: string): Promise<SleeperUser[]> {
    return this.fetchList(`/league/${leagueId}/users`, isSleeperUser);
  }

  async getRosters(leagueId: string): Promise<SleeperRoster[]> {
    return this.fetchList(`/league/${leagueId}/rosters`, isSleeperRoster);
  }

  async getMatchups(leagueId: string, week: number): Promise<LeagueMatchup[]> {
    const raw = await this.fetchList(`/league/${leagueId}/matchups/${week}`, isSleeperMatchup);
    return raw.map((m) => normalizeMatchup(m, week));
  }

  /**
   * Fetch all NFL players. This is a large download, so the result is shared
   * for the lifetime of the client. A failed download is not cached.
   */
  async getPlayerDirectory(): Promise<PlayerDirectory> {
    if (!this.playersPromise) {
      this.playersPromise = this.fetchJson('/players/nfl').then((data) => {
        const players = data === null ? null : parsePlayerDirectory(data);
        if (!players) {
          if (data !== null) console.warn('[sleeper-api] Expected a player map from /players/nfl');
          this.playersPromise = null;
          return {};
        }
        return players;
      });
    }
    return this.playersPromise;
  }
}
