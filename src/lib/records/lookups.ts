import type { SleeperRoster, SleeperUser } from '@/lib/utils/sleeper-api';
import { UNKNOWN_USER } from '@/lib/constants/league';

export interface LeagueLookups {
  rosterOwner: Map<number, string>;
  userName: Map<string, string>;
}

export function buildLookups(users: SleeperUser[], rosters: SleeperRoster[]): LeagueLookups {
  const rosterOwner = new Map<number, string>();
  for (const r of rosters) {
    if (r.owner_id) rosterOwner.set(r.roster_id, r.owner_id);
  }
  const userName = new Map<string, string>();
  for (const u of users) {
    userName.set(u.user_id, u.display_name || u.username || UNKNOWN_USER);
  }
  return { rosterOwner, userName };
}

export function displayNameForRoster(lookups: LeagueLookups, rosterId: number): string {
  const ownerId = lookups.rosterOwner.get(rosterId);
  if (!ownerId) return UNKNOWN_USER;
  return lookups.userName.get(ownerId) ?? UNKNOWN_USER;
}

export function roundPoints(n: number): number {
  return Math.round(n * 100) / 100;
}
