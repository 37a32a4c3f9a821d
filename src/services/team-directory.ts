/**
 * Team Directory
 *
 * Team names per league, taken from the parsed standings and cached for
 * a few minutes. Feeds team autocomplete.
 */

import { League } from '../models/league';
import { LeagueSnapshot } from './standings-service';

export const TEAM_CACHE_TTL_MS = 10 * 60 * 1000;

export const MAX_SUGGESTIONS = 25;

interface CacheEntry {
  names: string[];
  fetched_at: number;
}

export class TeamDirectory {
  private cache = new Map<string, CacheEntry>();

  constructor(
    private source: { fetchSnapshot(league: League): Promise<LeagueSnapshot> },
    private clock: () => Date = () => new Date(),
    private ttlMs: number = TEAM_CACHE_TTL_MS
  ) {}

  /**
   * Team names in standings order, de-duplicated case-insensitively
   */
  async teamNames(league: League): Promise<string[]> {
    const now = this.clock().getTime();
    const cached = this.cache.get(league.key);
    if (cached && now - cached.fetched_at < this.ttlMs) {
      return cached.names;
    }

    const { rows } = await this.source.fetchSnapshot(league);
    const seen = new Set<string>();
    const names: string[] = [];
    for (const row of rows) {
      const name = row.team.trim();
      if (name && !seen.has(name.toLowerCase())) {
        seen.add(name.toLowerCase());
        names.push(name);
      }
    }

    this.cache.set(league.key, { names, fetched_at: now });
    return names;
  }

  /**
   * Names matching typed text: prefix matches first, then substrings
   */
  async suggest(league: League, typed: string): Promise<string[]> {
    const names = await this.teamNames(league);
    const wanted = typed.trim().toLowerCase();
    if (!wanted) {
      return names.slice(0, MAX_SUGGESTIONS);
    }

    const prefix = names.filter((n) => n.toLowerCase().startsWith(wanted));
    const substring = names.filter(
      (n) => !n.toLowerCase().startsWith(wanted) && n.toLowerCase().includes(wanted)
    );
    return [...prefix, ...substring].slice(0, MAX_SUGGESTIONS);
  }
}
