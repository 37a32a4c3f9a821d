/**
 * Match Repository
 *
 * Data access for the global scheduled-match list. Records are filtered
 * by tenant at read time.
 */

import { CreateMatchParams, Match } from '../models/match';
import { generateMatchId } from '../utils/match-id';
import { StateStore } from './state-store';

export class MatchRepository {
  constructor(
    private store: StateStore,
    private newId: (existing: Set<string>) => string = generateMatchId
  ) {}

  /**
   * Every stored match, in storage order
   */
  findAll(): Match[] {
    return this.store.state.scheduled_matches;
  }

  /**
   * Find a match by id (case-insensitive)
   */
  findById(matchId: string): Match | null {
    const wanted = matchId.trim().toUpperCase();
    return this.findAll().find((m) => m.id.toUpperCase() === wanted) ?? null;
  }

  /**
   * Matches belonging to a tenant, optionally for one league
   */
  findByTenantId(tenantId: string, leagueKey?: string): Match[] {
    return this.findAll().filter(
      (m) => m.guild_id === tenantId && (leagueKey === undefined || m.league === leagueKey)
    );
  }

  /**
   * Create and persist a match with a fresh id
   */
  async create(params: CreateMatchParams): Promise<Match> {
    return this.store.mutate((document) => {
      const existing = new Set(document.scheduled_matches.map((m) => m.id.toUpperCase()));

      const match: Match = {
        id: this.newId(existing),
        league: params.league,
        week: params.week,
        team: params.team,
        opponent: params.opponent,
        scheduled_iso: params.scheduled_at.toISOString(),
        guild_id: params.tenant_id,
        created_by: params.created_by,
        reminders_sent: {},
      };
      if (params.channel_id) {
        match.channel_id = params.channel_id;
      }

      document.scheduled_matches.push(match);
      return match;
    });
  }

  /**
   * Remove a match by id (case-insensitive)
   *
   * @returns true when a match was removed
   */
  async delete(matchId: string): Promise<boolean> {
    const wanted = matchId.trim().toUpperCase();
    if (!this.findById(wanted)) {
      return false;
    }

    await this.store.mutate((document) => {
      document.scheduled_matches = document.scheduled_matches.filter((m) => m.id.toUpperCase() !== wanted);
    });
    return true;
  }

  /**
   * Persist in-place changes made to records returned by this repository
   */
  async saveAll(): Promise<void> {
    await this.store.save();
  }
}
