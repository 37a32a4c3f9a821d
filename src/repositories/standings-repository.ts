/**
 * Standings Repository
 *
 * Per-league standings state: the last published fingerprint and the
 * global (tenant-independent) standings message id.
 */

import { LeagueStandingsState } from '../models/standing';
import { StateStore } from './state-store';

export class StandingsRepository {
  constructor(private store: StateStore) {}

  /**
   * Stored state for a league, with defaults when absent
   */
  findByLeague(leagueKey: string): LeagueStandingsState {
    return this.store.state.standings[leagueKey] ?? { last_hash: null, message_id: null };
  }

  getLastHash(leagueKey: string): string | null {
    return this.findByLeague(leagueKey).last_hash;
  }

  async setLastHash(leagueKey: string, hash: string): Promise<void> {
    await this.store.mutate((document) => {
      document.standings[leagueKey] = { ...this.findByLeague(leagueKey), last_hash: hash };
    });
  }

  getGlobalMessageId(leagueKey: string): string | null {
    return this.findByLeague(leagueKey).message_id;
  }

  async setGlobalMessageId(leagueKey: string, messageId: string): Promise<void> {
    await this.store.mutate((document) => {
      document.standings[leagueKey] = { ...this.findByLeague(leagueKey), message_id: messageId };
    });
  }
}
