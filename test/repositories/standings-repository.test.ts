/**
 * Standings Repository Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { StandingsRepository } from '../../src/repositories/standings-repository';
import { InMemoryStateStore } from '../helpers/fakes';

describe('StandingsRepository', () => {
  let store: InMemoryStateStore;
  let repository: StandingsRepository;

  beforeEach(() => {
    store = new InMemoryStateStore();
    repository = new StandingsRepository(store);
  });

  it('should default to no hash and no message', () => {
    expect(repository.findByLeague('champion')).toEqual({ last_hash: null, message_id: null });
    expect(repository.getLastHash('champion')).toBeNull();
    expect(repository.getGlobalMessageId('champion')).toBeNull();
  });

  it('should store the hash without touching the message id', async () => {
    await repository.setGlobalMessageId('champion', '42');
    await repository.setLastHash('champion', 'abc');

    expect(store.state.standings.champion).toEqual({ last_hash: 'abc', message_id: '42' });
    expect(store.saves).toBe(2);
  });

  it('should keep leagues independent', async () => {
    await repository.setLastHash('champion', 'abc');

    expect(repository.getLastHash('challenger')).toBeNull();
  });
});
