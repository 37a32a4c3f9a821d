/**
 * State Store Tests
 *
 * Exercised against a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StateStore, normalizeStateDocument } from '../../src/repositories/state-store';
import { StateValidationError } from '../../src/models/errors';
import { emptyTenantState } from '../../src/models/state';

const OPTIONS = { primaryLeagueKey: 'champion' };

describe('StateStore', () => {
  let dir: string;
  let statePath: string;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'state-store-'));
    statePath = path.join(dir, 'state.json');
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should start empty when the file is missing', async () => {
    const store = await StateStore.load(statePath, OPTIONS);

    expect(store.state).toEqual({ guilds: {}, standings: {}, scheduled_matches: [] });
  });

  it('should write the whole document and read it back', async () => {
    const store = await StateStore.load(statePath, OPTIONS);

    await store.mutate((doc) => {
      doc.standings.champion = { last_hash: 'abc', message_id: '42' };
    });

    const onDisk = JSON.parse(fs.readFileSync(statePath, 'utf-8'));
    expect(onDisk).toEqual({
      guilds: {},
      standings: { champion: { last_hash: 'abc', message_id: '42' } },
      scheduled_matches: [],
    });

    const reloaded = await StateStore.load(statePath, OPTIONS);
    expect(reloaded.state.standings.champion).toEqual({ last_hash: 'abc', message_id: '42' });
  });

  it('should leave no temp file behind', async () => {
    const store = await StateStore.load(statePath, OPTIONS);

    await Promise.all([store.save(), store.save(), store.save()]);

    expect(fs.readdirSync(dir)).toEqual(['state.json']);
  });

  it('should reject a file that is not JSON', async () => {
    fs.writeFileSync(statePath, '{ not json');

    await expect(StateStore.load(statePath, OPTIONS)).rejects.toThrow(
      new StateValidationError('State document is not valid JSON')
    );
  });

  it('should reject an unknown shape', async () => {
    fs.writeFileSync(statePath, JSON.stringify({ teams: [] }));

    await expect(StateStore.load(statePath, OPTIONS)).rejects.toBeInstanceOf(StateValidationError);
  });

  it('should migrate legacy keys on load', async () => {
    fs.writeFileSync(
      statePath,
      JSON.stringify({
        last_hash: 'legacy-hash',
        standings_message_id: 777,
        guilds: { '100': { standings_channel_id: 555 } },
      })
    );

    const store = await StateStore.load(statePath, OPTIONS);

    expect(store.state.standings).toEqual({ champion: { last_hash: 'legacy-hash', message_id: '777' } });
    expect(store.state.guilds['100'].standings_channels).toEqual({ champion: '555' });
  });

  it('should keep every digit of ids stored as bare numbers', async () => {
    fs.writeFileSync(
      statePath,
      '{"scheduled_matches":[{"id":"A1B2C3","league":"champion","team":"Angels","opponent":"Devils",' +
        '"scheduled_iso":"2026-01-15T02:30:00Z","guild_id":1180000000000000123}],' +
        '"guilds":{"1180000000000000123":{"logs_channel_id":1190000000000000457}},' +
        '"standings":{"champion":{"message_id":1200000000000000789}}}'
    );

    const store = await StateStore.load(statePath, OPTIONS);

    expect(store.state.scheduled_matches[0].guild_id).toBe('1180000000000000123');
    expect(store.state.guilds['1180000000000000123'].logs_channel_id).toBe('1190000000000000457');
    expect(store.state.standings.champion.message_id).toBe('1200000000000000789');
  });

  it('should rethrow read failures other than a missing file', async () => {
    fs.mkdirSync(statePath);

    await expect(StateStore.load(statePath, OPTIONS)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});

describe('normalizeStateDocument', () => {
  it('should not overwrite an existing league record with legacy keys', () => {
    const doc = normalizeStateDocument(
      { last_hash: 'old', standings: { champion: { last_hash: 'new', message_id: null } } },
      OPTIONS
    );

    expect(doc.standings).toEqual({ champion: { last_hash: 'new', message_id: null } });
  });

  it('should fill tenant defaults and drop zero ids', () => {
    const doc = normalizeStateDocument(
      { guilds: { '100': { logs_channel_id: 0, schedule_channels: { champion: '0', challenger: 321 } } } },
      OPTIONS
    );

    expect(doc.guilds['100']).toEqual({
      ...emptyTenantState(),
      schedule_channels: { challenger: '321' },
    });
  });

  it('should normalize match records', () => {
    const doc = normalizeStateDocument(
      {
        scheduled_matches: [
          {
            id: 'a1b2c3',
            league: 'Champion',
            team: 'Angels',
            opponent: 'Devils',
            scheduled_iso: '2026-01-15T02:30:00Z',
            guild_id: 100,
            channel_id: 0,
          },
        ],
      },
      OPTIONS
    );

    expect(doc.scheduled_matches).toEqual([
      {
        id: 'A1B2C3',
        league: 'champion',
        week: 1,
        team: 'Angels',
        opponent: 'Devils',
        scheduled_iso: '2026-01-15T02:30:00Z',
        guild_id: '100',
        created_by: '',
        reminders_sent: {},
      },
    ]);
  });
});
