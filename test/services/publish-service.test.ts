/**
 * Publish Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { PublishService } from '../../src/services/publish-service';
import { StandingsRepository } from '../../src/repositories/standings-repository';
import { TenantConfigRepository } from '../../src/repositories/tenant-config-repository';
import { League } from '../../src/models/league';
import { Match } from '../../src/models/match';
import { StandingsView } from '../../src/models/standing';
import { UnconfiguredError } from '../../src/models/errors';
import { FakeConnector, InMemoryStateStore } from '../helpers/fakes';

const LEAGUE: League = {
  key: 'champion',
  name: 'Champion',
  standings_url: 'https://standings.example.test/champion',
  fallback_channel_id: '900',
};

const VIEW: StandingsView = {
  fingerprint: 'abc',
  title: '🏆 Champion Standings',
  url: LEAGUE.standings_url,
  text: '**1. Angels**  •  `5-1`  •  `GB -`',
};

describe('PublishService', () => {
  let store: InMemoryStateStore;
  let connector: FakeConnector;
  let tenantConfig: TenantConfigRepository;
  let standings: StandingsRepository;
  let service: PublishService;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    store = new InMemoryStateStore();
    connector = new FakeConnector(['900', '901', '902']);
    tenantConfig = new TenantConfigRepository(store);
    standings = new StandingsRepository(store);
    service = new PublishService(connector, tenantConfig, standings, () => new Date('2026-01-10T00:00:00Z'));
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('upsertStandings', () => {
    it('should create once and edit on the second call', async () => {
      const first = await service.upsertStandings('100', LEAGUE, VIEW);
      const sentAfterFirst = connector.sent.length;

      const second = await service.upsertStandings('100', LEAGUE, VIEW);

      expect(sentAfterFirst).toBe(1);
      expect(connector.sent).toHaveLength(1);
      expect(connector.edited).toHaveLength(1);
      expect(second).toEqual(first);
      expect(tenantConfig.getMessageId('100', 'standings', 'champion')).toBe(first.id);
    });

    it('should prefer the tenant channel over the league fallback', async () => {
      await tenantConfig.setChannel('100', { kind: 'standings', league_key: 'champion' }, '901');

      const ref = await service.upsertStandings('100', LEAGUE, VIEW);

      expect(ref.channel_id).toBe('901');
      expect(connector.sent[0].message.embed).toMatchObject({
        title: '🏆 Champion Standings',
        description: VIEW.text,
        timestamp: '2026-01-10T00:00:00.000Z',
      });
    });

    it('should fail when no channel is bound', async () => {
      await expect(
        service.upsertStandings('100', { ...LEAGUE, fallback_channel_id: null }, VIEW)
      ).rejects.toThrow(new UnconfiguredError('Champion standings channel not configured yet.'));
      expect(connector.sent).toHaveLength(0);
    });

    it('should post a new message when the stored one is gone', async () => {
      await tenantConfig.setMessageId('100', 'standings', 'champion', '12345');

      const ref = await service.upsertStandings('100', LEAGUE, VIEW);

      expect(connector.edited).toHaveLength(0);
      expect(connector.sent).toHaveLength(1);
      expect(tenantConfig.getMessageId('100', 'standings', 'champion')).toBe(ref.id);
    });

    it('should edit the global message when the tenant has none', async () => {
      const global = await service.upsertStandings(null, LEAGUE, VIEW);

      const ref = await service.upsertStandings('100', LEAGUE, VIEW);

      expect(ref.id).toBe(global.id);
      expect(connector.edited).toHaveLength(1);
      expect(standings.getGlobalMessageId('champion')).toBe(global.id);
      expect(tenantConfig.getMessageId('100', 'standings', 'champion')).toBeNull();
    });
  });

  describe('upsertSchedule', () => {
    const match: Match = {
      id: 'A1B2C3',
      league: 'champion',
      week: 1,
      team: 'Angels',
      opponent: 'Devils',
      scheduled_iso: '2026-01-15T02:30:00.000Z',
      guild_id: '100',
      created_by: '200',
      reminders_sent: {},
    };

    it('should skip a tenant without a schedule channel', async () => {
      await expect(service.upsertSchedule('100', LEAGUE, [match])).resolves.toBeNull();
      expect(connector.sent).toHaveLength(0);
    });

    it('should create then edit the board', async () => {
      await tenantConfig.setChannel('100', { kind: 'schedule', league_key: 'champion' }, '902');

      const first = await service.upsertSchedule('100', LEAGUE, [match]);
      await service.upsertSchedule('100', LEAGUE, []);

      expect(first?.channel_id).toBe('902');
      expect(connector.sent).toHaveLength(1);
      expect(connector.sent[0].message.embed?.description).toBe(
        '• **Angels** vs **Devils** — <t:1768444200:F> (`A1B2C3`)'
      );
      expect(connector.edited).toHaveLength(1);
      expect(connector.edited[0].message.embed?.description).toBe('_No matches scheduled._');
    });
  });
});
