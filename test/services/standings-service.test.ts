/**
 * Standings Service Tests
 *
 * Poll pipeline against a fake page fetcher and a fake messaging
 * platform.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { StandingsService } from '../../src/services/standings-service';
import { PublishService } from '../../src/services/publish-service';
import { StandingsRepository } from '../../src/repositories/standings-repository';
import { TenantConfigRepository } from '../../src/repositories/tenant-config-repository';
import { getLeagues } from '../../src/config/leagues';
import { League } from '../../src/models/league';
import {
  CHALLENGER_URL,
  CHAMPION_URL,
  FakeConnector,
  FakeFetcher,
  InMemoryStateStore,
  STANDARD_HEADER,
  standingsPage,
  testConfig,
  threeTeamPage,
} from '../helpers/fakes';

describe('StandingsService', () => {
  let store: InMemoryStateStore;
  let connector: FakeConnector;
  let fetcher: FakeFetcher;
  let standingsRepository: StandingsRepository;
  let tenantConfig: TenantConfigRepository;
  let leagues: League[];
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function createService(homeTenantId: string | null = null): StandingsService {
    const publisher = new PublishService(connector, tenantConfig, standingsRepository);
    return new StandingsService(fetcher, standingsRepository, tenantConfig, publisher, leagues, homeTenantId);
  }

  beforeEach(() => {
    store = new InMemoryStateStore();
    connector = new FakeConnector(['900', '901']);
    fetcher = new FakeFetcher({ [CHAMPION_URL]: threeTeamPage() });
    standingsRepository = new StandingsRepository(store);
    tenantConfig = new TenantConfigRepository(store);
    leagues = getLeagues(testConfig({ championStandingsChannelId: '900' }));
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe('fetchSnapshot', () => {
    it('should parse three teams and ignore the footer row', async () => {
      const { rows, view } = await createService().fetchSnapshot(leagues[0]);

      expect(rows).toHaveLength(3);
      expect(view.title).toBe('🏆 Champion Standings');
      expect(view.text.split('\n\n')).toEqual([
        '**1. Angels**  •  `5-1`  •  `GB -`',
        '**2. Devils**  •  `4-2`  •  `GB 1`',
        '**3. Dragons**  •  `1-5`  •  `GB 4`',
      ]);
    });
  });

  describe('pollOnce', () => {
    it('should publish once and skip an identical second fetch', async () => {
      const service = createService();

      const first = await service.pollOnce('tick-1');
      const second = await service.pollOnce('tick-2');

      expect(first).toEqual({ champion: 'published' });
      expect(second).toEqual({ champion: 'unchanged' });
      expect(connector.sent).toHaveLength(1);
      expect(connector.edited).toHaveLength(0);
      expect(fetcher.calls).toEqual([CHAMPION_URL, CHAMPION_URL]);
    });

    it('should edit the existing message when standings change', async () => {
      const service = createService();
      await service.pollOnce();

      fetcher.pages[CHAMPION_URL] = standingsPage(STANDARD_HEADER, [['1', 'Devils', '5-2', '17', '9', '+8', '-']]);
      await service.pollOnce();

      expect(connector.sent).toHaveLength(1);
      expect(connector.edited).toHaveLength(1);
    });

    it('should store the fingerprint before publishing, so a failed publish is not retried', async () => {
      const service = createService();
      connector.failNextSends = 1;

      const first = await service.pollOnce();
      const second = await service.pollOnce();

      // Accepted trade-off: the failed publish waits for the next change
      expect(first).toEqual({ champion: 'published' });
      expect(second).toEqual({ champion: 'unchanged' });
      expect(connector.sent).toHaveLength(0);
      expect(standingsRepository.getLastHash('champion')).not.toBeNull();
    });

    it('should keep polling other leagues after one fails', async () => {
      leagues = getLeagues(
        testConfig({
          challengerStandingsUrl: CHALLENGER_URL,
          championStandingsChannelId: '900',
          challengerStandingsChannelId: '901',
        })
      );
      fetcher.pages = { [CHALLENGER_URL]: threeTeamPage() };

      const outcomes = await createService().pollOnce();

      expect(outcomes).toEqual({ champion: 'failed', challenger: 'published' });
      expect(connector.sent.map((s) => s.channelId)).toEqual(['901']);
      expect(standingsRepository.getLastHash('champion')).toBeNull();
    });

    it('should fan out to every known tenant', async () => {
      await tenantConfig.setChannel('100', { kind: 'standings', league_key: 'champion' }, '901');
      await tenantConfig.setChannel('200', { kind: 'logs' }, '777');

      await createService('300').pollOnce();

      // 100 uses its own channel; 200 and 300 fall back to the league channel
      expect(connector.sent.map((s) => s.channelId).sort()).toEqual(['900', '900', '901']);
      expect(tenantConfig.getMessageId('100', 'standings', 'champion')).not.toBeNull();
      expect(tenantConfig.getMessageId('300', 'standings', 'champion')).not.toBeNull();
    });

    it('should log and continue when a league has no channel', async () => {
      leagues = getLeagues(testConfig());

      const outcomes = await createService().pollOnce();

      expect(outcomes).toEqual({ champion: 'published' });
      expect(connector.sent).toHaveLength(0);
      const warnings = consoleLogSpy.mock.calls.map((c) => JSON.parse(String(c[0])));
      expect(warnings).toContainEqual(
        expect.objectContaining({ log_type: 'STANDINGS_POLL', outcome: 'unconfigured', league: 'Champion' })
      );
    });
  });

  describe('publishNow', () => {
    it('should publish regardless of the stored fingerprint', async () => {
      const service = createService();
      await service.pollOnce();

      const lines = await service.publishNow('100');

      expect(connector.sent).toHaveLength(1);
      expect(connector.edited).toHaveLength(1);
      expect(lines).toEqual([`✅ Champion: posted (message ${connector.edited[0].ref.id})`]);
    });

    it('should refresh the fingerprint when asked', async () => {
      const lines = await createService().publishNow('100', true);

      expect(lines).toHaveLength(1);
      expect(standingsRepository.getLastHash('champion')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should report per-league errors as lines', async () => {
      fetcher.pages = {};

      const lines = await createService().publishNow('100');

      expect(lines).toEqual([`❌ Champion: No page for ${CHAMPION_URL}`]);
    });
  });
});
