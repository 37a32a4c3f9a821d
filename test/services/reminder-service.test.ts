/**
 * Reminder Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ReminderService } from '../../src/services/reminder-service';
import { MatchRepository } from '../../src/repositories/match-repository';
import { TenantConfigRepository } from '../../src/repositories/tenant-config-repository';
import { Match } from '../../src/models/match';
import { emptyStateDocument } from '../../src/models/state';
import { FakeConnector, InMemoryStateStore } from '../helpers/fakes';

const MATCH_TIME = Date.parse('2026-01-15T02:30:00Z');
const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

function at(offsetMs: number): Date {
  return new Date(MATCH_TIME + offsetMs);
}

function match(overrides: Partial<Match> = {}): Match {
  return {
    id: 'A1B2C3',
    league: 'champion',
    week: 1,
    team: 'Angels',
    opponent: 'Devils',
    scheduled_iso: '2026-01-15T02:30:00.000Z',
    guild_id: '100',
    channel_id: '900',
    created_by: '200',
    reminders_sent: {},
    ...overrides,
  };
}

describe('ReminderService', () => {
  let store: InMemoryStateStore;
  let connector: FakeConnector;
  let tenantConfig: TenantConfigRepository;
  let service: ReminderService;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function seed(...matches: Match[]): void {
    store = new InMemoryStateStore({ ...emptyStateDocument(), scheduled_matches: matches });
    tenantConfig = new TenantConfigRepository(store);
    service = new ReminderService(new MatchRepository(store), tenantConfig, connector);
  }

  beforeEach(() => {
    connector = new FakeConnector(['900', '902', '903']);
    seed(match());
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should send nothing before the first threshold', async () => {
    const result = await service.sweep(at(-25 * HOUR));

    expect(result).toEqual({ sent: 0, failed: 0, skipped: 0 });
    expect(connector.sent).toHaveLength(0);
    expect(store.saves).toBe(0);
  });

  it('should send the 24h reminder exactly once across sweeps', async () => {
    const first = await service.sweep(at(-(23 * HOUR + 59 * MINUTE)));
    const second = await service.sweep(at(-(23 * HOUR + 58 * MINUTE)));

    expect(first).toEqual({ sent: 1, failed: 0, skipped: 0 });
    expect(second).toEqual({ sent: 0, failed: 0, skipped: 0 });
    expect(connector.sent).toHaveLength(1);
    expect(connector.sent[0]).toEqual({
      channelId: '900',
      message: {
        content: [
          '⏰ **Match Reminder (24h)** — `champion` — ID `A1B2C3`',
          'Angels vs Devils',
          'When: <t:1768444200:F> (<t:1768444200:R>)',
        ].join('\n'),
      },
    });
    expect(store.state.scheduled_matches[0].reminders_sent).toEqual({ '24h': true });
    expect(store.saves).toBe(1);
  });

  it('should send every due threshold in one sweep', async () => {
    const result = await service.sweep(at(-30 * MINUTE));

    expect(result.sent).toBe(2);
    expect(connector.sent.map((s) => s.message.content?.split('\n')[0])).toEqual([
      '⏰ **Match Reminder (24h)** — `champion` — ID `A1B2C3`',
      '⏰ **Match Reminder (1h)** — `champion` — ID `A1B2C3`',
    ]);
    expect(store.saves).toBe(1);
  });

  it('should retry a failed delivery on the next sweep', async () => {
    connector.failNextSends = 1;

    const failed = await service.sweep(at(-20 * HOUR));

    expect(failed).toEqual({ sent: 0, failed: 1, skipped: 0 });
    expect(store.state.scheduled_matches[0].reminders_sent).toEqual({});
    expect(store.saves).toBe(0);

    const retried = await service.sweep(at(-20 * HOUR + MINUTE));

    expect(retried).toEqual({ sent: 1, failed: 0, skipped: 0 });
    expect(store.state.scheduled_matches[0].reminders_sent).toEqual({ '24h': true });
  });

  it('should never remind a match that has started', async () => {
    const result = await service.sweep(at(MINUTE));

    expect(result).toEqual({ sent: 0, failed: 0, skipped: 0 });
    expect(connector.sent).toHaveLength(0);
  });

  it('should skip a match with an unreadable time', async () => {
    seed(match({ scheduled_iso: 'next tuesday' }));

    await expect(service.sweep(at(-30 * MINUTE))).resolves.toEqual({ sent: 0, failed: 0, skipped: 0 });
  });

  it('should skip tenants that turned reminders off', async () => {
    await tenantConfig.setSchedulerEnabled('100', false);

    const result = await service.sweep(at(-30 * MINUTE));

    expect(result).toEqual({ sent: 0, failed: 0, skipped: 0 });
    expect(connector.sent).toHaveLength(0);
  });

  it('should mention team roles when they exist', async () => {
    connector.roles['100'] = [{ id: '555', name: ' angels ' }];

    await service.sweep(at(-2 * HOUR));

    expect(connector.sent[0].message.content?.split('\n')[1]).toBe('<@&555> vs Devils');
  });

  describe('resolveDestination', () => {
    it('should fall back to the schedule channel, then announcements', async () => {
      seed(match({ channel_id: '999' }));

      expect(await service.resolveDestination(match({ channel_id: '999' }))).toBeNull();

      await tenantConfig.setChannel('100', { kind: 'announcements' }, '903');
      expect(await service.resolveDestination(match({ channel_id: '999' }))).toBe('903');

      await tenantConfig.setChannel('100', { kind: 'schedule', league_key: 'champion' }, '902');
      expect(await service.resolveDestination(match({ channel_id: '999' }))).toBe('902');

      expect(await service.resolveDestination(match())).toBe('900');
    });

    it('should count a match with nowhere to post as skipped', async () => {
      seed(match({ channel_id: undefined }));

      const result = await service.sweep(at(-30 * MINUTE));

      expect(result).toEqual({ sent: 0, failed: 0, skipped: 1 });
      expect(store.state.scheduled_matches[0].reminders_sent).toEqual({});
    });
  });
});
