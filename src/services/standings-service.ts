/**
 * Standings Service
 *
 * The poll pipeline: fetch each active league's page, parse and render
 * it, compare the fingerprint with the stored one and publish on change.
 * Leagues are processed one after another; an error in one league is
 * logged and the next league still runs.
 *
 * The new fingerprint is stored before publishing, so a publish that
 * fails is not retried until the standings change again.
 */

import { v4 as uuidv4 } from 'uuid';
import { League } from '../models/league';
import { StandingsRow, StandingsView } from '../models/standing';
import { UnconfiguredError } from '../models/errors';
import { activeLeagues } from '../config/leagues';
import { StandingsRepository } from '../repositories/standings-repository';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';
import { PublishService } from './publish-service';
import { ColumnStrategy, DEFAULT_STRATEGIES, parseStandings } from '../utils/standings-parser';
import { renderStandings } from '../utils/standings-render';
import { errorMessage, logPoll } from '../utils/logger';

/**
 * Anything that can GET a page body
 */
export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export type PollOutcome = 'unchanged' | 'published' | 'failed';

/**
 * Parsed and rendered standings for one league
 */
export interface LeagueSnapshot {
  rows: StandingsRow[];
  view: StandingsView;
}

export class StandingsService {
  constructor(
    private fetcher: PageFetcher,
    private standingsRepository: StandingsRepository,
    private tenantConfig: TenantConfigRepository,
    private publisher: PublishService,
    private leagues: League[],
    private homeTenantId: string | null = null,
    private strategies: ColumnStrategy[] = DEFAULT_STRATEGIES
  ) {}

  /**
   * Fetch, parse and render one league
   *
   * @throws TransportError or ParseError
   */
  async fetchSnapshot(league: League): Promise<LeagueSnapshot> {
    const html = await this.fetcher.fetch(league.standings_url);
    const rows = parseStandings(html, this.strategies);
    return { rows, view: renderStandings(rows, league.standings_url, league.name) };
  }

  /**
   * Tenants the automatic publish fans out to
   *
   * The home tenant plus every tenant with stored configuration; when
   * there are none, a single tenant-independent target (null).
   */
  publishTargets(): (string | null)[] {
    const tenants = new Set(this.tenantConfig.findTenantIds());
    if (this.homeTenantId) {
      tenants.add(this.homeTenantId);
    }
    return tenants.size > 0 ? [...tenants] : [null];
  }

  /**
   * One poll tick over every active league, sequentially
   */
  async pollOnce(tickId: string = uuidv4()): Promise<Record<string, PollOutcome>> {
    const outcomes: Record<string, PollOutcome> = {};

    for (const league of activeLeagues(this.leagues)) {
      try {
        outcomes[league.key] = await this.pollLeague(league, tickId);
      } catch (error) {
        outcomes[league.key] = 'failed';
        logPoll({ tickId, league: league.name, outcome: 'failed', error: errorMessage(error) });
      }
    }

    return outcomes;
  }

  /**
   * Poll one league and publish when its fingerprint changed
   */
  async pollLeague(league: League, tickId?: string): Promise<PollOutcome> {
    const { view } = await this.fetchSnapshot(league);

    if (this.standingsRepository.getLastHash(league.key) === view.fingerprint) {
      logPoll({ tickId, league: league.name, outcome: 'unchanged', fingerprint: view.fingerprint });
      return 'unchanged';
    }

    await this.standingsRepository.setLastHash(league.key, view.fingerprint);

    for (const tenantId of this.publishTargets()) {
      await this.publishTo(tenantId, league, view, tickId);
    }

    return 'published';
  }

  /**
   * Publish every active league to one tenant regardless of fingerprints
   *
   * Used by the manual commands. Errors become result lines.
   *
   * @param refreshFingerprint - Also store the fresh fingerprint
   * @returns One line per league
   */
  async publishNow(tenantId: string, refreshFingerprint = false): Promise<string[]> {
    const lines: string[] = [];

    for (const league of activeLeagues(this.leagues)) {
      try {
        const { view } = await this.fetchSnapshot(league);
        if (refreshFingerprint) {
          await this.standingsRepository.setLastHash(league.key, view.fingerprint);
        }
        const ref = await this.publisher.upsertStandings(tenantId, league, view);
        lines.push(`✅ ${league.name}: posted (message ${ref.id})`);
      } catch (error) {
        const prefix = error instanceof UnconfiguredError ? '⚠️' : '❌';
        lines.push(`${prefix} ${league.name}: ${errorMessage(error)}`);
        logPoll({
          tenantId,
          league: league.name,
          outcome: error instanceof UnconfiguredError ? 'unconfigured' : 'failed',
          error: errorMessage(error),
        });
      }
    }

    if (lines.length === 0) {
      lines.push('No leagues are configured.');
    }
    return lines;
  }

  private async publishTo(
    tenantId: string | null,
    league: League,
    view: StandingsView,
    tickId?: string
  ): Promise<void> {
    const tenant = tenantId ?? undefined;
    try {
      const ref = await this.publisher.upsertStandings(tenantId, league, view);
      logPoll({
        tickId,
        tenantId: tenant,
        league: league.name,
        outcome: 'published',
        fingerprint: view.fingerprint,
        messageId: ref.id,
      });
    } catch (error) {
      logPoll({
        tickId,
        tenantId: tenant,
        league: league.name,
        outcome: error instanceof UnconfiguredError ? 'unconfigured' : 'failed',
        error: errorMessage(error),
      });
    }
  }
}
