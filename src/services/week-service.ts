/**
 * Week Service
 *
 * Per-tenant week counters. Counters only move forward: either by the
 * automatic weekly rollover or by an admin setting a higher week.
 */

import { League } from '../models/league';
import { ValidationError } from '../models/errors';
import { activeLeagues, findLeague } from '../config/leagues';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';
import { localDateKey, zonedParts } from '../utils/match-time';
import { log, LogLevel } from '../utils/logger';

export class WeekService {
  constructor(
    private tenantConfig: TenantConfigRepository,
    private leagues: League[],
    private timeZone: string,
    private rolloverDay: number | null,
    private homeTenantId: string | null = null
  ) {}

  /**
   * Set a league's week for a tenant
   *
   * @throws ValidationError when the week is not a positive integer or
   *   is lower than the current week
   */
  async setWeek(tenantId: string, leagueInput: string, week: number): Promise<{ league: League; week: number }> {
    const league = findLeague(this.leagues, leagueInput);

    if (!Number.isInteger(week) || week < 1) {
      throw new ValidationError('Week must be a whole number of at least 1.', { week: String(week) });
    }

    const current = this.tenantConfig.getCurrentWeek(tenantId, league.key);
    if (week < current) {
      throw new ValidationError(`Week cannot go backwards (current week is ${current}).`, {
        week: String(week),
      });
    }

    await this.tenantConfig.setCurrentWeek(tenantId, league.key, week);
    return { league, week };
  }

  /**
   * Advance every tenant's week counters once on the rollover weekday
   *
   * @returns Tenants that were rolled over
   */
  async rollOverIfDue(now: Date): Promise<string[]> {
    if (this.rolloverDay === null) {
      return [];
    }
    if (zonedParts(now, this.timeZone).weekday !== this.rolloverDay) {
      return [];
    }

    const today = localDateKey(now, this.timeZone);
    const leagueKeys = activeLeagues(this.leagues).map((l) => l.key);
    const tenants = new Set(this.tenantConfig.findTenantIds());
    if (this.homeTenantId) {
      tenants.add(this.homeTenantId);
    }

    const rolled: string[] = [];
    for (const tenantId of tenants) {
      if (this.tenantConfig.findByTenantId(tenantId).last_week_rollover === today) {
        continue;
      }
      await this.tenantConfig.rollOverWeeks(tenantId, leagueKeys, today);
      rolled.push(tenantId);
      log(LogLevel.INFO, 'Week counters advanced', { tenant_id: tenantId, local_date: today });
    }

    return rolled;
  }
}
