/**
 * Tenant Config Repository
 *
 * Per-tenant channel bindings, board message ids, week counters and
 * scheduler switches. Reads never create a tenant section; the first
 * write does.
 */

import { ChannelTarget, TenantState, emptyTenantState } from '../models/state';
import { StateStore } from './state-store';

/**
 * Boards tracked per (tenant, league)
 */
export type BoardKind = 'standings' | 'schedule';

export class TenantConfigRepository {
  constructor(private store: StateStore) {}

  /**
   * Tenants with stored configuration
   */
  findTenantIds(): string[] {
    return Object.keys(this.store.state.guilds);
  }

  /**
   * Tenant configuration, with defaults when the tenant has none
   */
  findByTenantId(tenantId: string): TenantState {
    return this.store.state.guilds[tenantId] ?? emptyTenantState();
  }

  /**
   * Bound channel for a target, or null
   */
  getChannel(tenantId: string, target: ChannelTarget): string | null {
    const tenant = this.findByTenantId(tenantId);

    switch (target.kind) {
      case 'standings':
        return target.league_key ? tenant.standings_channels[target.league_key] ?? null : null;
      case 'schedule':
        return target.league_key ? tenant.schedule_channels[target.league_key] ?? null : null;
      case 'logs':
        return tenant.logs_channel_id;
      case 'announcements':
        return tenant.announcements_channel_id;
    }
  }

  async setChannel(tenantId: string, target: ChannelTarget, channelId: string): Promise<void> {
    await this.update(tenantId, (tenant) => {
      switch (target.kind) {
        case 'standings':
          if (target.league_key) {
            tenant.standings_channels[target.league_key] = channelId;
          }
          break;
        case 'schedule':
          if (target.league_key) {
            tenant.schedule_channels[target.league_key] = channelId;
          }
          break;
        case 'logs':
          tenant.logs_channel_id = channelId;
          break;
        case 'announcements':
          tenant.announcements_channel_id = channelId;
          break;
      }
    });
  }

  getMessageId(tenantId: string, board: BoardKind, leagueKey: string): string | null {
    const tenant = this.findByTenantId(tenantId);
    const ids = board === 'standings' ? tenant.standings_message_ids : tenant.schedule_message_ids;
    return ids[leagueKey] ?? null;
  }

  async setMessageId(tenantId: string, board: BoardKind, leagueKey: string, messageId: string): Promise<void> {
    await this.update(tenantId, (tenant) => {
      const ids = board === 'standings' ? tenant.standings_message_ids : tenant.schedule_message_ids;
      ids[leagueKey] = messageId;
    });
  }

  /**
   * Current week for a league (1 when never set)
   */
  getCurrentWeek(tenantId: string, leagueKey: string): number {
    return this.findByTenantId(tenantId).current_week[leagueKey] ?? 1;
  }

  async setCurrentWeek(tenantId: string, leagueKey: string, week: number): Promise<void> {
    await this.update(tenantId, (tenant) => {
      tenant.current_week[leagueKey] = week;
    });
  }

  /**
   * Advance every listed league by one week and record the rollover date
   */
  async rollOverWeeks(tenantId: string, leagueKeys: string[], localDate: string): Promise<void> {
    await this.update(tenantId, (tenant) => {
      for (const key of leagueKeys) {
        tenant.current_week[key] = (tenant.current_week[key] ?? 1) + 1;
      }
      tenant.last_week_rollover = localDate;
    });
  }

  async setSchedulerEnabled(tenantId: string, enabled: boolean): Promise<void> {
    await this.update(tenantId, (tenant) => {
      tenant.scheduler_enabled = enabled;
    });
  }

  private async update(tenantId: string, change: (tenant: TenantState) => void): Promise<void> {
    await this.store.mutate((document) => {
      const tenant = document.guilds[tenantId] ?? emptyTenantState();
      change(tenant);
      document.guilds[tenantId] = tenant;
    });
  }
}
