/**
 * Tenant Config Service
 *
 * Admin-facing channel bindings and the status summary.
 */

import { League } from '../models/league';
import { ChannelTarget } from '../models/state';
import { NotFoundError, ValidationError } from '../models/errors';
import { MessagingConnector } from '../models/messaging';
import { activeLeagues, findLeague } from '../config/leagues';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';

const NOT_SET = 'Not set';

function channelLabel(channelId: string | null): string {
  return channelId ? `<#${channelId}>` : NOT_SET;
}

export class TenantConfigService {
  constructor(
    private tenantConfig: TenantConfigRepository,
    private connector: MessagingConnector,
    private leagues: League[]
  ) {}

  /**
   * Parse a binding target: standings:<league>, schedule:<league>, logs
   * or announcements
   *
   * @throws ValidationError for anything else
   */
  parseTarget(value: string): ChannelTarget {
    const [kind, leagueInput] = value.trim().toLowerCase().split(':', 2);

    if ((kind === 'logs' || kind === 'announcements') && leagueInput === undefined) {
      return { kind };
    }
    if ((kind === 'standings' || kind === 'schedule') && leagueInput) {
      return { kind, league_key: findLeague(this.leagues, leagueInput).key };
    }

    throw new ValidationError(
      `Unknown target '${value}'. Use standings:<league>, schedule:<league>, logs or announcements.`,
      { target: value }
    );
  }

  /**
   * Bind a channel to a target
   *
   * @throws ValidationError, NotFoundError
   */
  async setChannel(tenantId: string, targetInput: string, channelId: string): Promise<ChannelTarget> {
    const target = this.parseTarget(targetInput);

    if (!(await this.connector.resolveChannel(channelId))) {
      throw new NotFoundError('That channel is not a text channel I can post in.');
    }

    await this.tenantConfig.setChannel(tenantId, target, channelId);
    return target;
  }

  async setSchedulerEnabled(tenantId: string, enabled: boolean): Promise<void> {
    await this.tenantConfig.setSchedulerEnabled(tenantId, enabled);
  }

  /**
   * Human-readable summary of every binding
   */
  status(tenantId: string): string[] {
    const tenant = this.tenantConfig.findByTenantId(tenantId);
    const lines: string[] = [];

    for (const league of activeLeagues(this.leagues)) {
      const override = tenant.standings_channels[league.key] ?? null;
      const standings = override
        ? channelLabel(override)
        : league.fallback_channel_id
          ? `${channelLabel(league.fallback_channel_id)} (default)`
          : NOT_SET;
      lines.push(`**${league.name}** standings: ${standings}`);
      lines.push(`**${league.name}** schedule: ${channelLabel(tenant.schedule_channels[league.key] ?? null)}`);
      lines.push(`**${league.name}** week: ${tenant.current_week[league.key] ?? 1}`);
    }

    lines.push(`Logs: ${channelLabel(tenant.logs_channel_id)}`);
    lines.push(`Announcements: ${channelLabel(tenant.announcements_channel_id)}`);
    lines.push(`Reminders: ${tenant.scheduler_enabled ? 'enabled' : 'disabled'}`);
    lines.push(`Last week rollover: ${tenant.last_week_rollover ?? NOT_SET}`);

    return lines;
  }
}
