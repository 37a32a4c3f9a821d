/**
 * Reminder Service
 *
 * One sweep evaluates every stored match against each reminder threshold
 * independently. A threshold is marked sent only after its message was
 * delivered; a failed delivery is retried on the next sweep. Matches whose
 * time has passed are never reminded. Changes are persisted once per
 * sweep.
 */

import { Match, REMINDER_THRESHOLDS, scheduledTime } from '../models/match';
import { MessagingConnector, RoleRef } from '../models/messaging';
import { MatchRepository } from '../repositories/match-repository';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';
import { formatReminder, roleMention } from '../utils/message-format';
import { errorMessage, log, LogLevel } from '../utils/logger';

export interface SweepResult {
  sent: number;
  failed: number;
  skipped: number;
}

export class ReminderService {
  constructor(
    private matchRepository: MatchRepository,
    private tenantConfig: TenantConfigRepository,
    private connector: MessagingConnector,
    private clock: () => Date = () => new Date()
  ) {}

  async sweep(now: Date = this.clock()): Promise<SweepResult> {
    const result: SweepResult = { sent: 0, failed: 0, skipped: 0 };
    const roleCache = new Map<string, RoleRef[]>();
    let changed = false;

    for (const match of this.matchRepository.findAll()) {
      const when = scheduledTime(match);
      if (!when || when.getTime() <= now.getTime()) {
        continue;
      }
      if (!this.tenantConfig.findByTenantId(match.guild_id).scheduler_enabled) {
        continue;
      }

      const due = REMINDER_THRESHOLDS.filter(
        (t) => !match.reminders_sent[t.label] && now.getTime() >= when.getTime() - t.lead_ms
      );
      if (due.length === 0) {
        continue;
      }

      const channelId = await this.resolveDestination(match);
      if (!channelId) {
        result.skipped += 1;
        log(LogLevel.WARN, 'No reminder destination for match', {
          tenant_id: match.guild_id,
          match_id: match.id,
          league: match.league,
        });
        continue;
      }

      const roles = await this.rolesFor(match.guild_id, roleCache);

      for (const threshold of due) {
        const content = formatReminder({
          label: threshold.label,
          match,
          when,
          teamMention: roleMention(roles, match.team),
          opponentMention: roleMention(roles, match.opponent),
        });

        try {
          await this.connector.sendMessage(channelId, { content });
          match.reminders_sent[threshold.label] = true;
          changed = true;
          result.sent += 1;
          log(LogLevel.INFO, 'Reminder sent', {
            tenant_id: match.guild_id,
            match_id: match.id,
            threshold: threshold.label,
          });
        } catch (error) {
          result.failed += 1;
          log(LogLevel.ERROR, 'Reminder delivery failed', {
            tenant_id: match.guild_id,
            match_id: match.id,
            threshold: threshold.label,
            error: errorMessage(error),
          });
        }
      }
    }

    if (changed) {
      await this.matchRepository.saveAll();
    }

    return result;
  }

  /**
   * First reachable channel: the match's own, the tenant's schedule
   * channel for the league, then the announcements channel
   */
  async resolveDestination(match: Match): Promise<string | null> {
    const candidates = [
      match.channel_id ?? null,
      this.tenantConfig.getChannel(match.guild_id, { kind: 'schedule', league_key: match.league }),
      this.tenantConfig.getChannel(match.guild_id, { kind: 'announcements' }),
    ];

    for (const channelId of candidates) {
      if (!channelId) {
        continue;
      }
      try {
        if (await this.connector.resolveChannel(channelId)) {
          return channelId;
        }
      } catch (error) {
        log(LogLevel.DEBUG, 'Channel lookup failed', {
          channel_id: channelId,
          error: errorMessage(error),
        });
      }
    }

    return null;
  }

  private async rolesFor(tenantId: string, cache: Map<string, RoleRef[]>): Promise<RoleRef[]> {
    const cached = cache.get(tenantId);
    if (cached) {
      return cached;
    }

    let roles: RoleRef[] = [];
    try {
      roles = await this.connector.listRoles(tenantId);
    } catch (error) {
      log(LogLevel.WARN, 'Role lookup failed, reminders use plain team names', {
        tenant_id: tenantId,
        error: errorMessage(error),
      });
    }
    cache.set(tenantId, roles);
    return roles;
  }
}
