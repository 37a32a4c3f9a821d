/**
 * Publish Service
 *
 * Keeps at most one standings message and one schedule message per
 * (tenant, league). A stored message id is fetched and edited in place;
 * when that fails for any reason a new message is posted and its id
 * replaces the old one. Duplicates left behind are not reconciled.
 */

import { League } from '../models/league';
import { Match } from '../models/match';
import { MessageRef, MessagingConnector, OutboundMessage } from '../models/messaging';
import { StandingsView } from '../models/standing';
import { UnconfiguredError } from '../models/errors';
import { StandingsRepository } from '../repositories/standings-repository';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';
import { standingsEmbed } from '../utils/standings-render';
import { scheduleEmbed } from '../utils/message-format';
import { errorMessage, log, LogLevel } from '../utils/logger';

/**
 * Result of an edit-or-create
 */
export interface UpsertResult {
  ref: MessageRef;
  created: boolean;
}

export class PublishService {
  constructor(
    private connector: MessagingConnector,
    private tenantConfig: TenantConfigRepository,
    private standingsRepository: StandingsRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Destination for a league's standings
   *
   * Tenant override first, then the league's static fallback.
   *
   * @param tenantId - Tenant, or null for the tenant-independent board
   */
  resolveStandingsChannel(tenantId: string | null, league: League): string | null {
    const override = tenantId
      ? this.tenantConfig.getChannel(tenantId, { kind: 'standings', league_key: league.key })
      : null;
    return override ?? league.fallback_channel_id;
  }

  /**
   * Create or edit the standings message for (tenant, league)
   *
   * @throws UnconfiguredError when no destination channel is bound
   */
  async upsertStandings(tenantId: string | null, league: League, view: StandingsView): Promise<MessageRef> {
    const channelId = this.resolveStandingsChannel(tenantId, league);
    if (!channelId) {
      throw new UnconfiguredError(`${league.name} standings channel not configured yet.`);
    }

    const priorId =
      (tenantId ? this.tenantConfig.getMessageId(tenantId, 'standings', league.key) : null) ??
      this.standingsRepository.getGlobalMessageId(league.key);

    const message: OutboundMessage = { embed: standingsEmbed(view, this.clock()) };
    const { ref, created } = await this.editOrCreate(channelId, priorId, message);

    if (created) {
      if (tenantId) {
        await this.tenantConfig.setMessageId(tenantId, 'standings', league.key, ref.id);
      } else {
        await this.standingsRepository.setGlobalMessageId(league.key, ref.id);
      }
    }

    return ref;
  }

  /**
   * Create or edit the schedule board for (tenant, league)
   *
   * Schedule boards have no league fallback channel.
   *
   * @returns The board message, or null when the tenant has no schedule channel
   */
  async upsertSchedule(tenantId: string, league: League, matches: Match[]): Promise<MessageRef | null> {
    const channelId = this.tenantConfig.getChannel(tenantId, { kind: 'schedule', league_key: league.key });
    if (!channelId) {
      return null;
    }

    const priorId = this.tenantConfig.getMessageId(tenantId, 'schedule', league.key);
    const message: OutboundMessage = { embed: scheduleEmbed(league.name, matches, this.clock()) };
    const { ref, created } = await this.editOrCreate(channelId, priorId, message);

    if (created) {
      await this.tenantConfig.setMessageId(tenantId, 'schedule', league.key, ref.id);
    }

    return ref;
  }

  /**
   * Edit the stored message in place, or post a new one
   */
  async editOrCreate(channelId: string, priorId: string | null, message: OutboundMessage): Promise<UpsertResult> {
    if (priorId) {
      try {
        const existing = await this.connector.fetchMessage(channelId, priorId);
        const ref = await this.connector.editMessage(existing, message);
        return { ref, created: false };
      } catch (error) {
        log(LogLevel.WARN, 'Stored message could not be edited, posting a new one', {
          channel_id: channelId,
          message_id: priorId,
          error: errorMessage(error),
        });
      }
    }

    const ref = await this.connector.sendMessage(channelId, message);
    return { ref, created: true };
  }
}
