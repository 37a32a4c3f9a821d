/**
 * Match Service
 *
 * Scheduling, cancelling and listing matches for a tenant. Every change
 * refreshes the tenant's schedule board for the league and, when the
 * tenant has a logs channel, posts an audit line there. Board and audit
 * failures are logged and never fail the command: the match change is
 * already stored.
 */

import { CommandContext } from '../models/command';
import { League } from '../models/league';
import { Match, scheduledTime } from '../models/match';
import { MessageRef, MessagingConnector } from '../models/messaging';
import { NotFoundError, ValidationError } from '../models/errors';
import { activeLeagues, findLeague } from '../config/leagues';
import { MatchRepository } from '../repositories/match-repository';
import { TenantConfigRepository } from '../repositories/tenant-config-repository';
import { PublishService } from './publish-service';
import { PermissionService } from './permission-service';
import { parseMatchDateTime } from '../utils/match-time';
import { platformTimestamp, sortByScheduledTime } from '../utils/message-format';
import { errorMessage, log, LogLevel } from '../utils/logger';

/**
 * Raw /schedule input
 */
export interface ScheduleMatchInput {
  league: string;
  team: string;
  opponent: string;
  date: string;
  time: string;
}

export class MatchService {
  constructor(
    private matchRepository: MatchRepository,
    private tenantConfig: TenantConfigRepository,
    private publisher: PublishService,
    private permissions: PermissionService,
    private connector: MessagingConnector,
    private leagues: League[],
    private timeZone: string,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Schedule a match for the invoking tenant
   *
   * @throws ForbiddenError, ValidationError
   */
  async schedule(ctx: CommandContext, input: ScheduleMatchInput): Promise<Match> {
    const league = findLeague(this.leagues, input.league);
    const team = input.team.trim();
    const opponent = input.opponent.trim();

    if (!team || !opponent) {
      throw new ValidationError('Both teams are required.', { team: 'required', opponent: 'required' });
    }
    if (team.toLowerCase() === opponent.toLowerCase()) {
      throw new ValidationError('A team cannot play itself.', { opponent: 'must differ from team' });
    }

    this.permissions.assertCanSchedule(ctx, league.key, team);

    const scheduledAt = parseMatchDateTime(input.date, input.time, this.timeZone, this.clock());

    const match = await this.matchRepository.create({
      league: league.key,
      team,
      opponent,
      scheduled_at: scheduledAt,
      tenant_id: ctx.tenant_id,
      channel_id: ctx.channel_id,
      created_by: ctx.member.user_id,
      week: this.tenantConfig.getCurrentWeek(ctx.tenant_id, league.key),
    });

    log(LogLevel.INFO, 'Match scheduled', {
      request_id: ctx.request_id,
      tenant_id: ctx.tenant_id,
      match_id: match.id,
      league: league.key,
      scheduled_iso: match.scheduled_iso,
    });

    await this.refreshBoardQuietly(ctx.tenant_id, league);
    await this.audit(
      ctx.tenant_id,
      `📅 <@${ctx.member.user_id}> scheduled \`${match.id}\` (${league.name}): ${team} vs ${opponent} at ${platformTimestamp(scheduledAt)}`
    );

    return match;
  }

  /**
   * Cancel a match of the invoking tenant
   *
   * A match owned by another tenant is reported as not found.
   *
   * @throws ForbiddenError, NotFoundError
   */
  async cancel(ctx: CommandContext, matchId: string): Promise<Match> {
    this.permissions.assertCanUseScheduler(ctx);

    const match = this.matchRepository.findById(matchId);
    if (!match || match.guild_id !== ctx.tenant_id) {
      throw new NotFoundError(`No match with ID \`${matchId.trim().toUpperCase()}\`.`);
    }

    await this.matchRepository.delete(match.id);

    log(LogLevel.INFO, 'Match cancelled', {
      request_id: ctx.request_id,
      tenant_id: ctx.tenant_id,
      match_id: match.id,
    });

    const league = this.leagues.find((l) => l.key === match.league);
    if (league) {
      await this.refreshBoardQuietly(ctx.tenant_id, league);
    }
    await this.audit(
      ctx.tenant_id,
      `🗑️ <@${ctx.member.user_id}> cancelled \`${match.id}\`: ${match.team} vs ${match.opponent}`
    );

    return match;
  }

  /**
   * Upcoming matches of a tenant, soonest first
   */
  listUpcoming(tenantId: string, leagueInput?: string): Match[] {
    const leagueKey = leagueInput ? findLeague(this.leagues, leagueInput).key : undefined;
    const now = this.clock().getTime();

    return sortByScheduledTime(
      this.matchRepository.findByTenantId(tenantId, leagueKey).filter((m) => {
        const when = scheduledTime(m);
        return when !== null && when.getTime() > now;
      })
    );
  }

  /**
   * Create or edit the tenant's schedule board for a league
   */
  async refreshBoard(tenantId: string, league: League): Promise<MessageRef | null> {
    return this.publisher.upsertSchedule(tenantId, league, this.matchRepository.findByTenantId(tenantId, league.key));
  }

  /**
   * Refresh every active league's board
   *
   * @returns One line per league
   */
  async refreshAllBoards(tenantId: string): Promise<string[]> {
    const lines: string[] = [];

    for (const league of activeLeagues(this.leagues)) {
      try {
        const ref = await this.refreshBoard(tenantId, league);
        lines.push(
          ref
            ? `✅ ${league.name}: schedule posted (message ${ref.id})`
            : `⚠️ ${league.name}: schedule channel not configured yet.`
        );
      } catch (error) {
        lines.push(`❌ ${league.name}: ${errorMessage(error)}`);
      }
    }

    return lines;
  }

  private async refreshBoardQuietly(tenantId: string, league: League): Promise<void> {
    try {
      await this.refreshBoard(tenantId, league);
    } catch (error) {
      log(LogLevel.WARN, 'Schedule board refresh failed', {
        tenant_id: tenantId,
        league: league.key,
        error: errorMessage(error),
      });
    }
  }

  private async audit(tenantId: string, content: string): Promise<void> {
    const channelId = this.tenantConfig.getChannel(tenantId, { kind: 'logs' });
    if (!channelId) {
      return;
    }

    try {
      await this.connector.sendMessage(channelId, { content });
    } catch (error) {
      log(LogLevel.WARN, 'Audit message failed', {
        tenant_id: tenantId,
        channel_id: channelId,
        error: errorMessage(error),
      });
    }
  }
}
