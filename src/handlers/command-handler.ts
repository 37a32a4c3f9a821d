/**
 * Command Handler
 *
 * Platform-neutral dispatch of slash commands and autocomplete requests.
 * Each command body returns the reply text; errors are mapped to replies
 * by the error handling middleware and every invocation is logged with
 * its outcome and latency.
 */

import { AutocompleteChoice, AutocompleteContext, CommandContext, CommandOptions } from '../models/command';
import { League } from '../models/league';
import { ValidationError } from '../models/errors';
import { activeLeagues, findLeague } from '../config/leagues';
import { StandingsService } from '../services/standings-service';
import { MatchService } from '../services/match-service';
import { WeekService } from '../services/week-service';
import { TenantConfigService } from '../services/tenant-config-service';
import { TeamDirectory, MAX_SUGGESTIONS } from '../services/team-directory';
import { PermissionService } from '../services/permission-service';
import { CommandReply, withErrorHandling } from '../middleware/error-handler';
import { formatMatchSummary, platformTimestamp } from '../utils/message-format';
import { scheduledTime } from '../models/match';
import { errorMessage, log, logCommand, LogLevel } from '../utils/logger';
import { helpLines } from './commands';

export interface CommandServices {
  standings: StandingsService;
  matches: MatchService;
  weeks: WeekService;
  tenantConfig: TenantConfigService;
  teams: TeamDirectory;
  permissions: PermissionService;
  leagues: League[];
}

function requireString(options: CommandOptions, name: string): string {
  const value = options[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Missing option: ${name}`, { [name]: 'required' });
  }
  return value;
}

function optionalString(options: CommandOptions, name: string): string | undefined {
  const value = options[name];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function requireInteger(options: CommandOptions, name: string): number {
  const value = options[name];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`Option ${name} must be a whole number`, { [name]: 'integer' });
  }
  return value;
}

function requireBoolean(options: CommandOptions, name: string): boolean {
  const value = options[name];
  if (typeof value !== 'boolean') {
    throw new ValidationError(`Missing option: ${name}`, { [name]: 'required' });
  }
  return value;
}

function toChoices(values: string[]): AutocompleteChoice[] {
  return values.slice(0, MAX_SUGGESTIONS).map((value) => ({ name: value, value }));
}

export class CommandHandler {
  constructor(private services: CommandServices) {}

  /**
   * Run a command and produce its reply
   */
  async handle(ctx: CommandContext): Promise<CommandReply> {
    const startTime = Date.now();
    const reply = await withErrorHandling(() => this.dispatch(ctx), ctx.request_id);

    logCommand({
      requestId: ctx.request_id,
      command: ctx.command,
      tenantId: ctx.tenant_id,
      userId: ctx.member.user_id,
      outcome: reply.outcome,
      latencyMs: Date.now() - startTime,
      reason: reply.outcome === 'ok' ? undefined : reply.content,
    });

    return reply;
  }

  private async dispatch(ctx: CommandContext): Promise<string> {
    const { options } = ctx;

    switch (ctx.command) {
      case 'poststandings':
        return (await this.services.standings.publishNow(ctx.tenant_id)).join('\n');

      case 'forcecheck':
        return (await this.services.standings.publishNow(ctx.tenant_id, true)).join('\n');

      case 'schedule': {
        const match = await this.services.matches.schedule(ctx, {
          league: requireString(options, 'league'),
          team: requireString(options, 'team'),
          opponent: requireString(options, 'opponent'),
          date: requireString(options, 'date'),
          time: requireString(options, 'time'),
        });
        const when = scheduledTime(match);
        return [
          `✅ Scheduled **${match.team}** vs **${match.opponent}** (week ${match.week})`,
          `When: ${when ? platformTimestamp(when) : match.scheduled_iso}`,
          `Match ID: \`${match.id}\``,
        ].join('\n');
      }

      case 'cancelmatch': {
        const match = await this.services.matches.cancel(ctx, requireString(options, 'match_id'));
        return `🗑️ Cancelled \`${match.id}\`: **${match.team}** vs **${match.opponent}**`;
      }

      case 'matches': {
        const upcoming = this.services.matches.listUpcoming(ctx.tenant_id, optionalString(options, 'league'));
        return upcoming.length > 0 ? upcoming.map(formatMatchSummary).join('\n') : 'No upcoming matches.';
      }

      case 'postmatches':
        this.services.permissions.assertCanUseScheduler(ctx);
        return (await this.services.matches.refreshAllBoards(ctx.tenant_id)).join('\n');

      case 'setweek': {
        this.services.permissions.assertAdmin(ctx);
        const { league, week } = await this.services.weeks.setWeek(
          ctx.tenant_id,
          requireString(options, 'league'),
          requireInteger(options, 'week')
        );
        return `✅ ${league.name} is now on week ${week}.`;
      }

      case 'admin_setchannel': {
        this.services.permissions.assertAdmin(ctx);
        const channelId = requireString(options, 'channel');
        const target = await this.services.tenantConfig.setChannel(
          ctx.tenant_id,
          requireString(options, 'target'),
          channelId
        );
        const label = target.league_key ? `${target.kind}:${target.league_key}` : target.kind;
        return `✅ ${label} → <#${channelId}>`;
      }

      case 'admin_reminders': {
        this.services.permissions.assertAdmin(ctx);
        const enabled = requireBoolean(options, 'enabled');
        await this.services.tenantConfig.setSchedulerEnabled(ctx.tenant_id, enabled);
        return enabled ? '✅ Match reminders enabled.' : '✅ Match reminders disabled.';
      }

      case 'admin_status':
        this.services.permissions.assertAdmin(ctx);
        return ['## Current configuration', ...this.services.tenantConfig.status(ctx.tenant_id)].join('\n');

      case 'help':
        return ['## Bot Commands', ...helpLines()].join('\n');

      default:
        throw new ValidationError(`Unknown command: ${ctx.command}`);
    }
  }

  /**
   * Suggestions for the focused option; lookup failures yield none
   */
  async autocomplete(ctx: AutocompleteContext): Promise<AutocompleteChoice[]> {
    try {
      switch (ctx.focused) {
        case 'league':
          return toChoices(this.matchingLeagueNames(ctx.value));
        case 'team':
        case 'opponent': {
          const leagueInput = optionalString(ctx.options, 'league');
          if (!leagueInput) {
            return [];
          }
          const league = findLeague(this.services.leagues, leagueInput);
          return toChoices(await this.services.teams.suggest(league, ctx.value));
        }
        case 'target':
          return toChoices(this.channelTargets().filter((t) => t.includes(ctx.value.trim().toLowerCase())));
        default:
          return [];
      }
    } catch (error) {
      log(LogLevel.DEBUG, 'Autocomplete failed', {
        tenant_id: ctx.tenant_id,
        command: ctx.command,
        focused: ctx.focused,
        error: errorMessage(error),
      });
      return [];
    }
  }

  private matchingLeagueNames(typed: string): string[] {
    const wanted = typed.trim().toLowerCase();
    return activeLeagues(this.services.leagues)
      .map((l) => l.name)
      .filter((name) => name.toLowerCase().includes(wanted));
  }

  private channelTargets(): string[] {
    const leagueKeys = activeLeagues(this.services.leagues).map((l) => l.key);
    return [
      ...leagueKeys.map((k) => `standings:${k}`),
      ...leagueKeys.map((k) => `schedule:${k}`),
      'logs',
      'announcements',
    ];
  }
}
