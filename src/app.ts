/**
 * Application wiring
 *
 * Builds every component from configuration, a loaded state store and a
 * messaging connector. Nothing here touches the network until a task
 * ticks or a command runs.
 */

import { EnvironmentConfig } from './config/environment';
import { getLeagues } from './config/leagues';
import { League } from './models/league';
import { MessagingConnector } from './models/messaging';
import { StateStore } from './repositories/state-store';
import { StandingsRepository } from './repositories/standings-repository';
import { TenantConfigRepository } from './repositories/tenant-config-repository';
import { MatchRepository } from './repositories/match-repository';
import { HttpFetcher } from './services/http-fetcher';
import { PageFetcher, StandingsService } from './services/standings-service';
import { PublishService } from './services/publish-service';
import { PermissionService } from './services/permission-service';
import { MatchService } from './services/match-service';
import { ReminderService } from './services/reminder-service';
import { WeekService } from './services/week-service';
import { TenantConfigService } from './services/tenant-config-service';
import { TeamDirectory } from './services/team-directory';
import { PeriodicTask } from './services/periodic-task';
import { CommandHandler } from './handlers/command-handler';
import { errorMessage, log, LogLevel } from './utils/logger';

export const REMINDER_INTERVAL_MS = 60_000;

export interface Application {
  leagues: League[];
  standings: StandingsService;
  reminders: ReminderService;
  weeks: WeekService;
  commands: CommandHandler;
  pollTask: PeriodicTask;
  reminderTask: PeriodicTask;
}

export function createApplication(
  config: EnvironmentConfig,
  store: StateStore,
  connector: MessagingConnector,
  options: { fetcher?: PageFetcher; clock?: () => Date } = {}
): Application {
  const clock = options.clock ?? (() => new Date());
  const leagues = getLeagues(config);

  const standingsRepository = new StandingsRepository(store);
  const tenantConfigRepository = new TenantConfigRepository(store);
  const matchRepository = new MatchRepository(store);

  const publisher = new PublishService(connector, tenantConfigRepository, standingsRepository, clock);
  const standings = new StandingsService(
    options.fetcher ?? new HttpFetcher(),
    standingsRepository,
    tenantConfigRepository,
    publisher,
    leagues,
    config.guildId
  );
  const permissions = new PermissionService(config);
  const matches = new MatchService(
    matchRepository,
    tenantConfigRepository,
    publisher,
    permissions,
    connector,
    leagues,
    config.leagueTimeZone,
    clock
  );
  const reminders = new ReminderService(matchRepository, tenantConfigRepository, connector, clock);
  const weeks = new WeekService(
    tenantConfigRepository,
    leagues,
    config.leagueTimeZone,
    config.weekRolloverDay,
    config.guildId
  );

  const commands = new CommandHandler({
    standings,
    matches,
    weeks,
    tenantConfig: new TenantConfigService(tenantConfigRepository, connector, leagues),
    teams: new TeamDirectory(standings, clock),
    permissions,
    leagues,
  });

  const pollTask = new PeriodicTask('standings-poll', config.pollSeconds * 1000, async (tickId) => {
    await standings.pollOnce(tickId);
  });

  const reminderTask = new PeriodicTask('match-reminders', REMINDER_INTERVAL_MS, async () => {
    const now = clock();
    try {
      await weeks.rollOverIfDue(now);
    } catch (error) {
      // Reminders still go out on a day the rollover cannot be saved
      log(LogLevel.ERROR, 'Week rollover failed', { error: errorMessage(error) });
    }
    await reminders.sweep(now);
  });

  return { leagues, standings, reminders, weeks, commands, pollTask, reminderTask };
}
