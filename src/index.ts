/**
 * Standings Notifier
 *
 * Main entry point: loads configuration and state, connects to the
 * platform and starts the standings poll and the reminder sweep once the
 * connection is ready.
 */

import 'dotenv/config';
import { Client, Events, GatewayIntentBits } from 'discord.js';
import { loadEnvironmentConfig, validateEnvironmentConfig } from './config/environment';
import { activeLeagues, CHAMPION } from './config/leagues';
import { StateStore } from './repositories/state-store';
import { DiscordConnector } from './handlers/discord-connector';
import { DiscordBot } from './handlers/discord-bot';
import { createApplication } from './app';
import { errorMessage, log, LogLevel, setLogLevel } from './utils/logger';

async function main(): Promise<void> {
  const config = loadEnvironmentConfig();
  validateEnvironmentConfig(config);
  setLogLevel(config.logLevel);

  const store = await StateStore.load(config.statePath, { primaryLeagueKey: CHAMPION });

  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  const app = createApplication(config, store, new DiscordConnector(client));
  const bot = new DiscordBot(client, app.commands, config.guildId);
  bot.attach();

  client.once(Events.ClientReady, (ready) => {
    log(LogLevel.INFO, 'Connected', {
      user: ready.user.tag,
      leagues: activeLeagues(app.leagues).map((l) => l.key),
      poll_seconds: config.pollSeconds,
    });

    bot.registerCommands().catch((error: unknown) => {
      log(LogLevel.ERROR, 'Slash command registration failed', { error: errorMessage(error) });
    });

    app.pollTask.start();
    app.reminderTask.start();
  });

  const shutdown = (signal: string): void => {
    log(LogLevel.INFO, 'Shutting down', { signal });
    app.pollTask.stop();
    app.reminderTask.stop();
    client
      .destroy()
      .catch((error: unknown) => {
        log(LogLevel.WARN, 'Client shutdown failed', { error: errorMessage(error) });
      })
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await client.login(config.discordToken);
}

main().catch((error: unknown) => {
  log(LogLevel.ERROR, 'Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
