/**
 * Discord Bot
 *
 * Turns discord.js interactions into CommandContext / AutocompleteContext
 * values for the command handler and sends the ephemeral replies back.
 */

import {
  AutocompleteInteraction,
  ChatInputCommandInteraction,
  Client,
  CommandInteractionOption,
  Events,
  Interaction,
  PermissionFlagsBits,
} from 'discord.js';
import { v4 as uuidv4 } from 'uuid';
import { CommandMember, CommandOptions } from '../models/command';
import { CommandHandler } from './command-handler';
import { COMMANDS } from './commands';
import { errorMessage, log, LogLevel } from '../utils/logger';

/**
 * Platform limit on message length
 */
const MAX_REPLY_LENGTH = 2000;

export function truncateReply(content: string): string {
  return content.length <= MAX_REPLY_LENGTH ? content : `${content.slice(0, MAX_REPLY_LENGTH - 1)}…`;
}

/**
 * Flatten option values by name
 */
export function collectOptions(data: readonly CommandInteractionOption[]): CommandOptions {
  const options: CommandOptions = {};
  for (const option of data) {
    options[option.name] = option.value;
  }
  return options;
}

export class DiscordBot {
  constructor(
    private client: Client,
    private handler: CommandHandler,
    private homeGuildId: string | null
  ) {}

  attach(): void {
    this.client.on(Events.InteractionCreate, (interaction) => {
      void this.onInteraction(interaction);
    });
  }

  /**
   * Register slash commands in the home guild, or globally without one
   */
  async registerCommands(): Promise<void> {
    const application = this.client.application;
    if (!application) {
      throw new Error('Client application is not available before login');
    }

    const body = COMMANDS.map((command) => command.toJSON());
    if (this.homeGuildId) {
      await application.commands.set(body, this.homeGuildId);
    } else {
      await application.commands.set(body);
    }
    log(LogLevel.INFO, 'Slash commands registered', {
      command_count: body.length,
      tenant_id: this.homeGuildId ?? 'global',
    });
  }

  async onInteraction(interaction: Interaction): Promise<void> {
    try {
      if (interaction.isAutocomplete()) {
        await this.onAutocomplete(interaction);
      } else if (interaction.isChatInputCommand()) {
        await this.onCommand(interaction);
      }
    } catch (error) {
      log(LogLevel.ERROR, 'Interaction handling failed', {
        interaction_id: interaction.id,
        error: errorMessage(error),
      });
    }
  }

  private async onCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    if (!interaction.inGuild()) {
      await interaction.reply({ content: 'Commands only work inside a server.', ephemeral: true });
      return;
    }

    await interaction.deferReply({ ephemeral: true });

    const reply = await this.handler.handle({
      request_id: uuidv4(),
      command: interaction.commandName,
      tenant_id: interaction.guildId,
      channel_id: interaction.channelId,
      member: this.commandMember(interaction),
      options: collectOptions(interaction.options.data),
    });

    await interaction.editReply({ content: truncateReply(reply.content) });
  }

  private async onAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
    if (!interaction.inGuild()) {
      await interaction.respond([]);
      return;
    }

    const focused = interaction.options.getFocused(true);
    const choices = await this.handler.autocomplete({
      command: interaction.commandName,
      tenant_id: interaction.guildId,
      focused: focused.name,
      value: String(focused.value),
      options: collectOptions(interaction.options.data),
    });
    await interaction.respond(choices);
  }

  private commandMember(interaction: ChatInputCommandInteraction): CommandMember {
    const permissions = interaction.memberPermissions;
    return {
      user_id: interaction.user.id,
      role_names: interaction.inCachedGuild() ? interaction.member.roles.cache.map((role) => role.name) : [],
      is_admin: permissions
        ? permissions.has(PermissionFlagsBits.Administrator) || permissions.has(PermissionFlagsBits.ManageGuild)
        : false,
    };
  }
}
