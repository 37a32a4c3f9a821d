/**
 * Slash Command Definitions
 *
 * Registered with the platform at startup; /help is built from the same
 * list.
 */

import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from 'discord.js';

export const COMMANDS = [
  new SlashCommandBuilder()
    .setName('poststandings')
    .setDescription('Post or update the standings message for every league'),
  new SlashCommandBuilder()
    .setName('forcecheck')
    .setDescription('Force a standings refresh for every league, even if unchanged'),
  new SlashCommandBuilder()
    .setName('schedule')
    .setDescription('Schedule a match')
    .addStringOption((o) => o.setName('league').setDescription('League').setRequired(true).setAutocomplete(true))
    .addStringOption((o) => o.setName('team').setDescription('Your team').setRequired(true).setAutocomplete(true))
    .addStringOption((o) => o.setName('opponent').setDescription('Opponent').setRequired(true).setAutocomplete(true))
    .addStringOption((o) => o.setName('date').setDescription('Date as M/D, e.g. 1/14').setRequired(true))
    .addStringOption((o) => o.setName('time').setDescription('Time as H:MMam/pm, e.g. 9:30pm').setRequired(true)),
  new SlashCommandBuilder()
    .setName('cancelmatch')
    .setDescription('Cancel a scheduled match by ID')
    .addStringOption((o) => o.setName('match_id').setDescription('Match ID, e.g. A1B2C3').setRequired(true)),
  new SlashCommandBuilder()
    .setName('matches')
    .setDescription('List upcoming matches')
    .addStringOption((o) => o.setName('league').setDescription('League').setAutocomplete(true)),
  new SlashCommandBuilder()
    .setName('postmatches')
    .setDescription('Post or update the schedule board for every league'),
  new SlashCommandBuilder()
    .setName('setweek')
    .setDescription('Set the current week for a league')
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .addStringOption((o) => o.setName('league').setDescription('League').setRequired(true).setAutocomplete(true))
    .addIntegerOption((o) => o.setName('week').setDescription('Week number').setRequired(true).setMinValue(1)),
  new SlashCommandBuilder()
    .setName('admin_setchannel')
    .setDescription('Bind a channel for standings, schedules, logs or announcements')
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .addStringOption((o) =>
      o.setName('target').setDescription('standings:<league>, schedule:<league>, logs or announcements').setRequired(true).setAutocomplete(true)
    )
    .addChannelOption((o) =>
      o
        .setName('channel')
        .setDescription('Channel')
        .setRequired(true)
        .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
    ),
  new SlashCommandBuilder()
    .setName('admin_reminders')
    .setDescription('Turn match reminders on or off')
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .addBooleanOption((o) => o.setName('enabled').setDescription('Send reminders').setRequired(true)),
  new SlashCommandBuilder()
    .setName('admin_status')
    .setDescription('Show the current channel configuration')
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild),
  new SlashCommandBuilder().setName('help').setDescription('List all bot commands'),
];

/**
 * "/name — description" lines, sorted by name
 */
export function helpLines(): string[] {
  return COMMANDS.map((c) => ({ name: c.name, description: c.description }))
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((c) => `**/${c.name}** — ${c.description}`);
}
