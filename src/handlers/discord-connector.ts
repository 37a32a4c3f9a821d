/**
 * Discord Connector
 *
 * MessagingConnector backed by a discord.js client. Only guild text and
 * announcement channels are used as destinations.
 */

import {
  ChannelType,
  Client,
  EmbedBuilder,
  MessageMentionOptions,
  NewsChannel,
  TextChannel,
} from 'discord.js';
import { MessageRef, MessagingConnector, OutboundMessage, RoleRef } from '../models/messaging';
import { NotFoundError } from '../models/errors';

type PostableChannel = TextChannel | NewsChannel;

/**
 * Message body accepted by both send and edit
 */
export interface DiscordMessageBody {
  content: string;
  embeds: EmbedBuilder[];
  allowedMentions: MessageMentionOptions;
}

/**
 * discord.js message body for an outbound message
 */
export function toMessageOptions(message: OutboundMessage): DiscordMessageBody {
  const options: DiscordMessageBody = {
    content: message.content ?? '',
    embeds: [],
    allowedMentions: { parse: ['roles', 'users'] },
  };

  if (message.embed) {
    const embed = new EmbedBuilder().setTitle(message.embed.title).setDescription(message.embed.description);
    if (message.embed.url) {
      embed.setURL(message.embed.url);
    }
    if (message.embed.color !== undefined) {
      embed.setColor(message.embed.color);
    }
    if (message.embed.footer) {
      embed.setFooter({ text: message.embed.footer });
    }
    if (message.embed.timestamp) {
      embed.setTimestamp(new Date(message.embed.timestamp));
    }
    options.embeds = [embed];
  }

  return options;
}

export class DiscordConnector implements MessagingConnector {
  constructor(private client: Client) {}

  async sendMessage(channelId: string, message: OutboundMessage): Promise<MessageRef> {
    const channel = await this.postableChannel(channelId);
    const sent = await channel.send(toMessageOptions(message));
    return { id: sent.id, channel_id: channel.id };
  }

  async fetchMessage(channelId: string, messageId: string): Promise<MessageRef> {
    const channel = await this.postableChannel(channelId);
    const found = await channel.messages.fetch(messageId);
    return { id: found.id, channel_id: channel.id };
  }

  async editMessage(ref: MessageRef, message: OutboundMessage): Promise<MessageRef> {
    const channel = await this.postableChannel(ref.channel_id);
    const found = await channel.messages.fetch(ref.id);
    const edited = await found.edit(toMessageOptions(message));
    return { id: edited.id, channel_id: channel.id };
  }

  async resolveChannel(channelId: string): Promise<boolean> {
    try {
      await this.postableChannel(channelId);
      return true;
    } catch {
      return false;
    }
  }

  async listRoles(tenantId: string): Promise<RoleRef[]> {
    const guild = await this.client.guilds.fetch(tenantId);
    const roles = await guild.roles.fetch();
    return roles.map((role) => ({ id: role.id, name: role.name }));
  }

  private async postableChannel(channelId: string): Promise<PostableChannel> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
      throw new NotFoundError(`Channel ${channelId} is not a text channel`);
    }
    return channel;
  }
}
