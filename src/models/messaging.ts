/**
 * Messaging Models
 *
 * Operations consumed from the messaging platform. The core only assumes
 * that a message has a stable id usable for later fetch/edit.
 */

/**
 * Rich card payload
 */
export interface EmbedPayload {
  title: string;
  description: string;
  url?: string;
  color?: number;
  footer?: string;
  timestamp?: string;        // ISO-8601
}

/**
 * Outbound message: plain content, a card, or both
 */
export interface OutboundMessage {
  content?: string;
  embed?: EmbedPayload;
}

/**
 * Reference to a posted message
 */
export interface MessageRef {
  id: string;
  channel_id: string;
}

/**
 * Tenant role
 */
export interface RoleRef {
  id: string;
  name: string;
}

/**
 * Messaging platform connector
 */
export interface MessagingConnector {
  sendMessage(channelId: string, message: OutboundMessage): Promise<MessageRef>;

  /**
   * @throws when the message no longer exists or cannot be read
   */
  fetchMessage(channelId: string, messageId: string): Promise<MessageRef>;

  editMessage(ref: MessageRef, message: OutboundMessage): Promise<MessageRef>;

  /**
   * @returns true when the channel exists and accepts text messages
   */
  resolveChannel(channelId: string): Promise<boolean>;

  listRoles(tenantId: string): Promise<RoleRef[]>;
}
