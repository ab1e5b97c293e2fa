import { ChannelType, MessageType } from 'discord.js';
import type { Client, Message } from 'discord.js';
import type { AttachmentLike } from './image-download.js';

export type SourceMessageKind = 'default' | 'reply' | 'other';

export type MessagePointer = {
  channelId: string;
  messageId: string;
};

/**
 * Transport-agnostic view of a chat message, as the conversation resolver
 * needs it. Only this module maps discord.js `Message` objects into it.
 */
export type SourceMessage = {
  id: string;
  channelId: string;
  /** Null for direct messages. */
  guildId: string | null;
  /** Text body of the message. Empty string when not present. */
  content: string;
  authorId: string;
  /** Server nickname when present, else the account's display name. */
  authorDisplayName: string;
  isBot: boolean;
  kind: SourceMessageKind;
  /** Epoch ms. */
  createdAt: number;
  /** The replied-to message. */
  reference: MessagePointer | null;
  attachments: AttachmentLike[];
  embeds: { title?: string; description?: string }[];
  /**
   * Set when the message sits in a public thread under a text channel. The
   * starter message shares the thread's id and lives in the parent channel.
   */
  threadStart: MessagePointer | null;
};

export interface MessageSource {
  fetchMessage(channelId: string, messageId: string): Promise<SourceMessage>;
  /** The message immediately before `beforeId` in the channel, or null at the start. */
  fetchPrevious(channelId: string, beforeId: string): Promise<SourceMessage | null>;
}

function kindOf(type: MessageType): SourceMessageKind {
  if (type === MessageType.Default) return 'default';
  if (type === MessageType.Reply) return 'reply';
  return 'other';
}

function threadStartOf(msg: Message): MessagePointer | null {
  const channel = msg.channel;
  if (channel.type !== ChannelType.PublicThread) return null;
  if (channel.parent?.type !== ChannelType.GuildText || !channel.parentId) return null;
  return { channelId: channel.parentId, messageId: channel.id };
}

export function toSourceMessage(msg: Message): SourceMessage {
  const referenceId = msg.reference?.messageId;
  return {
    id: msg.id,
    channelId: msg.channelId,
    guildId: msg.guildId ?? null,
    content: msg.content,
    authorId: msg.author.id,
    authorDisplayName: msg.member?.displayName ?? msg.author.displayName,
    isBot: msg.author.bot,
    kind: kindOf(msg.type),
    createdAt: msg.createdTimestamp,
    reference: referenceId && msg.reference
      ? { channelId: msg.reference.channelId, messageId: referenceId }
      : null,
    attachments: [...msg.attachments.values()].map((a) => ({
      url: a.url,
      name: a.name,
      contentType: a.contentType,
      size: a.size,
    })),
    embeds: msg.embeds.map((e) => ({
      title: e.title ?? undefined,
      description: e.description ?? undefined,
    })),
    threadStart: threadStartOf(msg),
  };
}

/** Reads messages through the gateway client's REST-backed channel managers. */
export class DiscordMessageSource implements MessageSource {
  constructor(private readonly client: Client) {}

  async fetchMessage(channelId: string, messageId: string): Promise<SourceMessage> {
    const channel = await this.textChannel(channelId);
    return toSourceMessage(await channel.messages.fetch(messageId));
  }

  async fetchPrevious(channelId: string, beforeId: string): Promise<SourceMessage | null> {
    const channel = await this.textChannel(channelId);
    const page = await channel.messages.fetch({ before: beforeId, limit: 1 });
    const prev = page.first();
    return prev ? toSourceMessage(prev) : null;
  }

  private async textChannel(channelId: string) {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased()) {
      throw new Error(`Channel ${channelId} is not a text channel`);
    }
    return channel;
  }
}
