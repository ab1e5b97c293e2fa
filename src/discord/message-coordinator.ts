import { MessageFlags } from 'discord.js';
import type { Message } from 'discord.js';
import type { ConfigStore } from '../config.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { CompletionClient } from '../runtime/types.js';
import { scopeKeyFor } from '../store/scope-store.js';
import type { ScopeRecord, ScopeStore } from '../store/scope-store.js';
import type { AbortRegistry } from './abort-registry.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { evaluateAccess } from './allowlist.js';
import { resolveConversation } from './conversation.js';
import type { MessageNodeCache } from './message-node-cache.js';
import { mentionsBot } from './message-nodes.js';
import type { MessageNode } from './message-nodes.js';
import { toSourceMessage } from './message-source.js';
import type { MessageSource, SourceMessage } from './message-source.js';
import { streamResponse } from './response-streamer.js';
import type { ReplyPayload, ReplyTarget, StreamedMessage, StreamResult } from './response-streamer.js';
import { buildSystemPrompt } from './system-prompt.js';
import { mapCompletionErrorToUserMessage, messageContentIntentHint } from './user-errors.js';

const TYPING_INTERVAL_MS = 5_000;
/** Upper bound on how long a streamed reply may stay unfinished in the cache. */
const REPLY_RESERVATION_MS = 10 * 60_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A received message with everything the handler needs, detached from discord.js. */
export type IncomingMessage = {
  source: SourceMessage;
  authorIsBot: boolean;
  mentionsBot: boolean;
  roleIds: string[];
  /** The channel, its parent and its category, where present. */
  channelIds: string[];
  serverName: string | null;
  hasStickers: boolean;
  target: ReplyTarget;
  sendTyping: () => Promise<unknown>;
};

export type CoordinatorDeps = {
  botUserId: string;
  botDisplayName: string;
  config: ConfigStore;
  store: ScopeStore;
  cache: MessageNodeCache<MessageNode>;
  source: MessageSource;
  completion: CompletionClient;
  aborts: AbortRegistry;
  log?: LoggerLike;
  now?: () => Date;
  /** IANA zone for prompt dates. Defaults to the host zone. */
  timeZone?: string;
};

export type HandleOutcome =
  | { kind: 'ignored'; reason: string }
  | { kind: 'denied'; reason: string }
  | { kind: 'answered'; result: StreamResult };

// ---------------------------------------------------------------------------
// discord.js mapping
// ---------------------------------------------------------------------------

function channelIdsOf(msg: Message): string[] {
  const channel = msg.channel;
  const ids = [channel.id];
  if (channel.isDMBased()) return ids;
  if (channel.parentId) ids.push(channel.parentId);
  if (channel.isThread() && channel.parent?.parentId) ids.push(channel.parent.parentId);
  return ids;
}

export function toStreamedMessage(msg: Message): StreamedMessage {
  return {
    id: msg.id,
    edit: (payload) => msg.edit(payload),
    reply: async (payload: ReplyPayload) => toStreamedMessage(await msg.reply(payload)),
  };
}

export function toIncomingMessage(msg: Message, botUserId: string): IncomingMessage {
  const channel = msg.channel;
  return {
    source: toSourceMessage(msg),
    authorIsBot: msg.author.bot,
    mentionsBot: msg.mentions.users.has(botUserId) || mentionsBot(msg.content, botUserId),
    roleIds: msg.member ? [...msg.member.roles.cache.keys()] : [],
    channelIds: channelIdsOf(msg),
    serverName: msg.guild?.name ?? null,
    hasStickers: msg.stickers.size > 0,
    target: { reply: async (payload) => toStreamedMessage(await msg.reply(payload)) },
    sendTyping: () => ('sendTyping' in channel ? channel.sendTyping() : Promise.resolve()),
  };
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

function replyNode(id: string, trigger: SourceMessage, text: string, deps: CoordinatorDeps): MessageNode {
  return {
    id,
    channelId: trigger.channelId,
    authorId: deps.botUserId,
    authorDisplayName: deps.botDisplayName,
    role: 'assistant',
    text,
    images: [],
    parent: { id: trigger.id, channelId: trigger.channelId, kind: 'reply', message: trigger },
    fetchedAt: Date.now(),
    hasBadAttachments: false,
    droppedImages: 0,
    droppedUrls: 0,
    fetchParentFailed: false,
  };
}

async function loadScope(scopeKey: string, msg: SourceMessage, deps: CoordinatorDeps): Promise<ScopeRecord> {
  try {
    await deps.store.touchUser(scopeKey, msg.authorId, msg.authorDisplayName);
  } catch (err) {
    deps.log?.warn({ err, scopeKey, userId: msg.authorId }, 'coordinator:user profile update failed');
  }
  return deps.store.load(scopeKey);
}

/** Answer one message. Each call is independent; failures stay inside it. */
export async function handleIncomingMessage(incoming: IncomingMessage, deps: CoordinatorDeps): Promise<HandleOutcome> {
  const msg = incoming.source;
  const log = deps.log;
  const config = deps.config.current;
  const isDm = msg.guildId == null;

  if (incoming.authorIsBot) return { kind: 'ignored', reason: 'bot author' };
  if (!isDm && !incoming.mentionsBot) return { kind: 'ignored', reason: 'not mentioned' };

  const access = evaluateAccess(
    { userId: msg.authorId, roleIds: incoming.roleIds, channelIds: incoming.channelIds, isDm },
    config.permissions,
    { allowDms: config.allowDms },
  );
  if (!access.allowed) {
    log?.debug({ messageId: msg.id, userId: msg.authorId, reason: access.reason }, 'coordinator:request denied');
    return { kind: 'denied', reason: access.reason };
  }

  // Mentioned, yet nothing came through: the privileged intent is off.
  if (
    !isDm &&
    !msg.content &&
    msg.attachments.length === 0 &&
    msg.embeds.length === 0 &&
    !incoming.hasStickers
  ) {
    log?.warn(
      { channelId: msg.channelId, authorId: msg.authorId },
      'coordinator:empty content on a mention; is Message Content Intent enabled?',
    );
    await incoming.target.reply({
      content: messageContentIntentHint(),
      allowedMentions: NO_MENTIONS,
      flags: MessageFlags.SuppressNotifications,
    });
    return { kind: 'ignored', reason: 'empty content' };
  }

  const scopeKey = scopeKeyFor({ guildId: msg.guildId, userId: msg.authorId });
  const scope = await loadScope(scopeKey, msg, deps);

  const conversation = await resolveConversation(msg, {
    cache: deps.cache,
    nodes: {
      source: deps.source,
      botUserId: deps.botUserId,
      maxImages: config.limits.maxImages,
      maxUrls: config.limits.maxUrls,
      continuationWindowMs: config.continuationWindowMs,
      downloadTimeoutMs: config.requestTimeoutMs,
      log,
    },
    limits: config.limits,
    log,
  });
  if (conversation.turns.length === 0) {
    return { kind: 'ignored', reason: 'nothing to answer' };
  }

  const systemPrompt = buildSystemPrompt(scope.systemPrompt ?? config.defaultSystemPrompt, {
    now: (deps.now ?? (() => new Date()))(),
    serverName: incoming.serverName,
    scope,
    userIds: conversation.userIds,
    isDm,
    timeZone: deps.timeZone,
  });

  log?.info(
    {
      messageId: msg.id,
      scopeKey,
      model: scope.model,
      turns: conversation.turns.length,
      truncated: conversation.truncated,
    },
    'coordinator:answering',
  );

  const handle = deps.aborts.register(msg.id);
  const reserved: string[] = [];
  const typing = () => {
    incoming.sendTyping().catch((err: unknown) => log?.debug({ err }, 'coordinator:typing failed'));
  };
  typing();
  const typingTimer = setInterval(typing, TYPING_INTERVAL_MS);

  try {
    const deltas = deps.completion.streamComplete({
      model: scope.model,
      systemPrompt,
      turns: conversation.turns,
      grounding: config.enableSearchGrounding,
      generation: config.generation,
      signal: handle.signal,
    });
    const result = await streamResponse(deltas, {
      target: incoming.target,
      mode: config.usePlainResponses ? 'plain' : 'embed',
      editIntervalMs: config.editIntervalMs,
      warnings: conversation.warnings,
      signal: handle.signal,
      log,
      describeError: mapCompletionErrorToUserMessage,
      onMessageSent: (sent) => {
        clearInterval(typingTimer);
        handle.track(sent.id);
        deps.cache.reserve(sent.id, REPLY_RESERVATION_MS);
        reserved.push(sent.id);
      },
    });

    // Every reply segment carries the full answer, parented to the trigger.
    for (const id of reserved.splice(0)) {
      deps.cache.complete(id, replyNode(id, msg, result.text, deps));
    }

    log?.info(
      {
        messageId: msg.id,
        replies: result.messageIds.length,
        chars: result.text.length,
        completed: result.completed,
        aborted: result.aborted,
        error: result.error,
      },
      'coordinator:answered',
    );
    return { kind: 'answered', result };
  } finally {
    clearInterval(typingTimer);
    handle.dispose();
    for (const id of reserved) deps.cache.delete(id);
  }
}

/** The `messageCreate` listener. Never throws. */
export function createMessageCreateHandler(deps: CoordinatorDeps): (msg: Message) => Promise<void> {
  return async (msg) => {
    try {
      await handleIncomingMessage(toIncomingMessage(msg, deps.botUserId), deps);
    } catch (err) {
      deps.log?.error({ err, messageId: msg.id, channelId: msg.channelId }, 'coordinator:message handling failed');
    }
  };
}
