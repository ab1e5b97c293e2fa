import type { LoggerLike } from '../logging/logger-like.js';
import type { ImageData, TurnRole } from '../runtime/types.js';
import {
  downloadAttachment,
  downloadImageUrl,
  extractImageUrls,
  resolveMediaType,
} from './image-download.js';
import type { DownloadOptions, DownloadOutcome, AttachmentLike } from './image-download.js';
import type { MessageSource, SourceMessage } from './message-source.js';

export type ParentKind = 'reply' | 'thread-start' | 'continuation' | 'dm-continuation';

export type ParentLink = {
  id: string;
  channelId: string;
  kind: ParentKind;
  /** Already fetched while selecting the parent. */
  message?: SourceMessage;
};

export type MessageNode = {
  id: string;
  channelId: string;
  authorId: string;
  authorDisplayName: string;
  role: TurnRole;
  /** Bot mention removed, embed title/description appended. */
  text: string;
  images: ImageData[];
  parent: ParentLink | null;
  fetchedAt: number;
  hasBadAttachments: boolean;
  /** Supported images past the per-message image cap. */
  droppedImages: number;
  /** Image links not fetched because of the link or image cap. */
  droppedUrls: number;
  /** Looking up the previous channel message failed. */
  fetchParentFailed: boolean;
};

export type NodeResolverDeps = {
  source: MessageSource;
  botUserId: string;
  maxImages: number;
  maxUrls: number;
  continuationWindowMs: number;
  downloadTimeoutMs: number;
  log?: LoggerLike;
  now?: () => number;
  /** Test seams; default to the image-download implementations. */
  downloadAttachment?: (a: AttachmentLike, mediaType: string, opts: DownloadOptions) => Promise<DownloadOutcome>;
  downloadImageUrl?: (url: string, opts: DownloadOptions) => Promise<DownloadOutcome>;
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function mentionPattern(botUserId: string): RegExp {
  return new RegExp(`<@!?${escapeRegExp(botUserId)}>`, 'g');
}

export function mentionsBot(content: string, botUserId: string): boolean {
  return mentionPattern(botUserId).test(content);
}

/** Message text as the model sees it: bot mentions removed, embeds appended. */
export function cleanText(msg: SourceMessage, botUserId: string): string {
  const content = msg.content.replace(mentionPattern(botUserId), '').trim();
  const embedTexts = msg.embeds
    .map((e) => [e.title, e.description].filter(Boolean).join('\n'))
    .filter(Boolean);
  return [content, ...embedTexts].filter(Boolean).join('\n');
}

async function selectParent(
  msg: SourceMessage,
  deps: NodeResolverDeps,
): Promise<{ parent: ParentLink | null; failed: boolean }> {
  if (msg.reference) {
    return {
      parent: { id: msg.reference.messageId, channelId: msg.reference.channelId, kind: 'reply' },
      failed: false,
    };
  }

  const isDm = msg.guildId == null;
  if (!mentionsBot(msg.content, deps.botUserId)) {
    let prev: SourceMessage | null;
    try {
      prev = await deps.source.fetchPrevious(msg.channelId, msg.id);
    } catch (err) {
      deps.log?.warn({ err, messageId: msg.id, channelId: msg.channelId }, 'nodes:previous message lookup failed');
      return { parent: null, failed: true };
    }

    if (prev && prev.kind !== 'other') {
      if (isDm && prev.authorId === deps.botUserId) {
        return { parent: { id: prev.id, channelId: prev.channelId, kind: 'dm-continuation', message: prev }, failed: false };
      }
      if (
        !isDm &&
        prev.authorId === msg.authorId &&
        msg.createdAt - prev.createdAt <= deps.continuationWindowMs
      ) {
        return { parent: { id: prev.id, channelId: prev.channelId, kind: 'continuation', message: prev }, failed: false };
      }
    }
  }

  if (msg.threadStart) {
    return {
      parent: { id: msg.threadStart.messageId, channelId: msg.threadStart.channelId, kind: 'thread-start' },
      failed: false,
    };
  }

  return { parent: null, failed: false };
}

async function collectImages(
  msg: SourceMessage,
  text: string,
  deps: NodeResolverDeps,
): Promise<{ images: ImageData[]; hasBadAttachments: boolean; droppedImages: number; droppedUrls: number }> {
  const opts: DownloadOptions = { timeoutMs: deps.downloadTimeoutMs };
  const fetchAttachment = deps.downloadAttachment ?? downloadAttachment;
  const fetchUrl = deps.downloadImageUrl ?? downloadImageUrl;

  const candidates: Array<{ attachment: AttachmentLike; mediaType: string }> = [];
  for (const attachment of msg.attachments) {
    const mediaType = resolveMediaType(attachment);
    if (mediaType) candidates.push({ attachment, mediaType });
  }
  const hasBadAttachments = msg.attachments.length > candidates.length;

  const fromAttachments = candidates.slice(0, deps.maxImages);
  const allUrls = extractImageUrls(text, Number.MAX_SAFE_INTEGER);
  const urls = allUrls.slice(0, Math.min(deps.maxUrls, Math.max(0, deps.maxImages - fromAttachments.length)));

  const outcomes = await Promise.all([
    ...fromAttachments.map(({ attachment, mediaType }) => fetchAttachment(attachment, mediaType, opts)),
    ...urls.map((url) => fetchUrl(url, opts)),
  ]);

  const images: ImageData[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      images.push(outcome.image);
    } else {
      deps.log?.warn({ messageId: msg.id, error: outcome.error }, 'nodes:image skipped');
    }
  }

  return {
    images,
    hasBadAttachments,
    droppedImages: candidates.length - fromAttachments.length,
    droppedUrls: allUrls.length - urls.length,
  };
}

/** Turn a fetched message into a node: text, images and its parent link. */
export async function resolveNode(msg: SourceMessage, deps: NodeResolverDeps): Promise<MessageNode> {
  const text = cleanText(msg, deps.botUserId);
  const [imageResult, parentResult] = await Promise.all([
    collectImages(msg, text, deps),
    selectParent(msg, deps),
  ]);

  return {
    id: msg.id,
    channelId: msg.channelId,
    authorId: msg.authorId,
    authorDisplayName: msg.authorDisplayName,
    role: msg.authorId === deps.botUserId ? 'assistant' : 'user',
    text,
    images: imageResult.images,
    parent: parentResult.parent,
    fetchedAt: (deps.now ?? Date.now)(),
    hasBadAttachments: imageResult.hasBadAttachments,
    droppedImages: imageResult.droppedImages,
    droppedUrls: imageResult.droppedUrls,
    fetchParentFailed: parentResult.failed,
  };
}
