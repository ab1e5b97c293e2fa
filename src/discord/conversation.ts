import type { Limits } from '../config.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ConversationTurn, ImageData, TurnRole } from '../runtime/types.js';
import type { MessageNodeCache } from './message-node-cache.js';
import { resolveNode } from './message-nodes.js';
import type { MessageNode, NodeResolverDeps, ParentLink } from './message-nodes.js';
import type { SourceMessage } from './message-source.js';

export type ConversationLimits = Pick<Limits, 'maxText' | 'maxImages' | 'maxMessages'>;

export type ConversationDeps = {
  cache: MessageNodeCache<MessageNode>;
  nodes: NodeResolverDeps;
  limits: ConversationLimits;
  log?: LoggerLike;
};

export type ResolvedConversation = {
  /** Oldest first. */
  turns: ConversationTurn[];
  truncated: boolean;
  /** User-facing notices, sorted. */
  warnings: string[];
  /** Authors of user turns, oldest first, without duplicates. */
  userIds: string[];
};

type DraftTurn = {
  role: TurnRole;
  authorId: string;
  authorName: string;
  texts: string[];
  images: ImageData[];
};

export function onlyUsingLastWarning(count: number): string {
  return `⚠️ Only using last ${count} message${count === 1 ? '' : 's'}`;
}

function loadNode(deps: ConversationDeps, link: ParentLink): Promise<MessageNode> {
  return deps.cache.getOrResolve(link.id, async () => {
    const msg = link.message ?? (await deps.nodes.source.fetchMessage(link.channelId, link.id));
    return resolveNode(msg, deps.nodes);
  });
}

/**
 * Walk the chain backward from `trigger` and assemble a bounded, oldest-first
 * conversation. Fetch failures part-way up end the walk with what was
 * gathered so far.
 */
export async function resolveConversation(
  trigger: SourceMessage,
  deps: ConversationDeps,
): Promise<ResolvedConversation> {
  const { limits, log } = deps;
  const warnings = new Set<string>();
  let truncated = false;

  const drafts: DraftTurn[] = [];
  const seen = new Set<string>();
  let node: MessageNode | null = await deps.cache.getOrResolve(trigger.id, () => resolveNode(trigger, deps.nodes));

  const noteNode = (n: MessageNode) => {
    seen.add(n.id);
    if (n.hasBadAttachments) warnings.add('⚠️ Unsupported attachments');
    if (n.droppedImages > 0 || n.droppedUrls > 0) truncated = true;
    if (n.droppedImages > 0) warnings.add(`⚠️ Max ${limits.maxImages} images per message`);
  };

  // Follows `link` unless the walk must stop there. Null ends the walk.
  const follow = async (from: MessageNode, link: ParentLink): Promise<MessageNode | null> => {
    if (seen.has(link.id)) {
      log?.warn({ messageId: from.id, parentId: link.id }, 'conversation:cycle in chain');
      return null;
    }
    try {
      return await loadNode(deps, link);
    } catch (err) {
      log?.warn({ err, messageId: from.id, parentId: link.id, kind: link.kind }, 'conversation:parent fetch failed');
      truncated = true;
      warnings.add(onlyUsingLastWarning(drafts.length));
      return null;
    }
  };

  while (node) {
    noteNode(node);
    const draft: DraftTurn = {
      role: node.role,
      authorId: node.authorId,
      authorName: node.authorDisplayName,
      texts: [node.text],
      images: [...node.images],
    };
    drafts.push(draft);

    // Same-author bursts fold into the turn they continue.
    let tail: MessageNode = node;
    let stopped = false;
    while (tail.parent?.kind === 'continuation') {
      const prev = await follow(tail, tail.parent);
      if (!prev) {
        stopped = true;
        break;
      }
      noteNode(prev);
      draft.texts.unshift(prev.text);
      draft.images.unshift(...prev.images);
      tail = prev;
    }
    if (stopped) break;

    if (tail.fetchParentFailed) {
      truncated = true;
      warnings.add(onlyUsingLastWarning(drafts.length));
      break;
    }
    if (!tail.parent) break;
    if (drafts.length >= limits.maxMessages) {
      truncated = true;
      warnings.add(onlyUsingLastWarning(drafts.length));
      break;
    }
    node = await follow(tail, tail.parent);
  }

  // Budgets, newest first: recent turns keep their images and text.
  let imageBudget = limits.maxImages;
  let textBudget = limits.maxText;
  const turns: ConversationTurn[] = [];
  for (const draft of drafts) {
    let images = draft.images;
    if (images.length > imageBudget) {
      images = images.slice(0, imageBudget);
      truncated = true;
      warnings.add(`⚠️ Max ${limits.maxImages} images per message`);
    }
    imageBudget -= images.length;

    let text = draft.texts.filter(Boolean).join('\n');
    if (text.length > textBudget) {
      text = textBudget > 0 ? text.slice(text.length - textBudget) : '';
      truncated = true;
      warnings.add(`⚠️ Max ${limits.maxText.toLocaleString('en-US')} characters per message`);
    }
    textBudget -= text.length;

    if (!text && images.length === 0) continue;
    turns.push({
      role: draft.role,
      text,
      images,
      ...(draft.role === 'user' ? { authorId: draft.authorId, authorName: draft.authorName } : {}),
    });
  }
  turns.reverse();

  const userIds: string[] = [];
  for (const turn of turns) {
    if (turn.authorId && !userIds.includes(turn.authorId)) userIds.push(turn.authorId);
  }

  return { turns, truncated, warnings: [...warnings].sort(), userIds };
}
