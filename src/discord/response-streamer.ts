import { MessageFlags } from 'discord.js';
import type { MessageMentionOptions } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import {
  appendAnnotation,
  errorAnnotation,
  isUnknownMessageError,
  renderSegment,
  segmentLimit,
  splitSegments,
} from './output-utils.js';
import type { RenderMode, RenderedMessage, SegmentPhase } from './output-utils.js';

export type EditPayload = RenderedMessage & { allowedMentions: MessageMentionOptions };
export type ReplyPayload = EditPayload & { flags: MessageFlags.SuppressNotifications };

/** The slice of a sent Discord message the streamer drives. */
export interface StreamedMessage {
  readonly id: string;
  edit(payload: EditPayload): Promise<unknown>;
  reply(payload: ReplyPayload): Promise<StreamedMessage>;
}

export interface ReplyTarget {
  reply(payload: ReplyPayload): Promise<StreamedMessage>;
}

export type StreamResponseOpts = {
  /** The message being answered; the first segment replies to it. */
  target: ReplyTarget;
  mode: RenderMode;
  editIntervalMs: number;
  /** Shown on the first embed. Ignored in plain mode. */
  warnings?: readonly string[];
  /** Aborting stops consumption; text already shown is kept. */
  signal?: AbortSignal;
  log?: LoggerLike;
  /** Called once per outgoing message, right after it is sent. */
  onMessageSent?: (message: StreamedMessage) => void;
  describeError?: (err: unknown) => string;
};

export type StreamResult = {
  /** Every delta consumed, in order. */
  text: string;
  /** `text` as it was split across messages. */
  segments: string[];
  messageIds: string[];
  completed: boolean;
  aborted: boolean;
  error?: string;
};

type Sent = { message: StreamedMessage; key: string };

function defaultDescribeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Stream `deltas` into Discord replies. The first delta is sent right away;
 * later ones are batched into at most one flush per `editIntervalMs`. Text
 * past a message's limit continues in a reply to the previous segment.
 */
export async function streamResponse(
  deltas: AsyncIterable<string>,
  opts: StreamResponseOpts,
): Promise<StreamResult> {
  const { target, mode, log } = opts;
  const limit = segmentLimit(mode);
  const describeError = opts.describeError ?? defaultDescribeError;

  let text = '';
  let completed = false;
  let aborted = false;
  let gone = false;
  let error: string | undefined;
  const sent: Sent[] = [];
  let annotationSent = false;

  let stopNow: () => void = () => {};
  const stopped = new Promise<'stop'>((resolve) => {
    stopNow = () => resolve('stop');
  });
  const onAbort = () => {
    aborted = true;
    stopNow();
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  if (opts.signal?.aborted) onAbort();

  const markGone = (err: unknown) => {
    log?.info({ err }, 'streamer:reply message deleted, stopping');
    gone = true;
    stopNow();
  };

  const replyTo = (index: number): ReplyTarget => sent[index - 1]?.message ?? target;

  // Returns false when the stream cannot continue (message gone or send failed).
  const send = async (index: number, rendered: RenderedMessage, key: string): Promise<boolean> => {
    try {
      const message = await replyTo(index).reply({
        ...rendered,
        allowedMentions: NO_MENTIONS,
        flags: MessageFlags.SuppressNotifications,
      });
      sent.push({ message, key });
      opts.onMessageSent?.(message);
      return true;
    } catch (err) {
      if (isUnknownMessageError(err)) markGone(err);
      else log?.warn({ err, segment: index }, 'streamer:send failed');
      return false;
    }
  };

  const reconcile = async (phase: SegmentPhase, annotation?: string): Promise<void> => {
    if (gone) return;
    const segments = splitSegments(text, limit);
    let separateAnnotation = annotation;

    for (let i = 0; i < segments.length; i++) {
      const isLast = i === segments.length - 1;
      const segPhase: SegmentPhase = isLast ? phase : 'final';
      let body = segments[i] ?? '';
      if (isLast && annotation) {
        const combined = appendAnnotation(body, annotation, mode);
        if (combined !== null) {
          body = combined;
          separateAnnotation = undefined;
        }
      }
      if (isLast && !body && phase === 'streaming') return;

      const key = JSON.stringify([segPhase, body]);
      const rendered = renderSegment(body, {
        mode,
        phase: segPhase,
        warnings: i === 0 ? opts.warnings : undefined,
      });

      const existing = sent[i];
      if (!existing) {
        if (!(await send(i, rendered, key))) return;
        continue;
      }
      if (existing.key === key) continue;
      try {
        await existing.message.edit({ ...rendered, allowedMentions: NO_MENTIONS });
        existing.key = key;
      } catch (err) {
        if (isUnknownMessageError(err)) {
          markGone(err);
          return;
        }
        log?.warn({ err, segment: i }, 'streamer:edit failed');
      }
    }

    if (separateAnnotation && !annotationSent) {
      const index = sent.length;
      annotationSent = await send(index, renderSegment(separateAnnotation, { mode, phase: 'error' }), 'annotation');
    }
  };

  // Single serialized flush path shared by the first send and the timer.
  let chain: Promise<void> = Promise.resolve();
  let open = true;
  let dirty = false;
  let queued = false;
  // Spacing is measured from the last flush, not from the timer's phase.
  let lastFlushAt = Number.NEGATIVE_INFINITY;
  const scheduleFlush = () => {
    if (!open || queued) return;
    queued = true;
    chain = chain.then(async () => {
      queued = false;
      if (!open || !dirty) return;
      if (Date.now() - lastFlushAt < opts.editIntervalMs) return;
      dirty = false;
      lastFlushAt = Date.now();
      await reconcile('streaming');
    });
  };
  const timer = setInterval(scheduleFlush, opts.editIntervalMs);

  const iterator = deltas[Symbol.asyncIterator]();
  try {
    while (true) {
      const pending = iterator.next();
      const next = await Promise.race([pending, stopped]);
      if (next === 'stop') {
        void pending.catch((err: unknown) => log?.debug({ err }, 'streamer:upstream failed after stop'));
        void iterator.return?.().catch((err: unknown) => log?.debug({ err }, 'streamer:upstream release failed'));
        break;
      }
      if (next.done) {
        completed = true;
        break;
      }
      if (!next.value) continue;
      const first = text.length === 0;
      text += next.value;
      dirty = true;
      if (first) scheduleFlush();
    }
  } catch (err) {
    if (!aborted) {
      error = describeError(err);
      log?.warn({ err, chars: text.length }, 'streamer:upstream failed');
    }
  } finally {
    open = false;
    clearInterval(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }

  await chain;
  if (error !== undefined) {
    await reconcile('error', errorAnnotation(error));
  } else if (completed || sent.length > 0) {
    await reconcile('final');
  }

  return {
    text,
    segments: text ? splitSegments(text, limit) : [],
    messageIds: sent.map((s) => s.message.id),
    completed,
    aborted: aborted || gone,
    ...(error !== undefined ? { error } : {}),
  };
}
