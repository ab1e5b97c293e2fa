import { Colors, EmbedBuilder, RESTJSONErrorCodes } from 'discord.js';

export type RenderMode = 'embed' | 'plain';

/** Where a segment is in its life: still growing, done, or ended by an error. */
export type SegmentPhase = 'streaming' | 'final' | 'error';

/** Appended to the last embed while output is still arriving. */
export const STREAMING_INDICATOR = ' ⚪';

export const EMBED_DESCRIPTION_LIMIT = 4096;
export const PLAIN_MESSAGE_LIMIT = 2000;

export const WARNINGS_FIELD_NAME = '⚠️ Warnings';

/** Shown when a reply finished without any text. */
export const EMPTY_RESPONSE_PLACEHOLDER = '*(no response)*';

/** Hard cap for the text of a single message in `mode`. */
export function messageLimit(mode: RenderMode): number {
  return mode === 'embed' ? EMBED_DESCRIPTION_LIMIT : PLAIN_MESSAGE_LIMIT;
}

/**
 * How much reply text fits in one segment. Embeds reserve room for the
 * streaming indicator so a growing segment never has to shrink.
 */
export function segmentLimit(mode: RenderMode): number {
  return mode === 'embed' ? EMBED_DESCRIPTION_LIMIT - STREAMING_INDICATOR.length : PLAIN_MESSAGE_LIMIT;
}

/** Cut `text` into segments of at most `limit` characters. Joining them gives `text` back. */
export function splitSegments(text: string, limit: number): string[] {
  const segments: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    // Never leave half of a surrogate pair at the end of a segment.
    const code = rest.charCodeAt(limit - 1);
    const cut = limit > 1 && code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit;
    segments.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  segments.push(rest);
  return segments;
}

export type RenderedMessage = {
  content?: string;
  embeds?: EmbedBuilder[];
};

const PHASE_COLORS: Record<SegmentPhase, number> = {
  streaming: Colors.Orange,
  final: Colors.DarkGreen,
  error: Colors.Red,
};

export type RenderOpts = {
  mode: RenderMode;
  phase: SegmentPhase;
  /** Embed mode only. */
  warnings?: readonly string[];
};

export function renderSegment(text: string, opts: RenderOpts): RenderedMessage {
  if (opts.mode === 'plain') {
    return { content: text || EMPTY_RESPONSE_PLACEHOLDER };
  }

  const description = opts.phase === 'streaming' ? text + STREAMING_INDICATOR : text || EMPTY_RESPONSE_PLACEHOLDER;
  const embed = new EmbedBuilder().setDescription(description).setColor(PHASE_COLORS[opts.phase]);
  if (opts.warnings && opts.warnings.length > 0) {
    embed.addFields({ name: WARNINGS_FIELD_NAME, value: opts.warnings.join('\n') });
  }
  return { embeds: [embed] };
}

/** Text shown for a failure, either appended to the reply or posted on its own. */
export function errorAnnotation(message: string): string {
  return `⚠️ ${message}`;
}

/** Append `annotation` after the reply text when both fit in one message. */
export function appendAnnotation(text: string, annotation: string, mode: RenderMode): string | null {
  const combined = text ? `${text}\n\n${annotation}` : annotation;
  return combined.length <= messageLimit(mode) ? combined : null;
}

/** True when Discord reports the message no longer exists (deleted mid-stream). */
export function isUnknownMessageError(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === RESTJSONErrorCodes.UnknownMessage
  );
}
