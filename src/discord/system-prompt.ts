import type { ScopeRecord } from '../store/scope-store.js';

export type SystemPromptContext = {
  now: Date;
  /** Null in DMs. */
  serverName: string | null;
  scope: ScopeRecord;
  /** User authors in the conversation, oldest first. */
  userIds: readonly string[];
  isDm: boolean;
  /** IANA zone for `{date}` and `{time}`. Defaults to the host zone. */
  timeZone?: string;
};

type DateParts = { date: string; time: string };

function pick(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  return parts.find((p) => p.type === type)?.value ?? '';
}

// "GMT+05:30" -> "+0530"; plain "GMT" is UTC.
function compactOffset(longOffset: string): string {
  const match = longOffset.match(/^GMT([+-])(\d{2}):?(\d{2})?$/);
  if (!match) return '+0000';
  return `${match[1]}${match[2]}${match[3] ?? '00'}`;
}

/** `{date}` as "October 18 2026", `{time}` as "14:05:09 UTC+0000". */
export function formatPromptDate(now: Date, timeZone?: string): DateParts {
  const base = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  }).formatToParts(now);
  const offset = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'longOffset' }).formatToParts(now);

  return {
    date: `${pick(base, 'month')} ${pick(base, 'day')} ${pick(base, 'year')}`,
    time: `${pick(base, 'hour')}:${pick(base, 'minute')}:${pick(base, 'second')} ${pick(base, 'timeZoneName')}${compactOffset(pick(offset, 'timeZoneName'))}`,
  };
}

export function buildSystemPrompt(base: string, ctx: SystemPromptContext): string {
  const { date, time } = formatPromptDate(ctx.now, ctx.timeZone);
  let prompt = base.replaceAll('{date}', date).replaceAll('{time}', time).trim();

  if (ctx.serverName) {
    prompt += `\n\nCurrent server: ${ctx.serverName}`;
  }

  const known: string[] = [];
  for (const userId of ctx.userIds) {
    const profile = ctx.scope.users[userId];
    if (!profile?.description) continue;
    known.push(
      ctx.isDm
        ? `- ${profile.displayName}: ${profile.description}`
        : `- <@${userId}> (Display: ${profile.displayName}): ${profile.description}`,
    );
  }
  if (known.length > 0) {
    prompt += `\n\nKnown users in this conversation:\n${known.join('\n')}`;
    prompt += '\n\nWhen addressing users, use their display names naturally in conversation.';
  }

  return prompt;
}
