import { CompletionError } from '../runtime/types.js';

export function messageContentIntentHint(): string {
  return (
    'Discord is delivering empty message content. Enable Message Content Intent in the Discord Developer Portal ' +
    '(Application -> Bot -> Privileged Gateway Intents), then restart the bot.'
  );
}

function humanDuration(ms: number): string {
  return ms >= 60000 ? `${Math.round(ms / 60000)} min` : `${Math.round(ms / 1000)} sec`;
}

/** Short, user-facing text for a failed completion. Shown in the reply's error annotation. */
export function mapCompletionErrorToUserMessage(err: unknown): string {
  const msg = (err instanceof Error ? err.message : String(err ?? '')).trim();
  const status = err instanceof CompletionError ? err.status : null;
  const lc = msg.toLowerCase();

  if (lc.includes('stream stall')) {
    const msMatch = msg.match(/no output for (\d+)ms/i);
    if (msMatch?.[1]) {
      const ms = parseInt(msMatch[1], 10);
      return `Gemini stopped sending output (nothing for ${humanDuration(ms)}). Try again.`;
    }
    return 'Gemini stopped sending output. Try again.';
  }

  if (lc.includes('timed out')) {
    return 'Gemini did not respond in time. Try again in a moment.';
  }

  const blocked = msg.match(/^(Prompt|Response) blocked by Gemini \(([A-Z_]+)\)/);
  if (blocked) {
    return blocked[1] === 'Prompt'
      ? `Gemini refused this conversation (${blocked[2]}).`
      : `Gemini stopped the answer part-way (${blocked[2]}).`;
  }

  if (status === 429 || lc.includes('resource_exhausted') || lc.includes('quota')) {
    return 'Gemini rate limit or quota reached. Wait a moment and try again.';
  }

  if (status === 401 || status === 403 || lc.includes('api key not valid')) {
    return 'The Gemini API key was rejected. Check GEMINI_API_KEY and restart the bot.';
  }

  if (status === 404 || (lc.includes('models/') && lc.includes('not found'))) {
    return 'The selected model is not available. Pick another one with /model.';
  }

  if (lc.includes('exceeds the maximum number of tokens') || lc.includes('input token count')) {
    return 'The conversation is too long for the model. Start a new conversation or reply to a more recent message.';
  }

  if (lc.includes('missing permissions') || lc.includes('missing access')) {
    return (
      'Discord denied this action due to missing permissions/access. ' +
      'Update the bot role permissions in Server Settings -> Roles, then retry.'
    );
  }

  if (status !== null && status >= 500) {
    return `Gemini is having trouble right now (HTTP ${status}). Try again shortly.`;
  }

  if (!msg) {
    return 'An unexpected error occurred with no additional detail.';
  }

  return `Error: ${msg}`;
}
