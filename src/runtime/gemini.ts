import { z } from 'zod';
import type { LoggerLike } from '../logging/logger-like.js';
import { CompletionError } from './types.js';
import type { CompletionClient, CompletionRequest, ConversationTurn } from './types.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

const HARM_CATEGORIES = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const;

/** Finish reasons that mean the answer was withheld. */
const BLOCKING_FINISH_REASONS = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'RECITATION']);

export type GeminiClientOpts = {
  apiKey: string;
  baseUrl?: string;
  /** Longest wait for response headers. */
  requestTimeoutMs?: number;
  /** Longest gap between streamed chunks. */
  stallTimeoutMs?: number;
  log?: LoggerLike;
};

type Part = { text: string } | { inline_data: { mime_type: string; data: string } };

export type GeminiRequestBody = {
  system_instruction?: { parts: Array<{ text: string }> };
  contents: Array<{ role: 'user' | 'model'; parts: Part[] }>;
  generationConfig: { temperature: number; topP: number; topK: number; maxOutputTokens: number };
  safetySettings: Array<{ category: string; threshold: 'BLOCK_NONE' }>;
  tools?: Array<{ google_search: Record<string, never> }>;
};

const ChunkSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

const ErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

function turnParts(turn: ConversationTurn): Part[] {
  const parts: Part[] = [];
  if (turn.text) {
    const text = turn.role === 'user' && turn.authorName ? `${turn.authorName}: ${turn.text}` : turn.text;
    parts.push({ text });
  }
  for (const image of turn.images) {
    parts.push({ inline_data: { mime_type: image.mediaType, data: image.base64 } });
  }
  return parts;
}

export function buildRequestBody(req: CompletionRequest): GeminiRequestBody {
  const body: GeminiRequestBody = {
    contents: req.turns
      .map((turn) => ({ role: turn.role === 'assistant' ? ('model' as const) : ('user' as const), parts: turnParts(turn) }))
      .filter((c) => c.parts.length > 0),
    generationConfig: {
      temperature: req.generation.temperature,
      topP: req.generation.topP,
      topK: req.generation.topK,
      maxOutputTokens: req.generation.maxOutputTokens,
    },
    safetySettings: HARM_CATEGORIES.map((category) => ({ category, threshold: 'BLOCK_NONE' as const })),
  };
  if (req.systemPrompt.trim()) {
    body.system_instruction = { parts: [{ text: req.systemPrompt }] };
  }
  if (req.grounding) {
    body.tools = [{ google_search: {} }];
  }
  return body;
}

/** Extract the data payload from an SSE line, or undefined if not a data line. */
export function parseSSEData(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith(':')) return undefined;
  if (trimmed.startsWith('data: ')) return trimmed.slice('data: '.length);
  if (trimmed.startsWith('data:')) return trimmed.slice('data:'.length);
  return undefined;
}

export type ChunkResult = {
  texts: string[];
  /** Set when the candidate finished because the answer was withheld. */
  blockedReason?: string;
};

/** Text deltas carried by one SSE payload. Throws when the payload reports a blocked prompt or an error. */
export function parseChunk(data: string): ChunkResult {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    throw new CompletionError('Gemini returned a malformed stream chunk');
  }
  const parsed = ChunkSchema.safeParse(json);
  if (!parsed.success) {
    throw new CompletionError('Gemini returned an unexpected stream chunk');
  }
  const chunk = parsed.data;

  if (chunk.error) {
    throw new CompletionError(`Gemini API error: ${chunk.error.message ?? 'unknown error'}`, chunk.error.code ?? null);
  }
  if (chunk.promptFeedback?.blockReason) {
    throw new CompletionError(`Prompt blocked by Gemini (${chunk.promptFeedback.blockReason})`);
  }

  const candidate = chunk.candidates?.[0];
  const texts = (candidate?.content?.parts ?? []).flatMap((p) => (p.text ? [p.text] : []));
  const reason = candidate?.finishReason;
  return reason && BLOCKING_FINISH_REASONS.has(reason) ? { texts, blockedReason: reason } : { texts };
}

async function readErrorMessage(response: Response): Promise<string> {
  const raw = await response.text().catch(() => '');
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // Not JSON; fall back to the raw body.
  }
  return raw.trim().slice(0, 500) || response.statusText;
}

export function createGeminiClient(opts: GeminiClientOpts): CompletionClient {
  const baseUrl = (opts.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, '');

  return {
    id: 'gemini',
    streamComplete(req) {
      return (async function* (): AsyncGenerator<string> {
        const url = `${baseUrl}/v1beta/models/${encodeURIComponent(req.model)}:streamGenerateContent?alt=sse`;
        const controller = new AbortController();
        let timedOut: string | null = null;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const armTimer = (ms: number | undefined, message: string) => {
          if (timer) clearTimeout(timer);
          if (!ms) return;
          timer = setTimeout(() => {
            timedOut = message;
            controller.abort();
          }, ms);
        };

        // Forward caller's AbortSignal into the controller.
        const onCallerAbort = () => controller.abort();
        req.signal?.addEventListener('abort', onCallerAbort, { once: true });
        if (req.signal?.aborted) controller.abort();

        let reader: ReadableStreamDefaultReader<Uint8Array> | undefined;
        try {
          opts.log?.debug({ model: req.model, turns: req.turns.length, grounding: req.grounding }, 'gemini:request');

          armTimer(opts.requestTimeoutMs, `Gemini request timed out after ${opts.requestTimeoutMs}ms`);
          const response = await fetch(url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'x-goog-api-key': opts.apiKey,
            },
            body: JSON.stringify(buildRequestBody(req)),
            signal: controller.signal,
          });

          if (!response.ok) {
            const message = await readErrorMessage(response);
            throw new CompletionError(`Gemini API error ${response.status}: ${message}`, response.status);
          }
          if (!response.body) {
            throw new CompletionError('Gemini API returned no response body', response.status);
          }

          reader = response.body.getReader();
          const decoder = new TextDecoder();
          let buffer = '';

          const linesToTexts = function* (lines: string[]): Generator<string> {
            for (const line of lines) {
              const data = parseSSEData(line);
              if (data === undefined) continue;
              const { texts, blockedReason } = parseChunk(data);
              yield* texts;
              if (blockedReason) {
                throw new CompletionError(`Response blocked by Gemini (${blockedReason})`);
              }
            }
          };

          while (true) {
            armTimer(opts.stallTimeoutMs, `Gemini stream stall: no output for ${opts.stallTimeoutMs}ms`);
            const { done, value } = await reader.read();
            if (done) break;

            buffer += decoder.decode(value, { stream: true });
            const lines = buffer.split('\n');
            // Keep the last (possibly incomplete) line in the buffer
            buffer = lines.pop() ?? '';
            yield* linesToTexts(lines);
          }

          buffer += decoder.decode();
          if (buffer.trim()) yield* linesToTexts([buffer]);
        } catch (err) {
          if (err instanceof CompletionError) throw err;
          if (timedOut) throw new CompletionError(timedOut);
          if (req.signal?.aborted) throw new CompletionError('aborted');
          throw new CompletionError(`Gemini request failed: ${err instanceof Error ? err.message : String(err)}`);
        } finally {
          if (timer) clearTimeout(timer);
          req.signal?.removeEventListener('abort', onCallerAbort);
          if (reader) {
            // Releases the connection when the consumer stops early.
            reader.cancel().catch((err: unknown) => opts.log?.debug({ err }, 'gemini:stream cancel failed'));
          }
        }
      })();
    },
  };
}
