export type ImageData = {
  /** Base64-encoded image bytes. */
  base64: string;
  mediaType: string;
};

export type TurnRole = 'user' | 'assistant';

export type ConversationTurn = {
  role: TurnRole;
  text: string;
  images: ImageData[];
  /** Set on user turns; used for attribution and known-user lookups. */
  authorId?: string;
  authorName?: string;
};

export type GenerationSettings = {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
};

export type CompletionRequest = {
  model: string;
  systemPrompt: string;
  /** Oldest first. */
  turns: ConversationTurn[];
  grounding: boolean;
  generation: GenerationSettings;
  signal?: AbortSignal;
};

export interface CompletionClient {
  readonly id: string;
  /**
   * Stream the model's answer as text deltas. The sequence is finite and
   * cannot be restarted; failures are thrown from the iterator.
   */
  streamComplete(req: CompletionRequest): AsyncIterable<string>;
}

export class CompletionError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'CompletionError';
    this.status = status;
  }
}
