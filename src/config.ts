import fs from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import { z } from 'zod';
import type { GenerationSettings } from './runtime/types.js';

export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_AVAILABLE_MODELS = ['gemini-2.5-flash', 'gemini-2.5-pro'];
export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant in a Discord chat. Today is {date} and the time is {time}.';
export const DEFAULT_STATUS_MESSAGE = 'Powered by Gemini';

type ParseResult = {
  config: RelayConfig;
  warnings: string[];
  infos: string[];
};

// Config files are read with `intAsBigInt`, so an unquoted snowflake keeps
// every digit. Ids are normalized to strings; plain numbers must be exact.
const IdListSchema = z
  .array(
    z.union([
      z.string(),
      z.bigint(),
      z.number().refine(Number.isSafeInteger, 'id is too large to be exact; quote it'),
    ]),
  )
  .default([])
  .transform((ids) => ids.map((id) => String(id).trim()).filter(Boolean));

const UserPermissionsSchema = z
  .object({
    admin_ids: IdListSchema,
    allowed_ids: IdListSchema,
    blocked_ids: IdListSchema,
  })
  .default({});

const ListPermissionsSchema = z
  .object({
    allowed_ids: IdListSchema,
    blocked_ids: IdListSchema,
  })
  .default({});

// Integers arrive as bigint from the YAML loader; numeric settings want numbers.
const fromBigInt = (value: unknown) => (typeof value === 'bigint' ? Number(value) : value);
const num = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(fromBigInt, schema);

const positiveInt = (def: number) => num(z.number().int().positive()).default(def);
const nonNegativeInt = (def: number) => num(z.number().int().nonnegative()).default(def);

export const ConfigFileSchema = z.object({
  bot_token: z.string().optional(),
  gemini_api_key: z.string().optional(),
  client_id: z.union([z.string(), z.bigint(), z.number()]).optional(),
  status_message: z.string().optional(),

  default_model: z.string().default(DEFAULT_MODEL),
  available_models: z.array(z.string()).default(DEFAULT_AVAILABLE_MODELS),
  default_system_prompt: z.string().default(DEFAULT_SYSTEM_PROMPT),

  allow_dms: z.boolean().default(true),
  use_plain_responses: z.boolean().default(false),

  max_text: positiveInt(100_000),
  max_images: nonNegativeInt(5),
  max_messages: positiveInt(25),
  max_urls: nonNegativeInt(3),
  max_user_description_length: positiveInt(500),

  enable_search_grounding: z.boolean().default(false),
  cache_capacity: positiveInt(500),
  edit_interval_ms: positiveInt(2000),
  request_timeout_ms: positiveInt(30_000),
  stream_stall_timeout_ms: positiveInt(60_000),
  continuation_window_seconds: nonNegativeInt(300),
  data_dir: z.string().default('server_data'),

  generation: z
    .object({
      temperature: num(z.number().min(0).max(2)).default(1.0),
      top_p: num(z.number().min(0).max(1)).default(0.95),
      top_k: positiveInt(40),
      max_output_tokens: positiveInt(8192),
    })
    .default({}),

  permissions: z
    .object({
      users: UserPermissionsSchema,
      roles: ListPermissionsSchema,
      channels: ListPermissionsSchema,
    })
    .default({}),
});

export type PermissionLists = {
  adminIds: Set<string>;
  allowedUserIds: Set<string>;
  blockedUserIds: Set<string>;
  allowedRoleIds: Set<string>;
  blockedRoleIds: Set<string>;
  allowedChannelIds: Set<string>;
  blockedChannelIds: Set<string>;
};

export type Limits = {
  maxText: number;
  maxImages: number;
  maxMessages: number;
  maxUrls: number;
  maxUserDescriptionLength: number;
};

export type RelayConfig = {
  token: string;
  geminiApiKey: string;
  clientId?: string;
  statusMessage: string;

  defaultModel: string;
  availableModels: string[];
  defaultSystemPrompt: string;

  allowDms: boolean;
  usePlainResponses: boolean;
  limits: Limits;
  enableSearchGrounding: boolean;

  cacheCapacity: number;
  editIntervalMs: number;
  requestTimeoutMs: number;
  streamStallTimeoutMs: number;
  continuationWindowMs: number;
  dataDir: string;

  generation: GenerationSettings;
  permissions: PermissionLists;
};

function parseTrimmedString(value: string | undefined): string | undefined {
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

function formatZodIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a parsed YAML document and apply environment overrides.
 * Throws when the document is invalid or a required secret is missing.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(result.error)}`);
  }
  const file = result.data;

  const envToken = parseTrimmedString(env.DISCORD_TOKEN);
  const token = envToken ?? parseTrimmedString(file.bot_token);
  if (!token) {
    throw new Error('Missing bot token: set bot_token in the config file or DISCORD_TOKEN');
  }
  if (envToken) infos.push('Using DISCORD_TOKEN from the environment');

  const envApiKey = parseTrimmedString(env.GEMINI_API_KEY);
  const geminiApiKey = envApiKey ?? parseTrimmedString(file.gemini_api_key);
  if (!geminiApiKey) {
    throw new Error('Missing Gemini API key: set gemini_api_key in the config file or GEMINI_API_KEY');
  }
  if (envApiKey) infos.push('Using GEMINI_API_KEY from the environment');

  const availableModels = [...new Set(file.available_models.map((m) => m.trim()).filter(Boolean))];
  if (!availableModels.includes(file.default_model)) {
    warnings.push(
      `default_model "${file.default_model}" is not in available_models; adding it`,
    );
    availableModels.unshift(file.default_model);
  }
  // Discord caps slash command choices at 25.
  if (availableModels.length > 25) {
    warnings.push('available_models has more than 25 entries; only the first 25 are offered in /model');
  }

  const statusMessage = (parseTrimmedString(file.status_message) ?? DEFAULT_STATUS_MESSAGE).slice(0, 128);

  if (file.max_images === 0) {
    infos.push('max_images is 0; images will not be sent to the model');
  }

  const { users, roles, channels } = file.permissions;

  return {
    config: {
      token,
      geminiApiKey,
      clientId: file.client_id != null ? String(file.client_id) : undefined,
      statusMessage,
      defaultModel: file.default_model,
      availableModels,
      defaultSystemPrompt: file.default_system_prompt,
      allowDms: file.allow_dms,
      usePlainResponses: file.use_plain_responses,
      limits: {
        maxText: file.max_text,
        maxImages: file.max_images,
        maxMessages: file.max_messages,
        maxUrls: file.max_urls,
        maxUserDescriptionLength: file.max_user_description_length,
      },
      enableSearchGrounding: file.enable_search_grounding,
      cacheCapacity: file.cache_capacity,
      editIntervalMs: file.edit_interval_ms,
      requestTimeoutMs: file.request_timeout_ms,
      streamStallTimeoutMs: file.stream_stall_timeout_ms,
      continuationWindowMs: file.continuation_window_seconds * 1000,
      dataDir: file.data_dir,
      generation: {
        temperature: file.generation.temperature,
        topP: file.generation.top_p,
        topK: file.generation.top_k,
        maxOutputTokens: file.generation.max_output_tokens,
      },
      permissions: {
        adminIds: new Set(users.admin_ids),
        allowedUserIds: new Set(users.allowed_ids),
        blockedUserIds: new Set(users.blocked_ids),
        allowedRoleIds: new Set(roles.allowed_ids),
        blockedRoleIds: new Set(roles.blocked_ids),
        allowedChannelIds: new Set(channels.allowed_ids),
        blockedChannelIds: new Set(channels.blocked_ids),
      },
    },
    warnings,
    infos,
  };
}

export async function loadConfigFile(filePath: string, env: NodeJS.ProcessEnv): Promise<ParseResult> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseConfig(parseYAML(text, { intAsBigInt: true }), env);
}

/**
 * Holds the live configuration. Read-only after startup apart from
 * admin-triggered reloads; a reload that fails leaves the current config in place.
 */
export class ConfigStore {
  private config: RelayConfig;

  constructor(
    initial: RelayConfig,
    private readonly filePath: string,
    private readonly env: NodeJS.ProcessEnv,
  ) {
    this.config = initial;
  }

  get current(): RelayConfig {
    return this.config;
  }

  async reload(): Promise<ParseResult> {
    const result = await loadConfigFile(this.filePath, this.env);
    // The session is already logged in with the original credentials.
    this.config = {
      ...result.config,
      token: this.config.token,
      geminiApiKey: this.config.geminiApiKey,
    };
    return result;
  }
}
