import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigStore,
  DEFAULT_MODEL,
  DEFAULT_STATUS_MESSAGE,
  DEFAULT_SYSTEM_PROMPT,
  loadConfigFile,
  parseConfig,
} from './config.js';
import { isAllowed } from './discord/allowlist.js';

function doc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    bot_token: 'test-token',
    gemini_api_key: 'test-key',
    ...overrides,
  };
}

describe('parseConfig', () => {
  it('parses required fields and defaults', () => {
    const { config, warnings, infos } = parseConfig(doc(), {});
    expect(config.token).toBe('test-token');
    expect(config.geminiApiKey).toBe('test-key');
    expect(config.defaultModel).toBe(DEFAULT_MODEL);
    expect(config.availableModels).toEqual(['gemini-2.5-flash', 'gemini-2.5-pro']);
    expect(config.defaultSystemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
    expect(config.statusMessage).toBe(DEFAULT_STATUS_MESSAGE);
    expect(config.allowDms).toBe(true);
    expect(config.usePlainResponses).toBe(false);
    expect(config.limits).toEqual({
      maxText: 100_000,
      maxImages: 5,
      maxMessages: 25,
      maxUrls: 3,
      maxUserDescriptionLength: 500,
    });
    expect(config.enableSearchGrounding).toBe(false);
    expect(config.cacheCapacity).toBe(500);
    expect(config.editIntervalMs).toBe(2000);
    expect(config.continuationWindowMs).toBe(300_000);
    expect(config.dataDir).toBe('server_data');
    expect(config.generation).toEqual({ temperature: 1, topP: 0.95, topK: 40, maxOutputTokens: 8192 });
    expect(config.permissions.adminIds).toEqual(new Set());
    expect(config.permissions.blockedChannelIds).toEqual(new Set());
    expect(warnings).toEqual([]);
    expect(infos).toEqual([]);
  });

  it('normalizes numeric and string ids to strings', () => {
    const { config } = parseConfig(doc({
      permissions: {
        users: { admin_ids: [123, ' 456 '], allowed_ids: [], blocked_ids: ['789'] },
        channels: { blocked_ids: [42] },
      },
    }), {});
    expect(config.permissions.adminIds).toEqual(new Set(['123', '456']));
    expect(config.permissions.blockedUserIds).toEqual(new Set(['789']));
    expect(config.permissions.blockedChannelIds).toEqual(new Set(['42']));
    expect(config.permissions.allowedRoleIds).toEqual(new Set());
  });

  it('prefers DISCORD_TOKEN and GEMINI_API_KEY from the environment', () => {
    const { config, infos } = parseConfig(doc(), { DISCORD_TOKEN: ' env-token ', GEMINI_API_KEY: 'env-key' });
    expect(config.token).toBe('env-token');
    expect(config.geminiApiKey).toBe('env-key');
    expect(infos).toEqual([
      'Using DISCORD_TOKEN from the environment',
      'Using GEMINI_API_KEY from the environment',
    ]);
  });

  it('throws when the bot token is missing', () => {
    expect(() => parseConfig({ gemini_api_key: 'k' }, {})).toThrow(/Missing bot token/);
  });

  it('throws when the api key is missing', () => {
    expect(() => parseConfig({ bot_token: 't' }, {})).toThrow(/Missing Gemini API key/);
  });

  it('rejects invalid limit values with the offending path', () => {
    expect(() => parseConfig(doc({ max_messages: 0 }), {})).toThrow(/max_messages/);
    expect(() => parseConfig(doc({ max_text: 'lots' }), {})).toThrow(/max_text/);
  });

  it('adds default_model to available_models with a warning when absent', () => {
    const { config, warnings } = parseConfig(doc({ default_model: 'gemini-x', available_models: ['gemini-2.5-pro'] }), {});
    expect(config.availableModels).toEqual(['gemini-x', 'gemini-2.5-pro']);
    expect(warnings).toEqual(['default_model "gemini-x" is not in available_models; adding it']);
  });

  it('truncates the status message to 128 characters', () => {
    const { config } = parseConfig(doc({ status_message: 'x'.repeat(200) }), {});
    expect(config.statusMessage).toHaveLength(128);
  });

  it('treats a null document as empty', () => {
    expect(() => parseConfig(null, {})).toThrow(/Missing bot token/);
    const { config } = parseConfig(null, { DISCORD_TOKEN: 't', GEMINI_API_KEY: 'k' });
    expect(config.limits.maxMessages).toBe(25);
  });

  it('rejects numeric ids that lost precision', () => {
    expect(() => parseConfig(doc({ permissions: { users: { admin_ids: [2 ** 60] } } }), {})).toThrow(
      'Invalid configuration: permissions.users.admin_ids.0: id is too large to be exact; quote it',
    );
  });

  it('keeps client_id as a string', () => {
    const { config } = parseConfig(doc({ client_id: 1234567890 }), {});
    expect(config.clientId).toBe('1234567890');
  });
});

describe('loadConfigFile / ConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'geminicord-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a YAML file', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(file, 'bot_token: t\ngemini_api_key: k\nmax_images: 2\nallow_dms: false\n');
    const { config } = await loadConfigFile(file, {});
    expect(config.limits.maxImages).toBe(2);
    expect(config.allowDms).toBe(false);
  });

  it('keeps every digit of unquoted snowflake ids', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(
      file,
      [
        'bot_token: t',
        'gemini_api_key: k',
        'client_id: 123456789012345678',
        'max_messages: 10',
        'generation:',
        '  temperature: 1',
        'permissions:',
        '  channels:',
        '    blocked_ids: [123456789012345678]',
        '',
      ].join('\n'),
    );

    const { config } = await loadConfigFile(file, {});

    expect(config.clientId).toBe('123456789012345678');
    expect(config.permissions.blockedChannelIds).toEqual(new Set(['123456789012345678']));
    expect(config.limits.maxMessages).toBe(10);
    expect(config.generation.temperature).toBe(1);
    expect(
      isAllowed(
        { userId: '1', roleIds: [], channelIds: ['123456789012345678'], isDm: false },
        config.permissions,
        { allowDms: true },
      ),
    ).toBe(false);
  });

  it('reloads from disk but keeps the credentials in use', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(file, 'bot_token: t\ngemini_api_key: k\nmax_messages: 10\n');
    const { config } = await loadConfigFile(file, {});
    const store = new ConfigStore(config, file, {});

    await fs.writeFile(file, 'bot_token: other\ngemini_api_key: other\nmax_messages: 4\n');
    await store.reload();

    expect(store.current.limits.maxMessages).toBe(4);
    expect(store.current.token).toBe('t');
    expect(store.current.geminiApiKey).toBe('k');
  });

  it('keeps the previous config when a reload fails', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(file, 'bot_token: t\ngemini_api_key: k\nmax_messages: 10\n');
    const { config } = await loadConfigFile(file, {});
    const store = new ConfigStore(config, file, {});

    await fs.writeFile(file, 'bot_token: t\ngemini_api_key: k\nmax_messages: -1\n');
    await expect(store.reload()).rejects.toThrow(/max_messages/);
    expect(store.current.limits.maxMessages).toBe(10);
  });
});
