#!/usr/bin/env node
import 'dotenv/config';
import pino from 'pino';
import path from 'node:path';
import type { Client } from 'discord.js';

import { ConfigStore, loadConfigFile } from './config.js';
import { startDiscordBot } from './discord.js';
import { AbortRegistry } from './discord/abort-registry.js';
import { createGeminiClient } from './runtime/gemini.js';
import { ScopeStore } from './store/scope-store.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

const configPath = path.resolve(process.env.CONFIG_PATH ?? 'config.yaml');

let parsedConfig;
try {
  parsedConfig = await loadConfigFile(configPath, process.env);
} catch (err) {
  log.error({ err, configPath }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;
const config = new ConfigStore(cfg, configPath, process.env);

const store = new ScopeStore({
  dataDir: path.resolve(cfg.dataDir),
  defaults: { model: cfg.defaultModel },
  maxDescriptionLength: cfg.limits.maxUserDescriptionLength,
  log,
});

const completion = createGeminiClient({
  apiKey: cfg.geminiApiKey,
  requestTimeoutMs: cfg.requestTimeoutMs,
  stallTimeoutMs: cfg.streamStallTimeoutMs,
  log,
});

const aborts = new AbortRegistry();

let client: Client;
try {
  client = await startDiscordBot({ config, store, completion, aborts, log });
} catch (err) {
  log.error({ err }, 'discord:login failed');
  process.exit(1);
}

let shuttingDown = false;
const shutdown = async (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  const aborted = aborts.tryAbortAll();
  log.info({ signal, aborted }, 'shutdown:stopping');
  try {
    await client.destroy();
  } catch (err) {
    log.warn({ err }, 'shutdown:client destroy failed');
  }
  process.exit(0);
};

process.on('SIGTERM', (signal) => void shutdown(signal));
process.on('SIGINT', (signal) => void shutdown(signal));
