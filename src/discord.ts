import { ActivityType, Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import type { ConfigStore } from './config.js';
import type { LoggerLike } from './logging/logger-like.js';
import type { CompletionClient } from './runtime/types.js';
import type { ScopeStore } from './store/scope-store.js';
import type { AbortRegistry } from './discord/abort-registry.js';
import { buildSlashCommands, runInteraction } from './discord/commands.js';
import { createMessageCreateHandler } from './discord/message-coordinator.js';
import { MessageNodeCache } from './discord/message-node-cache.js';
import type { MessageNode } from './discord/message-nodes.js';
import { DiscordMessageSource } from './discord/message-source.js';

// View channels, send messages, embed links, attach files, read history and
// the thread permissions the bot needs to answer inside threads.
const INVITE_PERMISSIONS = '412317191168';

export type BotParams = {
  config: ConfigStore;
  store: ScopeStore;
  completion: CompletionClient;
  aborts: AbortRegistry;
  log?: LoggerLike;
};

export function inviteUrl(clientId: string): string {
  return `https://discord.com/oauth2/authorize?client_id=${clientId}&permissions=${INVITE_PERMISSIONS}&scope=bot`;
}

export async function startDiscordBot(params: BotParams): Promise<Client> {
  const { config, log } = params;
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    // DM channels arrive uncached.
    partials: [Partials.Channel],
    presence: {
      activities: [{ name: 'Custom Status', type: ActivityType.Custom, state: config.current.statusMessage }],
    },
  });

  client.once(Events.ClientReady, async (ready) => {
    const clientId = config.current.clientId ?? ready.user.id;
    log?.info({ user: ready.user.tag, invite: inviteUrl(clientId) }, 'discord:ready');

    const cache = new MessageNodeCache<MessageNode>({
      capacity: config.current.cacheCapacity,
      loadTimeoutMs: config.current.requestTimeoutMs,
    });
    client.on(
      Events.MessageCreate,
      createMessageCreateHandler({
        botUserId: ready.user.id,
        botDisplayName: ready.user.displayName,
        config,
        store: params.store,
        cache,
        source: new DiscordMessageSource(client),
        completion: params.completion,
        aborts: params.aborts,
        log,
      }),
    );

    try {
      const commands = await ready.application.commands.set(buildSlashCommands(config.current));
      log?.info({ count: commands.size }, 'discord:slash commands registered');
    } catch (err) {
      log?.error({ err }, 'discord:slash command registration failed');
    }
  });

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;
    await runInteraction(interaction, { config, store: params.store, log });
  });

  // Deleting the message that asked stops its answer.
  client.on(Events.MessageDelete, (msg) => {
    if (params.aborts.tryAbort(msg.id)) {
      log?.info({ messageId: msg.id }, 'discord:answer aborted by deletion');
    }
  });

  client.on(Events.Error, (err) => {
    log?.error({ err }, 'discord:client error');
  });

  await client.login(config.current.token);
  return client;
}
