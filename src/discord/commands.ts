import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { ConfigStore, RelayConfig } from '../config.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { DescriptionTooLongError, scopeKeyFor } from '../store/scope-store.js';
import type { ScopeStore } from '../store/scope-store.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { isAdmin } from './allowlist.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CommandUser = { id: string; displayName: string };

export type PromptAction = 'view' | 'set' | 'reset';
export type KnownAction = 'set' | 'view' | 'remove';

export type SlashCommand =
  | { name: 'model'; model: string | null }
  | { name: 'prompt'; action: PromptAction; text: string | null }
  | { name: 'known'; action: KnownAction; description: string | null; target: CommandUser | null }
  | { name: 'reload' };

export type CommandContext = {
  scopeKey: string;
  invoker: CommandUser;
  config: RelayConfig;
  store: ScopeStore;
  /** Re-reads the config file. Returns its warnings. */
  reloadConfig: () => Promise<string[]>;
  log?: LoggerLike;
};

const DISCORD_MESSAGE_LIMIT = 2000;

function mention(user: CommandUser): string {
  return `<@${user.id}>`;
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

/** Discord allows at most 25 choices per option. */
export function buildSlashCommands(config: RelayConfig): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  const modelChoices = config.availableModels.slice(0, 25).map((m) => ({ name: m, value: m }));

  return [
    new SlashCommandBuilder()
      .setName('model')
      .setDescription('View or switch the current model')
      .addStringOption((o) =>
        o.setName('model').setDescription('Choose a Gemini model').setRequired(false).addChoices(...modelChoices),
      )
      .toJSON(),
    new SlashCommandBuilder()
      .setName('prompt')
      .setDescription('Manage the system prompt')
      .addStringOption((o) =>
        o
          .setName('action')
          .setDescription('Choose an action')
          .setRequired(true)
          .addChoices(
            { name: 'View current prompt', value: 'view' },
            { name: 'Set new prompt', value: 'set' },
            { name: 'Reset to default', value: 'reset' },
          ),
      )
      .addStringOption((o) => o.setName('text').setDescription("The system prompt text (for 'set' action)"))
      .toJSON(),
    new SlashCommandBuilder()
      .setName('known')
      .setDescription('Manage user personalization')
      .addStringOption((o) =>
        o
          .setName('action')
          .setDescription('Choose an action')
          .setRequired(true)
          .addChoices(
            { name: 'Set your description', value: 'set' },
            { name: 'View description', value: 'view' },
            { name: 'Remove description', value: 'remove' },
          ),
      )
      .addStringOption((o) => o.setName('description').setDescription("Your description (for 'set' action)"))
      .addUserOption((o) => o.setName('user').setDescription('User to manage (admin only)'))
      .toJSON(),
    new SlashCommandBuilder().setName('reload').setDescription('Reload the bot configuration (admin only)').toJSON(),
  ];
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleModel(model: string | null, ctx: CommandContext): Promise<string> {
  const record = await ctx.store.load(ctx.scopeKey);
  if (model === null) return `Current model: \`${record.model}\``;
  if (model === record.model) return `Already using: \`${record.model}\``;
  if (!isAdmin(ctx.invoker.id, ctx.config.permissions)) return "You don't have permission to change the model.";
  if (!ctx.config.availableModels.includes(model)) return `Unknown model: \`${model}\``;

  await ctx.store.setModel(ctx.scopeKey, model);
  ctx.log?.info({ scopeKey: ctx.scopeKey, model, by: ctx.invoker.id }, 'commands:model switched');
  return `Model switched to: \`${model}\``;
}

function formatPromptView(prompt: string): string {
  const head = '**Current system prompt:**\n```\n';
  const tail = '\n```';
  const room = DISCORD_MESSAGE_LIMIT - head.length - tail.length;
  const body = prompt.length > room ? `${prompt.slice(0, room - 1)}…` : prompt;
  return head + body + tail;
}

async function handlePrompt(action: PromptAction, text: string | null, ctx: CommandContext): Promise<string> {
  const admin = isAdmin(ctx.invoker.id, ctx.config.permissions);

  switch (action) {
    case 'view': {
      const record = await ctx.store.load(ctx.scopeKey);
      return formatPromptView(record.systemPrompt ?? ctx.config.defaultSystemPrompt);
    }
    case 'set': {
      if (!admin) return "You don't have permission to change the system prompt.";
      const prompt = text?.trim();
      if (!prompt) return 'Please provide the prompt text.';
      await ctx.store.setSystemPrompt(ctx.scopeKey, prompt);
      ctx.log?.info({ scopeKey: ctx.scopeKey, by: ctx.invoker.id, chars: prompt.length }, 'commands:prompt set');
      return 'System prompt updated successfully!';
    }
    case 'reset': {
      if (!admin) return "You don't have permission to reset the system prompt.";
      await ctx.store.setSystemPrompt(ctx.scopeKey, null);
      ctx.log?.info({ scopeKey: ctx.scopeKey, by: ctx.invoker.id }, 'commands:prompt reset');
      return 'System prompt reset to default.';
    }
  }
}

async function handleKnown(
  cmd: Extract<SlashCommand, { name: 'known' }>,
  ctx: CommandContext,
): Promise<string> {
  const target = cmd.target ?? ctx.invoker;
  const self = target.id === ctx.invoker.id;
  if (!self && !isAdmin(ctx.invoker.id, ctx.config.permissions)) {
    return "You don't have permission to manage other users.";
  }

  switch (cmd.action) {
    case 'view': {
      const record = await ctx.store.load(ctx.scopeKey);
      const profile = record.users[target.id];
      if (!profile) return `${mention(target)} hasn't interacted with the bot yet.`;
      return profile.description
        ? `**${profile.displayName}'s description:**\n${profile.description}`
        : `${profile.displayName} has no description set.`;
    }
    case 'set': {
      const description = cmd.description?.trim();
      if (!description) return 'Please provide a description.';
      try {
        await ctx.store.setDescription(ctx.scopeKey, target.id, target.displayName, description);
      } catch (err) {
        if (err instanceof DescriptionTooLongError) return `Description too long! Maximum ${err.maxLength} characters.`;
        throw err;
      }
      return self ? 'Your description has been updated!' : `Description updated for ${mention(target)}`;
    }
    case 'remove': {
      const found = await ctx.store.removeDescription(ctx.scopeKey, target.id);
      if (!found) return self ? 'No description to remove.' : `${mention(target)} hasn't interacted with the bot yet.`;
      return self ? 'Your description has been removed.' : `Description removed for ${mention(target)}`;
    }
  }
}

async function handleReload(ctx: CommandContext): Promise<string> {
  if (!isAdmin(ctx.invoker.id, ctx.config.permissions)) {
    return "You don't have permission to reload the configuration.";
  }
  try {
    const warnings = await ctx.reloadConfig();
    ctx.log?.info({ by: ctx.invoker.id, warnings }, 'commands:config reloaded');
    return ['Configuration reloaded.', ...warnings.map((w) => `⚠️ ${w}`)].join('\n');
  } catch (err) {
    ctx.log?.warn({ err, by: ctx.invoker.id }, 'commands:config reload failed');
    return `Reload failed: ${err instanceof Error ? err.message : String(err)}`;
  }
}

/** Run a parsed command and return the reply text. */
export function handleCommand(cmd: SlashCommand, ctx: CommandContext): Promise<string> {
  switch (cmd.name) {
    case 'model':
      return handleModel(cmd.model, ctx);
    case 'prompt':
      return handlePrompt(cmd.action, cmd.text, ctx);
    case 'known':
      return handleKnown(cmd, ctx);
    case 'reload':
      return handleReload(ctx);
  }
}

// ---------------------------------------------------------------------------
// Interaction glue
// ---------------------------------------------------------------------------

function isPromptAction(v: string): v is PromptAction {
  return v === 'view' || v === 'set' || v === 'reset';
}

function isKnownAction(v: string): v is KnownAction {
  return v === 'set' || v === 'view' || v === 'remove';
}

/** Read a command from an interaction. Null for commands this bot does not own. */
export function parseInteraction(interaction: ChatInputCommandInteraction): SlashCommand | null {
  const { options } = interaction;
  switch (interaction.commandName) {
    case 'model':
      return { name: 'model', model: options.getString('model') };
    case 'prompt': {
      const action = options.getString('action', true);
      return isPromptAction(action) ? { name: 'prompt', action, text: options.getString('text') } : null;
    }
    case 'known': {
      const action = options.getString('action', true);
      if (!isKnownAction(action)) return null;
      const user = options.getUser('user');
      const member = interaction.inCachedGuild() ? interaction.options.getMember('user') : null;
      return {
        name: 'known',
        action,
        description: options.getString('description'),
        target: user ? { id: user.id, displayName: member?.displayName ?? user.displayName } : null,
      };
    }
    case 'reload':
      return { name: 'reload' };
    default:
      return null;
  }
}

export type InteractionDeps = {
  config: ConfigStore;
  store: ScopeStore;
  log?: LoggerLike;
};

export async function runInteraction(interaction: ChatInputCommandInteraction, deps: InteractionDeps): Promise<void> {
  const cmd = parseInteraction(interaction);
  if (!cmd) {
    deps.log?.debug({ command: interaction.commandName }, 'commands:unknown command ignored');
    return;
  }

  const invoker: CommandUser = {
    id: interaction.user.id,
    displayName: interaction.inCachedGuild() ? interaction.member.displayName : interaction.user.displayName,
  };
  const ctx: CommandContext = {
    scopeKey: scopeKeyFor({ guildId: interaction.guildId, userId: interaction.user.id }),
    invoker,
    config: deps.config.current,
    store: deps.store,
    reloadConfig: async () => (await deps.config.reload()).warnings,
    log: deps.log,
  };

  let content: string;
  try {
    content = await handleCommand(cmd, ctx);
  } catch (err) {
    deps.log?.error({ err, command: cmd.name, scopeKey: ctx.scopeKey }, 'commands:handler failed');
    content = 'Something went wrong while running that command.';
  }

  try {
    await interaction.reply({ content, allowedMentions: NO_MENTIONS });
  } catch (err) {
    deps.log?.warn({ err, command: cmd.name }, 'commands:reply failed');
  }
}
