import type { MessageMentionOptions } from 'discord.js';

/** Replies never ping anyone, including the user being answered. */
export const NO_MENTIONS: MessageMentionOptions = { parse: [], repliedUser: false };
