import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { KeyedQueue } from '../group-queue.js';
import type { LoggerLike } from '../logging/logger-like.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type UserProfile = {
  displayName: string;
  description: string | null;
  /** ISO timestamp. */
  firstSeen: string;
  /** ISO timestamp. */
  lastUpdated: string;
};

export type ScopeRecord = {
  model: string;
  /** Null falls back to the configured default prompt. */
  systemPrompt: string | null;
  users: Record<string, UserProfile>;
};

export type ScopeDefaults = {
  model: string;
};

export type ScopeStoreOptions = {
  dataDir: string;
  defaults: ScopeDefaults;
  maxDescriptionLength: number;
  log?: LoggerLike;
  now?: () => Date;
};

export class DescriptionTooLongError extends Error {
  constructor(readonly maxLength: number) {
    super(`Description too long (max ${maxLength} characters)`);
    this.name = 'DescriptionTooLongError';
  }
}

// ---------------------------------------------------------------------------
// On-disk shape (snake_case, compatible with existing server_data files)
// ---------------------------------------------------------------------------

const StoredProfileSchema = z.object({
  display_name: z.string(),
  description: z.string().nullable().optional(),
  first_seen: z.string(),
  last_updated: z.string(),
});

const StoredRecordSchema = z.object({
  model: z.string().min(1).optional(),
  system_prompt: z.string().nullable().optional(),
  users: z.record(StoredProfileSchema).nullable().optional(),
  // Older DM files kept a single profile under `user`.
  user: z.union([StoredProfileSchema, z.object({}).strict()]).nullable().optional(),
});

type StoredProfile = z.infer<typeof StoredProfileSchema>;
type StoredRecord = {
  model: string;
  system_prompt: string | null;
  users: Record<string, StoredProfile>;
};

function profileFromStored(p: StoredProfile): UserProfile {
  const description = p.description?.trim() ? p.description : null;
  return {
    displayName: p.display_name,
    description,
    firstSeen: p.first_seen,
    lastUpdated: p.last_updated,
  };
}

function profileToStored(p: UserProfile): StoredProfile {
  return {
    display_name: p.displayName,
    description: p.description,
    first_seen: p.firstSeen,
    last_updated: p.lastUpdated,
  };
}

function toStored(record: ScopeRecord): StoredRecord {
  const users: Record<string, StoredProfile> = {};
  for (const [id, profile] of Object.entries(record.users)) {
    users[id] = profileToStored(profile);
  }
  return { model: record.model, system_prompt: record.systemPrompt, users };
}

// ---------------------------------------------------------------------------
// Scope keys
// ---------------------------------------------------------------------------

/** One scope per server, one per DM peer. */
export function scopeKeyFor(opts: { guildId?: string | null; userId: string }): string {
  if (opts.guildId) return opts.guildId;
  return `dm_${opts.userId}`;
}

function dmPeerId(scopeKey: string): string | null {
  return scopeKey.startsWith('dm_') ? scopeKey.slice(3) : null;
}

function assertSafeKey(scopeKey: string): void {
  if (!/^(dm_)?\d+$/.test(scopeKey)) {
    throw new Error(`Invalid scope key: ${scopeKey}`);
  }
}

async function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp.${process.pid}`;
  await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf8');
  await fs.rename(tmp, filePath);
}

// ---------------------------------------------------------------------------
// ScopeStore
// ---------------------------------------------------------------------------

/**
 * Durable per-scope settings and user profiles, one JSON file per scope.
 *
 * Reads take no lock: callers treat a loaded record as a snapshot for the
 * duration of one request. Writes for a scope are serialized, and `update`
 * runs its load-mutate-save inside the same slot so concurrent mutations
 * cannot overwrite each other.
 */
export class ScopeStore {
  private readonly queue = new KeyedQueue();
  private readonly now: () => Date;

  constructor(private readonly opts: ScopeStoreOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  filePath(scopeKey: string): string {
    assertSafeKey(scopeKey);
    return path.join(this.opts.dataDir, `${scopeKey}.json`);
  }

  defaultRecord(): ScopeRecord {
    return { model: this.opts.defaults.model, systemPrompt: null, users: {} };
  }

  async load(scopeKey: string): Promise<ScopeRecord> {
    const filePath = this.filePath(scopeKey);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return this.defaultRecord();
      // Unreadable (EACCES, EISDIR, EIO): answer with defaults and leave the path alone.
      this.opts.log?.warn({ err, scopeKey, filePath }, 'scope-store:record unreadable, using defaults');
      return this.defaultRecord();
    }

    let parsed: z.infer<typeof StoredRecordSchema>;
    try {
      parsed = StoredRecordSchema.parse(JSON.parse(raw));
    } catch (err) {
      await this.quarantine(scopeKey, filePath, err);
      return this.defaultRecord();
    }

    const users: Record<string, UserProfile> = {};
    for (const [id, profile] of Object.entries(parsed.users ?? {})) {
      users[id] = profileFromStored(profile);
    }
    const peerId = dmPeerId(scopeKey);
    if (peerId && parsed.user && 'display_name' in parsed.user && !users[peerId]) {
      users[peerId] = profileFromStored(parsed.user);
    }

    return {
      model: parsed.model ?? this.opts.defaults.model,
      systemPrompt: parsed.system_prompt ?? null,
      users,
    };
  }

  save(scopeKey: string, record: ScopeRecord): Promise<void> {
    const filePath = this.filePath(scopeKey);
    return this.queue.run(scopeKey, () => atomicWriteJson(filePath, toStored(record)));
  }

  /** Load, mutate and save under the scope's write slot. Returns the saved record. */
  update(scopeKey: string, mutate: (record: ScopeRecord, now: Date) => void): Promise<ScopeRecord> {
    const filePath = this.filePath(scopeKey);
    return this.queue.run(scopeKey, async () => {
      const record = await this.load(scopeKey);
      mutate(record, this.now());
      await atomicWriteJson(filePath, toStored(record));
      return record;
    });
  }

  // -- profile helpers ------------------------------------------------------

  /** Automatic discovery: record that a user was seen, refreshing their display name. */
  async touchUser(scopeKey: string, userId: string, displayName: string): Promise<UserProfile> {
    const record = await this.update(scopeKey, (rec, now) => {
      const ts = now.toISOString();
      const existing = rec.users[userId];
      if (existing) {
        existing.displayName = displayName;
        existing.lastUpdated = ts;
      } else {
        rec.users[userId] = { displayName, description: null, firstSeen: ts, lastUpdated: ts };
      }
    });
    return record.users[userId];
  }

  async setDescription(
    scopeKey: string,
    userId: string,
    displayName: string,
    description: string,
  ): Promise<UserProfile> {
    const trimmed = description.trim();
    if (trimmed.length > this.opts.maxDescriptionLength) {
      throw new DescriptionTooLongError(this.opts.maxDescriptionLength);
    }
    const record = await this.update(scopeKey, (rec, now) => {
      const ts = now.toISOString();
      const existing = rec.users[userId];
      if (existing) {
        existing.displayName = displayName;
        existing.description = trimmed;
        existing.lastUpdated = ts;
      } else {
        rec.users[userId] = { displayName, description: trimmed, firstSeen: ts, lastUpdated: ts };
      }
    });
    return record.users[userId];
  }

  /** Returns false when the user has no profile in this scope. */
  async removeDescription(scopeKey: string, userId: string): Promise<boolean> {
    let found = false;
    await this.update(scopeKey, (rec, now) => {
      const existing = rec.users[userId];
      if (!existing) return;
      found = true;
      existing.description = null;
      existing.lastUpdated = now.toISOString();
    });
    return found;
  }

  async setModel(scopeKey: string, model: string): Promise<void> {
    await this.update(scopeKey, (rec) => {
      rec.model = model;
    });
  }

  /** Null resets to the configured default prompt. */
  async setSystemPrompt(scopeKey: string, prompt: string | null): Promise<void> {
    await this.update(scopeKey, (rec) => {
      rec.systemPrompt = prompt;
    });
  }

  private async quarantine(scopeKey: string, filePath: string, err: unknown): Promise<void> {
    const target = `${filePath}.corrupt-${this.now().getTime()}`;
    try {
      await fs.rename(filePath, target);
      this.opts.log?.warn({ err, scopeKey, movedTo: target }, 'scope-store:corrupt record quarantined; using defaults');
    } catch (renameErr) {
      // A concurrent load already moved it.
      if ((renameErr as NodeJS.ErrnoException).code === 'ENOENT') return;
      this.opts.log?.error({ err: renameErr, scopeKey }, 'scope-store:corrupt record could not be moved aside');
    }
  }
}
