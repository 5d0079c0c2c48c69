/**
 * Guild Configuration Store
 *
 * Keeps each guild's selected Poe model and open conversation id.
 * Stores entries in a JSON file for persistence across restarts.
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import {
  logger as defaultLogger,
  type Logger,
  type GuildConfigRecord,
  type PersistedGuildConfigMap,
} from '@poe-relay/shared';
import { ConfigCorruptError, ConfigPersistError } from '../../types/errors.js';

/**
 * Where the store's JSON lives. Swapped for an in-memory backend in tests.
 */
export interface StateFileBackend {
  readonly location: string;
  exists(): boolean;
  read(): string;
  /** Replace the whole file. Readers never see a partial write. */
  write(contents: string): void;
}

export function createJsonFileBackend(filePath: string): StateFileBackend {
  return {
    location: filePath,
    exists: () => existsSync(filePath),
    read: () => readFileSync(filePath, 'utf-8'),
    write: (contents: string) => {
      mkdirSync(dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${process.pid}.tmp`;
      writeFileSync(tempPath, contents, 'utf-8');
      renameSync(tempPath, filePath);
    },
  };
}

export class MemoryStateBackend implements StateFileBackend {
  readonly location = 'memory';

  constructor(public contents?: string) {}

  exists(): boolean {
    return this.contents !== undefined;
  }

  read(): string {
    if (this.contents === undefined) {
      throw new Error('ENOENT: no state in memory backend');
    }
    return this.contents;
  }

  write(contents: string): void {
    this.contents = contents;
  }
}

const persistedEntrySchema = z.union([
  z.string().min(1),
  z.object({
    model: z.string().min(1),
    chatId: z.string().nullable().optional(),
  }),
]);

const persistedMapSchema = z.record(persistedEntrySchema);

// Legacy entries only exist between load and migration
type StoredEntry = { kind: 'legacy'; model: string } | { kind: 'record'; record: GuildConfigRecord };

export class GuildConfigStore {
  private readonly entries: Map<string, StoredEntry>;

  private constructor(
    private readonly backend: StateFileBackend,
    entries: Map<string, StoredEntry>,
    private readonly log: Logger
  ) {
    this.entries = entries;
  }

  /**
   * Read the state file. A missing, unreadable or malformed file yields an
   * empty store; this never throws.
   */
  static load(backend: StateFileBackend, log: Logger = defaultLogger): GuildConfigStore {
    if (!backend.exists()) {
      log.info(`No guild config found at ${backend.location}, starting empty`);
      return new GuildConfigStore(backend, new Map(), log);
    }

    try {
      const entries = GuildConfigStore.parse(backend);
      log.info(`Loaded ${entries.size} guild configs from ${backend.location}`);
      return new GuildConfigStore(backend, entries, log);
    } catch (error) {
      log.error(`Failed to decode ${backend.location}. Resetting to default.`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return new GuildConfigStore(backend, new Map(), log);
    }
  }

  private static parse(backend: StateFileBackend): Map<string, StoredEntry> {
    let raw: unknown;
    try {
      raw = JSON.parse(backend.read());
    } catch (error) {
      throw new ConfigCorruptError('State file is not valid JSON', backend.location, error);
    }

    const parsed = persistedMapSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigCorruptError(
        `State file has an unexpected shape: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        backend.location,
        parsed.error
      );
    }

    const entries = new Map<string, StoredEntry>();
    for (const [guildId, value] of Object.entries(parsed.data)) {
      entries.set(
        guildId,
        typeof value === 'string'
          ? { kind: 'legacy', model: value }
          : { kind: 'record', record: { selectedModel: value.model, sessionId: value.chatId ?? null } }
      );
    }
    return entries;
  }

  get size(): number {
    return this.entries.size;
  }

  has(guildId: string): boolean {
    return this.entries.has(guildId);
  }

  /**
   * Insert a fresh record for a guild that has none.
   * @returns true when an entry was created
   */
  ensureDefault(guildId: string, fallbackModel: string): boolean {
    if (this.entries.has(guildId)) {
      return false;
    }
    this.entries.set(guildId, { kind: 'record', record: { selectedModel: fallbackModel, sessionId: null } });
    return true;
  }

  /**
   * Rewrite every bare-string entry as a record.
   * @returns whether anything changed, so callers only persist when needed
   */
  migrateAll(): boolean {
    let migrated = false;
    for (const guildId of this.entries.keys()) {
      migrated = this.migrateEntry(guildId) || migrated;
    }
    return migrated;
  }

  migrateEntry(guildId: string): boolean {
    const entry = this.entries.get(guildId);
    if (entry?.kind !== 'legacy') {
      return false;
    }
    this.entries.set(guildId, { kind: 'record', record: { selectedModel: entry.model, sessionId: null } });
    this.log.info(`Migrated guild_id ${guildId} to new format.`);
    return true;
  }

  /**
   * Current settings for a guild. Unknown guilds get a default record that
   * is not stored.
   */
  get(guildId: string, fallbackModel: string): GuildConfigRecord {
    this.migrateEntry(guildId);
    const entry = this.entries.get(guildId);
    if (entry?.kind === 'record') {
      return { ...entry.record };
    }
    return { selectedModel: fallbackModel, sessionId: null };
  }

  /**
   * Switch model. A session belongs to one model's backend, so it is
   * always dropped.
   */
  setModel(guildId: string, model: string): void {
    this.entries.set(guildId, { kind: 'record', record: { selectedModel: model, sessionId: null } });
  }

  /**
   * @returns false (and changes nothing) when the guild has no entry
   */
  setSessionId(guildId: string, sessionId: string): boolean {
    const record = this.recordFor(guildId);
    if (!record) {
      return false;
    }
    record.sessionId = sessionId;
    return true;
  }

  clearSession(guildId: string): boolean {
    const record = this.recordFor(guildId);
    if (!record) {
      return false;
    }
    record.sessionId = null;
    return true;
  }

  private recordFor(guildId: string): GuildConfigRecord | undefined {
    this.migrateEntry(guildId);
    const entry = this.entries.get(guildId);
    return entry?.kind === 'record' ? entry.record : undefined;
  }

  toJSON(): PersistedGuildConfigMap {
    const out: PersistedGuildConfigMap = {};
    for (const [guildId, entry] of this.entries) {
      out[guildId] =
        entry.kind === 'legacy'
          ? entry.model
          : { model: entry.record.selectedModel, chatId: entry.record.sessionId };
    }
    return out;
  }

  serialize(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  /**
   * Overwrite the state file with the in-memory contents.
   * @throws ConfigPersistError on I/O failure; the in-memory state is kept
   */
  persist(): void {
    try {
      this.backend.write(this.serialize());
      this.log.debug(`Saved ${this.entries.size} guild configs to ${this.backend.location}`);
    } catch (error) {
      this.log.error('Failed to save guild config:', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ConfigPersistError(`Could not write ${this.backend.location}`, this.backend.location, error);
    }
  }
}
