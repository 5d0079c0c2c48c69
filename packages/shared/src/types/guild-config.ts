/**
 * Per-guild relay settings as the rest of the bot sees them.
 * A null sessionId means the next prompt opens a new conversation.
 */
export interface GuildConfigRecord {
  selectedModel: string;
  sessionId: string | null;
}

/**
 * On-disk shape of a single guild entry. Older state files stored only the
 * model handle as a bare string.
 */
export interface PersistedGuildConfig {
  model: string;
  chatId: string | null;
}

export type PersistedGuildEntry = PersistedGuildConfig | string;

export type PersistedGuildConfigMap = Record<string, PersistedGuildEntry>;
