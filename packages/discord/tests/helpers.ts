import { vi } from 'vitest';
import type { CommandContext } from '../src/commands/types.js';
import type { SlashInteraction } from '../src/handlers/interaction-handler.js';
import { GuildConfigStore, MemoryStateBackend } from '../src/services/guild-config-store.js';
import type { ChatProvider, ModelInfo, ProviderSettings, ReplyFragment } from '../src/services/poe-client.js';

export const DEFAULT_MODEL = 'GPT-3.5-Turbo';

export interface FakeInteraction extends SlashInteraction {
  replies: Array<{ content: string; ephemeral: boolean }>;
  followUps: string[];
}

export function createInteraction(
  overrides: {
    commandName?: string;
    guildId?: string | null;
    displayName?: string;
    nickname?: string;
    options?: Record<string, string>;
  } = {}
): FakeInteraction {
  const options = overrides.options ?? {};
  const interaction: FakeInteraction = {
    commandName: overrides.commandName ?? 'askpoe',
    guildId: overrides.guildId === undefined ? 'g1' : overrides.guildId,
    user: {
      id: 'user-1',
      username: 'bob_user',
      displayName: overrides.displayName ?? 'bob',
    },
    member: overrides.nickname === undefined ? null : { nick: overrides.nickname },
    options: {
      getString(name: string): string {
        const value = options[name];
        if (value === undefined) {
          throw new Error(`Missing option ${name}`);
        }
        return value;
      },
    },
    replied: false,
    deferred: false,
    replies: [],
    followUps: [],
    reply: vi.fn(async (payload: { content: string; ephemeral: boolean }) => {
      interaction.replies.push(payload);
    }),
    followUp: vi.fn(async (content: string) => {
      interaction.followUps.push(content);
    }),
  };
  return interaction;
}

/**
 * ChatProvider whose answers are set per test.
 */
export class ScriptedProvider implements ChatProvider {
  models: string[] = ['GPT-3.5-Turbo', 'Claude-3-Haiku'];
  settings: ProviderSettings = { pointBalance: 1500 };
  modelInfo: ModelInfo = { handle: 'GPT-3.5-Turbo', ownedBy: 'OpenAI', createdAt: new Date('2024-03-01T00:00:00Z') };
  fragments: ReplyFragment[] = [];
  failWith: Error | null = null;

  sendCalls: Array<{ handle: string; prompt: string; sessionId: string | null }> = [];
  breakCalls: Array<{ handle: string; sessionId: string }> = [];
  released: string[] = [];

  async listModels(): Promise<string[]> {
    if (this.failWith) throw this.failWith;
    return this.models;
  }

  async getSettings(): Promise<ProviderSettings> {
    if (this.failWith) throw this.failWith;
    return this.settings;
  }

  async getModelInfo(): Promise<ModelInfo> {
    if (this.failWith) throw this.failWith;
    return this.modelInfo;
  }

  async *sendMessage(handle: string, prompt: string, sessionId: string | null): AsyncGenerator<ReplyFragment> {
    this.sendCalls.push({ handle, prompt, sessionId });
    if (this.failWith) throw this.failWith;
    for (const fragment of this.fragments) {
      yield fragment;
    }
  }

  async breakSession(handle: string, sessionId: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.breakCalls.push({ handle, sessionId });
  }

  releaseSession(sessionId: string): void {
    this.released.push(sessionId);
  }
}

/**
 * Backend whose writes always fail, as on a read-only volume.
 */
export class ReadOnlyStateBackend extends MemoryStateBackend {
  write(): void {
    throw new Error('EROFS: read-only file system');
  }
}

export function createContext(initialState?: string, backend = new MemoryStateBackend(initialState)) {
  const store = GuildConfigStore.load(backend);
  const provider = new ScriptedProvider();
  const context: CommandContext = {
    store,
    provider,
    config: { guildId: 'g1', defaultModel: DEFAULT_MODEL },
    syncCommands: vi.fn(async () => 8),
    isOwner: vi.fn(async () => true),
  };
  return { backend, store, provider, context };
}

export function persisted(backend: MemoryStateBackend): unknown {
  return backend.contents === undefined ? undefined : JSON.parse(backend.contents);
}
