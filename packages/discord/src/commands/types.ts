import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { GuildConfigStore } from '../services/guild-config-store.js';
import type { ChatProvider } from '../services/poe-client.js';
import type { RelayConfig } from '../config/env.js';

/**
 * The slice of discord.js's ChatInputCommandInteraction the relay commands
 * use. Every command acknowledges with an ephemeral reply first and then
 * delivers results as follow-ups.
 */
export interface RelayInteraction {
  readonly commandName: string;
  readonly guildId: string | null;
  readonly user: {
    readonly id: string;
    readonly username: string;
    readonly displayName: string;
  };
  /** Guild member as discord.js resolves it, or the raw API member when uncached. */
  readonly member: { readonly displayName: string } | { readonly nick?: string | null } | null;
  readonly options: {
    getString(name: string, required: true): string;
  };
  reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
  followUp(content: string): Promise<unknown>;
}

export interface CommandContext {
  store: GuildConfigStore;
  provider: ChatProvider;
  config: Pick<RelayConfig, 'guildId' | 'defaultModel'>;
  /** Re-register the slash commands with the configured guild; resolves to the count. */
  syncCommands(): Promise<number>;
  isOwner(userId: string): Promise<boolean>;
}

export interface RelayCommand {
  data: {
    readonly name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute(interaction: RelayInteraction, context: CommandContext): Promise<void>;
}

/**
 * Name shown for the invoking user: the guild nickname when there is one.
 */
export function authorName(interaction: RelayInteraction): string {
  const { member } = interaction;
  if (member && 'displayName' in member) {
    return member.displayName;
  }
  return member?.nick || interaction.user.displayName;
}

export const GUILD_ONLY_MESSAGE = '❌ This command can only be used in a server.';
