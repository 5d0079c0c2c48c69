import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Load .env from monorepo root (go up from packages/discord/src to monorepo root)
config({ path: resolve(__dirname, '../../../.env') });
// Also try package-specific .env
config({ path: resolve(__dirname, '../.env') });

import { Client, GatewayIntentBits, Events, Team } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { loadRelayConfig, type RelayConfig } from './config/env.js';
import { GuildConfigStore, createJsonFileBackend } from './services/guild-config-store.js';
import { PoeClient } from './services/poe-client.js';
import { relayCommands } from './commands/index.js';
import type { CommandContext } from './commands/types.js';
import { setupInteractionHandler } from './handlers/interaction-handler.js';
import { PathResolver } from './utils/path-resolver.js';

function openStore(relayConfig: RelayConfig): GuildConfigStore {
  const paths = new PathResolver();
  if (!relayConfig.stateFile) {
    paths.ensureDataDirectory();
  }

  const store = GuildConfigStore.load(createJsonFileBackend(paths.getStateFilePath(relayConfig.stateFile)));

  // Older state files stored only the model name
  if (store.migrateAll()) {
    store.persist();
  }

  if (store.ensureDefault(relayConfig.guildId, relayConfig.defaultModel)) {
    logger.info(`Created default config for guild ${relayConfig.guildId} (${relayConfig.defaultModel})`);
    store.persist();
  }

  return store;
}

async function start() {
  const relayConfig = loadRelayConfig();
  const store = openStore(relayConfig);
  const provider = new PoeClient({ apiKey: relayConfig.poeApiKey, baseURL: relayConfig.poeBaseUrl });

  const client = new Client({
    intents: [GatewayIntentBits.Guilds],
  });

  const syncCommands = async (): Promise<number> => {
    const guild = await client.guilds.fetch(relayConfig.guildId);
    const synced = await guild.commands.set(relayCommands.map((command) => command.data.toJSON()));
    return synced.size;
  };

  const isOwner = async (userId: string): Promise<boolean> => {
    const application = await client.application?.fetch();
    const owner = application?.owner;
    if (!owner) {
      return false;
    }
    return owner instanceof Team ? owner.members.has(userId) : owner.id === userId;
  };

  const context: CommandContext = {
    store,
    provider,
    config: relayConfig,
    syncCommands,
    isOwner,
  };

  client.once(Events.ClientReady, async (readyClient) => {
    logger.info(`✅ discord: ${readyClient.user.tag} (ID: ${readyClient.user.id})`);
    try {
      // Register slash commands to a specific guild for immediate syncing
      const count = await syncCommands();
      logger.info(`Successfully synced ${count} command(s) to guild ${relayConfig.guildId}`);
    } catch (error) {
      logger.error('Error syncing commands:', error);
    }
  });

  client.on(Events.Error, (error) => {
    logger.error('Discord client error:', error);
  });

  setupInteractionHandler(client, context);

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down Discord bot`);
    client
      .destroy()
      .catch((error: unknown) => logger.error('Error while closing Discord client:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await client.login(relayConfig.discordToken);
}

start().catch((error: unknown) => {
  logger.error('Failed to start Discord bot:', error);
  process.exit(1);
});
