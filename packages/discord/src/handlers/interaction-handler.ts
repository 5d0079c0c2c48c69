import { Client, Events, Interaction } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { relayCommands } from '../commands/index.js';
import type { CommandContext, RelayCommand, RelayInteraction } from '../commands/types.js';
import { generateCorrelationId, getShortCorrelationId } from '../utils/correlation.js';

export interface SlashInteraction extends RelayInteraction {
  readonly replied: boolean;
  readonly deferred: boolean;
}

export type CommandRegistry = Map<string, RelayCommand>;

export function createCommandRegistry(commands: RelayCommand[] = relayCommands): CommandRegistry {
  return new Map(commands.map((command) => [command.data.name, command]));
}

export function setupInteractionHandler(
  client: Client,
  context: CommandContext,
  registry: CommandRegistry = createCommandRegistry()
) {
  client.on(Events.InteractionCreate, async (interaction: Interaction) => {
    if (interaction.isChatInputCommand()) {
      await handleSlashCommand(interaction, registry, context);
    }
  });

  logger.info(`Interaction handler setup complete with ${registry.size} commands`);
}

export async function handleSlashCommand(
  interaction: SlashInteraction,
  registry: CommandRegistry,
  context: CommandContext
): Promise<void> {
  // Generate correlation ID for command tracking
  const correlationId = generateCorrelationId();
  const shortId = getShortCorrelationId(correlationId);

  const command = registry.get(interaction.commandName);
  if (!command) {
    logger.warn(`Unknown command [${shortId}]:`, {
      correlationId,
      command: interaction.commandName,
      userId: interaction.user.id,
    });
    return;
  }

  const startTime = Date.now();

  try {
    logger.info(`Executing command [${shortId}]:`, {
      correlationId,
      command: interaction.commandName,
      userId: interaction.user.id,
      username: interaction.user.username,
      guildId: interaction.guildId,
    });

    await command.execute(interaction, context);

    logger.info(`Command completed [${shortId}]:`, {
      correlationId,
      command: interaction.commandName,
      duration: Date.now() - startTime,
      userId: interaction.user.id,
    });
  } catch (error) {
    logger.error(`Command failed [${shortId}]:`, {
      correlationId,
      command: interaction.commandName,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      duration: Date.now() - startTime,
      userId: interaction.user.id,
    });

    const errorMessage = `❌ There was an error executing this command! [${shortId}]`;

    try {
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(errorMessage);
      } else {
        await interaction.reply({ content: errorMessage, ephemeral: true });
      }
    } catch (replyError) {
      logger.error(`Failed to send error reply [${shortId}]:`, {
        correlationId,
        replyError: replyError instanceof Error ? replyError.message : String(replyError),
      });
    }
  }
}
