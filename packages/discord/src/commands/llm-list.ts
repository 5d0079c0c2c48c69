import { SlashCommandBuilder } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { chunkReply } from '../utils/message-chunker.js';
import type { RelayCommand } from './types.js';

const LIST_HEADER = '**Available LLM Models:**\n';

export const llmListCommand: RelayCommand = {
  data: new SlashCommandBuilder().setName('llm-list').setDescription('List all available LLM models.'),

  async execute(interaction, { provider }) {
    logger.info(`LLM list requested by ${interaction.user.username}`);
    await interaction.reply({ content: '🔍 Fetching available LLM models...', ephemeral: true });

    let models: string[];
    try {
      models = await provider.listModels();
    } catch (error) {
      logger.error('Error fetching LLM list:', error);
      await interaction.followUp('❌ Sorry, there was an error fetching the models.');
      return;
    }

    if (models.length === 0) {
      await interaction.followUp('❌ No available models found.');
      logger.warn(`No models found when requested by ${interaction.user.username}`);
      return;
    }

    // Poe lists hundreds of bots, more than one message holds
    const list = models.map((model) => `- ${model}`).join('\n');
    for (const segment of chunkReply(LIST_HEADER, list)) {
      await interaction.followUp(segment);
    }
    logger.info(`Sent LLM list to ${interaction.user.username}`);
  },
};
