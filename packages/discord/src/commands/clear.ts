import { SlashCommandBuilder } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { GUILD_ONLY_MESSAGE, type RelayCommand } from './types.js';

export const clearCommand: RelayCommand = {
  data: new SlashCommandBuilder().setName('clear').setDescription('Clear the conversation context.'),

  async execute(interaction, { store, provider, config }) {
    logger.info(`Clear requested by ${interaction.user.username}`);
    await interaction.reply({ content: '🧹 Clearing the conversation context...', ephemeral: true });

    const guildId = interaction.guildId;
    if (!guildId) {
      await interaction.followUp(GUILD_ONLY_MESSAGE);
      return;
    }

    try {
      if (!store.has(guildId)) {
        await interaction.followUp('❌ No conversation context found to clear.');
        logger.warn(`No conversation context found for guild ${guildId}`);
        return;
      }

      if (store.migrateEntry(guildId)) {
        store.persist();
      }
      const { selectedModel, sessionId } = store.get(guildId, config.defaultModel);
      if (!sessionId) {
        await interaction.followUp('❌ No active conversation thread to clear.');
        logger.warn(`No active chatId found for guild ${guildId}`);
        return;
      }

      await provider.breakSession(selectedModel, sessionId);

      store.clearSession(guildId);
      store.persist();
      await interaction.followUp('✅ The conversation context has been cleared.');
      logger.info(`Cleared conversation context for guild ${guildId} by ${interaction.user.username}`);
    } catch (error) {
      logger.error('Error clearing conversation context:', error);
      await interaction.followUp(
        '❌ Sorry, there was an error clearing the conversation context. Please try again later.'
      );
    }
  },
};
