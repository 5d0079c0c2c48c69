import { SlashCommandBuilder } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { GUILD_ONLY_MESSAGE, type RelayCommand } from './types.js';

export const resetCommand: RelayCommand = {
  data: new SlashCommandBuilder().setName('reset').setDescription('Reset the conversation thread.'),

  async execute(interaction, { store, provider, config }) {
    logger.info(`Reset requested by ${interaction.user.username}`);
    await interaction.reply({ content: '🧹 Resetting the conversation thread...', ephemeral: true });

    const guildId = interaction.guildId;
    if (!guildId) {
      await interaction.followUp(GUILD_ONLY_MESSAGE);
      return;
    }

    try {
      if (!store.has(guildId)) {
        await interaction.followUp('❌ Guild not found.');
        logger.warn(`Guild ${guildId} not found when reset was requested by ${interaction.user.username}`);
        return;
      }

      const previousSession = store.get(guildId, config.defaultModel).sessionId;
      store.clearSession(guildId);
      if (previousSession) {
        provider.releaseSession(previousSession);
      }
      store.persist();
      await interaction.followUp(
        '✅ The conversation has been reset. The next prompt will start a new conversation.'
      );
      logger.info(`Conversation thread reset for guild ${guildId} by ${interaction.user.username}`);
    } catch (error) {
      logger.error('Error resetting conversation thread:', error);
      await interaction.followUp(
        '❌ Sorry, there was an error resetting the conversation. Please try again later.'
      );
    }
  },
};
