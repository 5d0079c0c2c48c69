import { SlashCommandBuilder } from 'discord.js';
import { logger } from '@poe-relay/shared';
import type { RelayCommand } from './types.js';

export const reloadCommand: RelayCommand = {
  data: new SlashCommandBuilder()
    .setName('reload')
    .setDescription("Reload the bot's commands (Developer Only)."),

  async execute(interaction, { syncCommands, isOwner }) {
    await interaction.reply({ content: '🔄 Reloading bot commands...', ephemeral: true });

    try {
      if (!(await isOwner(interaction.user.id))) {
        await interaction.followUp('❌ Only the bot owner can reload commands.');
        logger.warn(`Reload refused for ${interaction.user.username}`);
        return;
      }

      const count = await syncCommands();
      await interaction.followUp('✅ Bot commands reloaded successfully.');
      logger.info(`Commands reloaded by ${interaction.user.username} (${count} synced)`);
    } catch (error) {
      logger.error('Error reloading commands:', error);
      await interaction.followUp('❌ Failed to reload commands.');
    }
  },
};
