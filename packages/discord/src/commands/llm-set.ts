import { SlashCommandBuilder } from 'discord.js';
import { logger } from '@poe-relay/shared';
import { GUILD_ONLY_MESSAGE, type RelayCommand } from './types.js';

export const llmSetCommand: RelayCommand = {
  data: new SlashCommandBuilder()
    .setName('llm-set')
    .setDescription('Set your preferred LLM model.')
    .addStringOption((option) =>
      option.setName('model').setDescription('Model handle, as shown by /llm-list').setRequired(true)
    ),

  async execute(interaction, { store, provider, config }) {
    const model = interaction.options.getString('model', true);
    logger.info(`LLM set requested by ${interaction.user.username}: ${model}`);
    await interaction.reply({ content: '⚙️ Setting your preferred LLM model...', ephemeral: true });

    const guildId = interaction.guildId;
    if (!guildId) {
      await interaction.followUp(GUILD_ONLY_MESSAGE);
      return;
    }

    try {
      const models = await provider.listModels();
      if (!models.includes(model)) {
        await interaction.followUp(
          `❌ \`${model}\` is not a valid model. Use \`/llm-list\` to see all available models.`
        );
        logger.warn(`Invalid model attempted by ${interaction.user.username}: ${model}`);
        return;
      }

      const previousSession = store.get(guildId, config.defaultModel).sessionId;
      store.setModel(guildId, model);
      if (previousSession) {
        provider.releaseSession(previousSession);
      }
      store.persist();
      await interaction.followUp(`✅ Your preferred LLM model has been set to \`${model}\`.`);
      logger.info(`Set model for guild ${guildId} to ${model} by ${interaction.user.username}`);
    } catch (error) {
      logger.error('Error setting LLM model:', error);
      await interaction.followUp(
        '❌ Sorry, there was an error setting your preferred model. Please try again later.'
      );
    }
  },
};
