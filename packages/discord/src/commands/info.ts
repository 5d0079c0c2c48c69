import { SlashCommandBuilder } from 'discord.js';
import { logger, type GuildConfigRecord } from '@poe-relay/shared';
import type { ModelInfo, ProviderSettings } from '../services/poe-client.js';
import { GUILD_ONLY_MESSAGE, type RelayCommand } from './types.js';

function display(value: string | number | null): string {
  return value === null ? 'N/A' : String(value);
}

export function formatInfo(
  settings: ProviderSettings,
  record: GuildConfigRecord,
  modelInfo: ModelInfo | null
): string {
  const lines = ['**Poe API Settings:**', `- **Point Balance**: ${display(settings.pointBalance)}`, ''];

  if (!modelInfo) {
    lines.push('❌ Unable to retrieve current model information.');
    return lines.join('\n');
  }

  lines.push(
    '**Current Model Information:**',
    `- **Handle**: ${modelInfo.handle}`,
    `- **Owned By**: ${display(modelInfo.ownedBy)}`,
    `- **Created**: ${display(modelInfo.createdAt ? modelInfo.createdAt.toISOString().slice(0, 10) : null)}`,
    `- **Conversation**: ${record.sessionId ? `active (\`${record.sessionId}\`)` : 'none'}`
  );
  return lines.join('\n');
}

export const infoCommand: RelayCommand = {
  data: new SlashCommandBuilder()
    .setName('info')
    .setDescription('Display Poe API settings and current model information.'),

  async execute(interaction, { store, provider, config }) {
    logger.info(`Info requested by ${interaction.user.username}`);
    await interaction.reply({
      content: '📄 Fetching Poe API settings and model information...',
      ephemeral: true,
    });

    const guildId = interaction.guildId;
    if (!guildId) {
      await interaction.followUp(GUILD_ONLY_MESSAGE);
      return;
    }

    try {
      let settings: ProviderSettings;
      try {
        settings = await provider.getSettings();
      } catch (error) {
        logger.warn(`Failed to retrieve Poe API settings for ${interaction.user.username}`, error);
        await interaction.followUp('❌ Failed to retrieve Poe API settings.');
        return;
      }

      if (store.migrateEntry(guildId)) {
        store.persist();
      }
      const record = store.get(guildId, config.defaultModel);

      let modelInfo: ModelInfo | null = null;
      try {
        modelInfo = await provider.getModelInfo(record.selectedModel);
      } catch (error) {
        logger.warn(`Failed to retrieve model info for ${record.selectedModel}`, error);
      }

      await interaction.followUp(formatInfo(settings, record, modelInfo));
      logger.info(`Sent info to ${interaction.user.username}`);
    } catch (error) {
      logger.error('Error fetching info:', error);
      await interaction.followUp('❌ Sorry, there was an error fetching the info. Please try again later.');
    }
  },
};
