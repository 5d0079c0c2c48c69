import { SlashCommandBuilder } from 'discord.js';
import { logger, performanceLogger } from '@poe-relay/shared';
import { chunkReply } from '../utils/message-chunker.js';
import { PrefixTooLongError } from '../../types/errors.js';
import { GUILD_ONLY_MESSAGE, authorName, type RelayCommand } from './types.js';

export const askCommand: RelayCommand = {
  data: new SlashCommandBuilder()
    .setName('askpoe')
    .setDescription('Send a prompt to Poe.com and receive a reply.')
    .addStringOption((option) =>
      option.setName('prompt').setDescription('What to ask the selected model').setRequired(true)
    ),

  async execute(interaction, { store, provider, config }) {
    const prompt = interaction.options.getString('prompt', true);
    logger.info(`Received prompt from ${interaction.user.username}: ${prompt}`);
    await interaction.reply({ content: '⚙️ Processing your request...', ephemeral: true });

    const guildId = interaction.guildId;
    if (!guildId) {
      await interaction.followUp(GUILD_ONLY_MESSAGE);
      return;
    }

    try {
      if (store.migrateEntry(guildId)) {
        store.persist();
      }
      const { selectedModel, sessionId } = store.get(guildId, config.defaultModel);

      let response = '';
      let activeSession = sessionId;
      await performanceLogger.measureAsync(
        `Poe reply from ${selectedModel}`,
        async () => {
          for await (const fragment of provider.sendMessage(selectedModel, prompt, sessionId)) {
            response += fragment.text;

            // Provider opened a new conversation
            if (fragment.sessionId !== activeSession) {
              activeSession = fragment.sessionId;
              if (store.setSessionId(guildId, fragment.sessionId)) {
                store.persist();
              }
            }
          }
        },
        { guildId, model: selectedModel }
      );

      if (!response) {
        await interaction.followUp('❌ Sorry, I could not generate a response.');
        logger.warn(`No response generated for ${interaction.user.username}`);
        return;
      }

      const prefix = `**${authorName(interaction)}:** ${prompt}\n**${selectedModel}:** `;
      let segments: string[];
      try {
        segments = chunkReply(prefix, response);
      } catch (error) {
        if (error instanceof PrefixTooLongError) {
          await interaction.followUp('❌ The combined prompt and reply are too long to display.');
          return;
        }
        throw error;
      }

      for (const segment of segments) {
        await interaction.followUp(segment);
      }
      logger.info(`Sent response to ${interaction.user.username}`, {
        guildId,
        responseLength: response.length,
        segments: segments.length,
      });
    } catch (error) {
      logger.error('Error processing request:', error);
      await interaction.followUp('❌ Sorry, there was an error processing your request. Please try again later.');
    }
  },
};
