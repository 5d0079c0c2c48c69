import { SlashCommandBuilder } from 'discord.js';
import type { RelayCommand } from './types.js';

export const HELP_TEXT = [
  '**PoeBot Commands:**',
  '`/askpoe prompt: <your prompt>` - Send a prompt to Poe.com and receive a reply.',
  '`/llm-list` - List all available LLM models.',
  '`/llm-set model: <model name>` - Set your preferred LLM model.',
  '`/reset` - Reset the conversation thread.',
  '`/info` - Display Poe API settings and current model information.',
  '`/clear` - Clear the conversation context.',
  '`/help` - Display this help message.',
].join('\n');

export const helpCommand: RelayCommand = {
  data: new SlashCommandBuilder().setName('help').setDescription('Display available commands.'),

  async execute(interaction) {
    await interaction.reply({ content: HELP_TEXT, ephemeral: true });
  },
};
