// Discord rejects message content longer than this
export const DISCORD_MESSAGE_LIMIT = 2000;

export const DEFAULT_POE_BASE_URL = 'https://api.poe.com/v1';
export const DEFAULT_POE_MODEL = 'GPT-3.5-Turbo';
export const LLM_CHOICES_FILENAME = 'llm_choices.json';

// Conversations the Poe client keeps in memory at once
export const DEFAULT_MAX_SESSIONS = 200;
