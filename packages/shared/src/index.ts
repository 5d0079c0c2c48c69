// Guild configuration types
export * from './types/guild-config.js';

// Constants
export * from './constants/discord.js';

// Utilities
export * from './utils/logger.js';
