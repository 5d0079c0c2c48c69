/**
 * Runtime configuration, read once from the environment at startup.
 */

import { z } from 'zod';
import { DEFAULT_POE_BASE_URL, DEFAULT_POE_MODEL } from '@poe-relay/shared';
import { ConfigurationError } from '../../types/errors.js';

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  POE_API_KEY: z.string().min(1, 'POE_API_KEY is required'),
  // Snowflakes outgrow Number.MAX_SAFE_INTEGER, so keep the digits as text
  GUILD_ID: z
    .string({ required_error: 'GUILD_ID is required' })
    .regex(/^\d+$/, 'GUILD_ID must be an integer'),
  POE_BASE_URL: z.string().url().default(DEFAULT_POE_BASE_URL),
  POE_DEFAULT_MODEL: z.string().min(1).default(DEFAULT_POE_MODEL),
  LLM_CHOICES_FILE: z.string().min(1).optional(),
});

export interface RelayConfig {
  discordToken: string;
  poeApiKey: string;
  guildId: string;
  poeBaseUrl: string;
  defaultModel: string;
  stateFile?: string;
}

/**
 * Validate the environment. Empty strings count as missing.
 * @throws ConfigurationError listing every invalid variable
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const variable = issue.path.join('.');
      return issue.code === 'invalid_type' && issue.received === 'undefined'
        ? `${variable} is required`
        : issue.message;
    });
    throw new ConfigurationError(
      `One or more environment variables are missing or invalid: ${issues.join(', ')}`,
      issues
    );
  }

  const values = parsed.data;
  return {
    discordToken: values.DISCORD_TOKEN,
    poeApiKey: values.POE_API_KEY,
    guildId: values.GUILD_ID,
    poeBaseUrl: values.POE_BASE_URL,
    defaultModel: values.POE_DEFAULT_MODEL,
    stateFile: values.LLM_CHOICES_FILE,
  };
}
