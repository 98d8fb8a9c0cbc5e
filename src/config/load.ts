import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';
import { formatIssues } from '../core/validation.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

/** Loads `.env` (or DOTENV_CONFIG_PATH) into process.env without overriding variables already set. */
export const loadEnvFile = (env: NodeJS.ProcessEnv = process.env): void => {
  dotenv.config({ path: env.DOTENV_CONFIG_PATH || '.env', processEnv: env });
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Config validation failed: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};
