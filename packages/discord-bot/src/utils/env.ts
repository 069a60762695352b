/**
 * @description: Loads and validates Discord bot environment configuration and defaults.
 * @parley-scope: utility
 * @parley-module: EnvConfig
 * @parley-risk: high - Misconfiguration can break auth, rate limits or reply deadlines.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';
import { DISCORD_MESSAGE_LIMIT } from './response/ResponseSplitter.js';
import { DEFAULT_MODEL } from './openaiService.js';

type EnvSource = Record<string, string | undefined>;

/**
 * List of required environment variables that must be set for the application to run.
 */
const REQUIRED_ENV_VARS: readonly string[] = [
  'DISCORD_TOKEN',    // Discord bot token for authentication
  'CLIENT_ID',        // Discord application client ID
  'OPENAI_API_KEY',   // OpenAI API key for completions
  'USAGE_PSEUDONYMIZATION_SECRET' // Secret key for HMAC pseudonymization of user IDs in usage stats
] as const;

/**
 * Default rate limit configuration: 10 requests per user per minute.
 */
const DEFAULT_RATE_LIMITS = {
  LIMIT: 10,
  WINDOW_MS: 60_000
} as const;

/**
 * Default interaction deadlines.
 * @property {number} ACK_DEADLINE_MS - Platform acknowledgment deadline, measured from event creation
 * @property {number} COMPLETION_TIMEOUT_MS - Completion deadline, measured from acknowledgment
 */
const DEFAULT_DEADLINES = {
  ACK_DEADLINE_MS: 3_000,
  COMPLETION_TIMEOUT_MS: 15 * 60_000
} as const;

/** How often due reminders are looked for. */
const DEFAULT_REMINDER_POLL_INTERVAL_MS = 60_000;

const DEFAULT_DATABASE_PATH = 'data/parley.db';

export interface BotConfig {
  token: string;
  clientId: string;
  /** Registers commands to one guild instead of globally when set. */
  guildId?: string;
  /** Isolation key for stored state; defaults to the client user id at login. */
  botId?: string;
  openaiApiKey: string;
  openaiModel: string;
  usagePseudonymizationSecret: string;
  databasePath: string;
  personaConfigPath?: string;
  env: string;
  isProduction: boolean;
  rateLimit: {
    limit: number;
    windowMs: number;
  };
  interactions: {
    ackDeadlineMs: number;
    completionTimeoutMs: number;
    maxChunkSize: number;
  };
  reminders: {
    pollIntervalMs: number;
  };
}

/**
 * Loads the repository-level .env file when present. Injected variables win.
 */
export function loadDotenv(): void {
  const envPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../../.env');
  logger.debug(`Loading environment variables from: ${envPath}`);

  if (!fs.existsSync(envPath)) {
    logger.debug('No .env file found; relying on injected environment variables.');
    return;
  }

  const { error, parsed } = dotenv.config({ path: envPath });
  if (error) {
    logger.warn(`Failed to load .env file: ${error.message}`);
  } else if (parsed) {
    logger.debug(`Loaded environment variables: ${Object.keys(parsed).join(', ')}`);
  }
}

/**
 * Reads a numeric configuration value; invalid or out-of-range input yields the default
 */
export function getNumberEnv(env: EnvSource, key: string, defaultValue: number, minimum = 0): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < minimum) {
    logger.warn(
      `Ignoring invalid numeric value for ${key}: "${value}". Expected a number >= ${minimum}; using default (${defaultValue}).`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Gets a boolean from environment variables with a default value
 */
export function getBooleanEnv(env: EnvSource, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.trim().toLowerCase() === 'true';
}

const optionalString = (env: EnvSource, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

/**
 * Validates that all required environment variables are set.
 * @throws {Error} If any required environment variable is missing
 */
function requireEnv(env: EnvSource, key: string): string {
  const value = optionalString(env, key);
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Builds the application configuration from `env`.
 */
export function loadConfig(env: EnvSource = process.env): BotConfig {
  const missing = REQUIRED_ENV_VARS.filter((key) => !optionalString(env, key));
  if (missing.length > 0) {
    throw new Error(`Missing required environment variable: ${missing.join(', ')}`);
  }

  const nodeEnv = env.NODE_ENV || 'development';
  const rawChunkSize = Math.floor(getNumberEnv(env, 'MAX_CHUNK_SIZE', DISCORD_MESSAGE_LIMIT, 1));
  const maxChunkSize = Math.min(rawChunkSize, DISCORD_MESSAGE_LIMIT);
  if (maxChunkSize !== rawChunkSize) {
    logger.warn(`MAX_CHUNK_SIZE ${rawChunkSize} exceeds Discord's limit; using ${DISCORD_MESSAGE_LIMIT}.`);
  }

  const config: BotConfig = {
    token: requireEnv(env, 'DISCORD_TOKEN'),
    clientId: requireEnv(env, 'CLIENT_ID'),
    guildId: optionalString(env, 'GUILD_ID'),
    botId: optionalString(env, 'BOT_ID'),
    openaiApiKey: requireEnv(env, 'OPENAI_API_KEY'),
    openaiModel: optionalString(env, 'OPENAI_MODEL') ?? DEFAULT_MODEL,
    usagePseudonymizationSecret: requireEnv(env, 'USAGE_PSEUDONYMIZATION_SECRET'),
    databasePath: optionalString(env, 'DATABASE_PATH') ?? DEFAULT_DATABASE_PATH,
    personaConfigPath: optionalString(env, 'PERSONA_CONFIG_PATH'),
    env: nodeEnv,
    isProduction: nodeEnv === 'production',
    rateLimit: {
      limit: Math.floor(getNumberEnv(env, 'RATE_LIMIT', DEFAULT_RATE_LIMITS.LIMIT, 1)),
      windowMs: getNumberEnv(env, 'RATE_WINDOW_MS', DEFAULT_RATE_LIMITS.WINDOW_MS, 1)
    },
    interactions: {
      ackDeadlineMs: getNumberEnv(env, 'ACK_DEADLINE_MS', DEFAULT_DEADLINES.ACK_DEADLINE_MS, 1),
      completionTimeoutMs: getNumberEnv(env, 'COMPLETION_TIMEOUT_MS', DEFAULT_DEADLINES.COMPLETION_TIMEOUT_MS, 1),
      maxChunkSize
    },
    reminders: {
      pollIntervalMs: getNumberEnv(env, 'REMINDER_POLL_INTERVAL_MS', DEFAULT_REMINDER_POLL_INTERVAL_MS, 1_000)
    }
  };

  logger.debug(`Rate limit: ${config.rateLimit.limit} per ${config.rateLimit.windowMs}ms`);
  return config;
}
