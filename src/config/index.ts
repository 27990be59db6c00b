import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { DEFAULT_DISCORD_USER_AGENT, DISCORD_API_VERSION, DISCORD_SERVER_URL } from '../constants';

/**
 * Discord REST configuration
 */
export interface DiscordConfig {
  server: string;
  apiVersion: number;
  applicationId?: string;
  botToken?: string;
  timeout: string; // e.g., '15s'
  userAgent: string;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: string;
}

/**
 * Application configuration
 */
export interface AppConfig {
  logging: LoggingConfig;
  discord: DiscordConfig;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

const fileConfigSchema = z
  .object({
    logging: z.object({ level: z.string().optional() }).optional(),
    discord: z
      .object({
        server: z.string(),
        apiVersion: z.number().int().positive(),
        applicationId: z
          .union([z.string(), z.number().int().nonnegative()])
          .refine((value) => typeof value === 'string' || Number.isSafeInteger(value), {
            message: 'discord.applicationId is too large for a YAML number, quote it',
          })
          .transform(String),
        botToken: z.string(),
        timeout: z.string(),
        userAgent: z.string(),
      })
      .partial()
      .optional(),
  })
  .nullish();

function defaultConfig(): AppConfig {
  return {
    logging: {
      level: 'info',
    },
    discord: {
      server: DISCORD_SERVER_URL,
      apiVersion: DISCORD_API_VERSION,
      timeout: '15s',
      userAgent: DEFAULT_DISCORD_USER_AGENT,
    },
  };
}

/**
 * Parse duration string to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(ms|[smhd])$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`);
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  switch (unit) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    case 'd':
      return value * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

/**
 * Load configuration from YAML file and environment variables
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const configPath = options.configPath ?? path.join(__dirname, 'default.yaml');
  const env = options.env ?? process.env;
  const config = defaultConfig();

  if (fs.existsSync(configPath)) {
    try {
      const fileContents = fs.readFileSync(configPath, 'utf8');
      const fileConfig = fileConfigSchema.parse(yaml.load(fileContents));
      if (fileConfig?.logging?.level) {
        config.logging.level = fileConfig.logging.level;
      }
      if (fileConfig?.discord) {
        config.discord = { ...config.discord, ...fileConfig.discord };
      }
    } catch (e) {
      console.error(`Failed to load config from ${configPath}: ${e}`);
      throw e;
    }
  }

  // Override with environment variables
  if (env.LOG_LEVEL) {
    config.logging.level = env.LOG_LEVEL;
  }
  if (env.DISCORD_SERVER) {
    config.discord.server = env.DISCORD_SERVER;
  }
  if (env.DISCORD_API_VERSION) {
    const apiVersion = parseInt(env.DISCORD_API_VERSION, 10);
    if (!isNaN(apiVersion)) {
      config.discord.apiVersion = apiVersion;
    }
  }
  if (env.DISCORD_APPLICATION_ID) {
    config.discord.applicationId = env.DISCORD_APPLICATION_ID;
  }
  if (env.DISCORD_BOT_TOKEN) {
    config.discord.botToken = env.DISCORD_BOT_TOKEN;
  }
  if (env.DISCORD_HTTP_TIMEOUT) {
    parseDuration(env.DISCORD_HTTP_TIMEOUT);
    config.discord.timeout = env.DISCORD_HTTP_TIMEOUT;
  }
  if (env.DISCORD_USER_AGENT) {
    config.discord.userAgent = env.DISCORD_USER_AGENT;
  }

  return config;
}

/**
 * Configuration instance
 */
export const config = loadConfig();

/**
 * Get HTTP request timeout in milliseconds
 */
export function getHttpTimeoutMs(appConfig: AppConfig = config): number {
  return parseDuration(appConfig.discord.timeout);
}
