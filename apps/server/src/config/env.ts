/**
 * Environment configuration
 *
 * `.env` is loaded from the project root with dotenv, then the environment is
 * validated with zod. Connector settings fall back to the EMBY_* names when
 * the MEDIA_SERVER_* ones are absent (EMBY_TIMEOUT is in seconds).
 */

import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_PIPELINE_CONFIG,
  pipelineConfigSchema,
  serverTypeSchema,
  type PipelineConfig,
  type ServerType,
} from '@reelwatch/shared';
import { ValidationError } from '../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Project root directory (apps/server/src/config -> project root)
export const PROJECT_ROOT = resolve(__dirname, '../../../..');
export const ENV_FILE_PATH = resolve(PROJECT_ROOT, '.env');

const positiveInt = z.coerce.number().int().positive();
const flag = z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  MEDIA_SERVER_TYPE: serverTypeSchema.optional(),
  MEDIA_SERVER_URL: z.url().optional(),
  MEDIA_SERVER_TOKEN: z.string().optional(),
  MEDIA_SERVER_TIMEOUT_MS: positiveInt.optional(),
  EMBY_URL: z.url().optional(),
  EMBY_API_KEY: z.string().optional(),
  EMBY_TIMEOUT: z.coerce.number().positive().optional(),

  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().optional(),

  PORT: positiveInt.default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  POLL_INTERVAL_MS: z.coerce.number().optional(),
  POLL_FAILURE_THRESHOLD: z.coerce.number().optional(),
  PUSH_RECONNECT_INITIAL_MS: z.coerce.number().optional(),
  PUSH_RECONNECT_MAX_MS: z.coerce.number().optional(),
  STALE_SESSION_GRACE_MS: z.coerce.number().optional(),
  HISTORY_MERGE_GAP_MS: z.coerce.number().optional(),
  WATCHED_THRESHOLD: z.coerce.number().optional(),
  DISPATCHER_QUEUE_CAPACITY: z.coerce.number().optional(),

  NOTIFY_WEBHOOK_URL: z.url().optional(),
  NOTIFY_DISCORD_WEBHOOK_URL: z.url().optional(),
  NOTIFY_LOG: flag.optional(),
});

export interface MediaServerSettings {
  type: ServerType;
  url: string;
  token: string;
  timeoutMs?: number;
}

export interface NotificationSettings {
  webhookUrl?: string;
  discordWebhookUrl?: string;
  log: boolean;
}

export interface AppConfig {
  mediaServer: MediaServerSettings;
  databaseUrl?: string;
  redisUrl?: string;
  port: number;
  host: string;
  logLevel?: string;
  pipeline: PipelineConfig;
  notifications: NotificationSettings;
}

/**
 * Load `.env` into process.env. With `override`, values already in the
 * environment are replaced (used when re-reading on SIGHUP).
 */
export function loadEnvFile(path = ENV_FILE_PATH, override = false): void {
  loadDotenv({ path, override });
}

/**
 * Validate an environment and build the application config.
 * Throws ValidationError on anything missing or malformed.
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // `FOO=` in a .env file means unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  const vars = result.data;

  const url = vars.MEDIA_SERVER_URL ?? vars.EMBY_URL;
  const token = vars.MEDIA_SERVER_TOKEN ?? vars.EMBY_API_KEY;
  const type = vars.MEDIA_SERVER_TYPE ?? (vars.EMBY_URL ? 'emby' : undefined);
  const timeoutMs =
    vars.MEDIA_SERVER_TIMEOUT_MS ??
    (vars.EMBY_TIMEOUT !== undefined ? Math.round(vars.EMBY_TIMEOUT * 1000) : undefined);

  const missing: Array<{ field: string; message: string }> = [];
  if (!type) missing.push({ field: 'MEDIA_SERVER_TYPE', message: 'Required' });
  if (!url) missing.push({ field: 'MEDIA_SERVER_URL', message: 'Required' });
  if (!token) missing.push({ field: 'MEDIA_SERVER_TOKEN', message: 'Required' });
  if (!type || !url || !token) {
    throw new ValidationError('Media server is not configured', missing);
  }

  return {
    mediaServer: { type, url, token, timeoutMs },
    databaseUrl: vars.DATABASE_URL,
    redisUrl: vars.REDIS_URL,
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    pipeline: buildPipelineConfig({
      pollIntervalMs: vars.POLL_INTERVAL_MS,
      pollFailureThreshold: vars.POLL_FAILURE_THRESHOLD,
      pushReconnectInitialMs: vars.PUSH_RECONNECT_INITIAL_MS,
      pushReconnectMaxMs: vars.PUSH_RECONNECT_MAX_MS,
      staleSessionGraceMs: vars.STALE_SESSION_GRACE_MS,
      historyMergeGapMs: vars.HISTORY_MERGE_GAP_MS,
      watchedThreshold: vars.WATCHED_THRESHOLD,
      dispatcherQueueCapacity: vars.DISPATCHER_QUEUE_CAPACITY,
    }),
    notifications: {
      webhookUrl: vars.NOTIFY_WEBHOOK_URL,
      discordWebhookUrl: vars.NOTIFY_DISCORD_WEBHOOK_URL,
      log: vars.NOTIFY_LOG ?? false,
    },
  };
}

/**
 * Overlay the set tunables on the defaults and validate the result
 */
export function buildPipelineConfig(
  overrides: { [K in keyof PipelineConfig]?: number },
  base: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): PipelineConfig {
  const merged: Record<string, number> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = pipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
