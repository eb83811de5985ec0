// Configuration management with YAML file and environment variable overrides
import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import { config as loadDotenv } from 'dotenv';

loadDotenv();

const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().default(3000),
    })
    .default({}),
  database: z
    .object({
      url: z.string().default('./data/mailbox-mirror.db'),
    })
    .default({}),
  queue: z
    .object({
      type: z.enum(['sqlite', 'bullmq']).default('sqlite'),
      workers: z.number().int().positive().default(3),
      redis: z
        .object({
          host: z.string().default('localhost'),
          port: z.number().int().default(6379),
        })
        .optional(),
    })
    .default({}),
  scheduler: z
    .object({
      syncIntervalMs: z.number().int().positive().default(15 * 60 * 1000),
      cleanupIntervalMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
      jobRetentionDays: z.number().int().positive().default(7),
    })
    .default({}),
  auth: z
    .object({
      basicUser: z.string().optional(),
      basicPassword: z.string().optional(),
    })
    .default({}),
  google: z
    .object({
      clientId: z.string().optional(),
      clientSecret: z.string().optional(),
      redirectUri: z.string().default('http://localhost:3000/api/auth/google/callback'),
      scopes: z
        .array(z.string())
        .default([
          'https://www.googleapis.com/auth/gmail.modify',
          'https://www.googleapis.com/auth/userinfo.email',
        ]),
    })
    .default({}),
  tokens: z
    .object({
      expirySkewSeconds: z.number().int().nonnegative().default(300),
      refreshLeaseMs: z.number().int().positive().default(30_000),
      refreshPollMs: z.number().int().positive().default(250),
    })
    .default({}),
  sync: z
    .object({
      pageSize: z.number().int().min(1).max(500).default(50),
      maxMessages: z.number().int().positive().default(200),
      maxPages: z.number().int().positive().default(20),
      query: z.string().optional(),
      reconcileFlags: z.boolean().default(false),
    })
    .default({}),
  gmail: z
    .object({
      maxRetries: z.number().int().nonnegative().default(3),
      baseDelayMs: z.number().int().nonnegative().default(1000),
    })
    .default({}),
  security: z
    .object({
      tokenEncryptionKey: z
        .string()
        .regex(/^[0-9a-fA-F]{64}$/, 'tokenEncryptionKey must be 32 bytes of hex')
        .optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function toBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const redisUrl = env.REDIS_URL ? new URL(env.REDIS_URL) : undefined;

  return {
    server: {
      host: env.HOST,
      port: toInt(env.PORT),
    },
    database: {
      url: env.DATABASE_URL,
    },
    queue: {
      type: env.QUEUE_TYPE,
      workers: toInt(env.WORKER_COUNT),
      redis: redisUrl
        ? { host: redisUrl.hostname, port: toInt(redisUrl.port) ?? 6379 }
        : undefined,
    },
    scheduler: {
      syncIntervalMs: toInt(env.SYNC_INTERVAL_MS),
    },
    auth: {
      basicUser: env.HTTP_BASIC_USER,
      basicPassword: env.HTTP_BASIC_PASS,
    },
    google: {
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      redirectUri: env.GOOGLE_REDIRECT_URI,
    },
    sync: {
      pageSize: toInt(env.SYNC_PAGE_SIZE),
      maxMessages: toInt(env.SYNC_MAX_MESSAGES),
      query: env.SYNC_QUERY,
      reconcileFlags: toBool(env.SYNC_RECONCILE_FLAGS),
    },
    security: {
      tokenEncryptionKey: env.TOKEN_ENCRYPTION_KEY,
    },
  };
}

function readConfigFile(path: string): PlainObject {
  if (!existsSync(path)) {
    console.warn(`No config file at ${path}, using defaults and environment variables`);
    return {};
  }
  const parsed: unknown = parse(readFileSync(path, 'utf-8'));
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Validate a raw config object, filling in defaults
 */
export function parseConfig(raw: unknown = {}): Config {
  return ConfigSchema.parse(raw);
}

export function loadConfig(
  options: { path?: string; env?: NodeJS.ProcessEnv } = {}
): Config {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH ?? 'config/app.yml';

  const merged = deepMerge(readConfigFile(path), removeUndefined(envOverrides(env)) ?? {});
  return parseConfig(merged);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const value = source[key];
    const existing = target[key];
    output[key] =
      isPlainObject(value) && isPlainObject(existing) ? deepMerge(existing, value) : value;
  }
  return output;
}

function removeUndefined(obj: PlainObject): PlainObject | undefined {
  const clean: PlainObject = {};
  for (const key of Object.keys(obj)) {
    const value = obj[key];
    const cleaned = isPlainObject(value) ? removeUndefined(value) : value;
    if (cleaned !== undefined) {
      clean[key] = cleaned;
    }
  }
  return Object.keys(clean).length > 0 ? clean : undefined;
}
