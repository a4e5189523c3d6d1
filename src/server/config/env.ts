/**
 * Environment Configuration
 *
 * Loads .env and validates every setting once at start-up.
 */

import 'dotenv/config';
import { z } from 'zod';

const intFrom = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  PORT: intFrom(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().default('./data/bank-sync.db'),
  ENCRYPTION_KEY: z.string().optional(),

  BANKING_MODE: z.enum(['sandbox', 'production']).default('sandbox'),
  OPEN_BANKING_BASE_URL: z.string().url().default('https://openbanking.example.com'),
  OPEN_BANKING_CLIENT_ID: z.string().default('sandbox-client'),
  OPEN_BANKING_REDIRECT_URI: z.string().url().default('http://localhost:3000/api/connections/callback'),
  CLIENT_CERT_PATH: z.string().optional(),
  CLIENT_KEY_PATH: z.string().optional(),
  CA_CERT_PATH: z.string().optional(),
  SIGNING_KEY_PATH: z.string().optional(),

  PROVIDER_TIMEOUT_MS: intFrom(30_000),
  SYNC_DAYS_BACK: intFrom(7),
  SYNC_MAX_DURATION_MS: intFrom(300_000),
  SYNC_INTERVAL_MINUTES: intFrom(60),
  SYNC_CONCURRENCY: z.coerce.number().int().positive().default(4),
  SYNC_MAX_RETRIES: intFrom(3),
  SYNC_RETRY_BASE_MS: intFrom(60_000),
  EVENT_CHANNEL_CAPACITY: z.coerce.number().int().positive().default(1000),

  CLASSIFIER: z.enum(['statistical', 'openai']).default('statistical'),
  CLASSIFIER_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini')
});

export type Env = z.infer<typeof EnvSchema>;

function loadEnv(): Env {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    console.error(`[env] Invalid environment: ${issues}`);
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

const env = loadEnv();

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  databasePath: env.DATABASE_PATH,
  encryptionKey: env.ENCRYPTION_KEY,

  banking: {
    mode: env.BANKING_MODE,
    baseUrl: env.OPEN_BANKING_BASE_URL.replace(/\/+$/, ''),
    clientId: env.OPEN_BANKING_CLIENT_ID,
    redirectUri: env.OPEN_BANKING_REDIRECT_URI,
    clientCertPath: env.CLIENT_CERT_PATH,
    clientKeyPath: env.CLIENT_KEY_PATH,
    caCertPath: env.CA_CERT_PATH,
    signingKeyPath: env.SIGNING_KEY_PATH,
    timeoutMs: env.PROVIDER_TIMEOUT_MS
  },

  sync: {
    daysBack: env.SYNC_DAYS_BACK,
    maxDurationMs: env.SYNC_MAX_DURATION_MS,
    intervalMinutes: env.SYNC_INTERVAL_MINUTES,
    concurrency: env.SYNC_CONCURRENCY,
    maxRetries: env.SYNC_MAX_RETRIES,
    retryBaseMs: env.SYNC_RETRY_BASE_MS,
    channelCapacity: env.EVENT_CHANNEL_CAPACITY
  },

  categorization: {
    classifier: env.CLASSIFIER,
    confidenceThreshold: env.CLASSIFIER_CONFIDENCE_THRESHOLD,
    timeoutMs: env.CLASSIFIER_TIMEOUT_MS,
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL
  }
} as const;

export type AppConfig = typeof config;
