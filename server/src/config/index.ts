import { z } from 'zod';
import { createBackoffPolicy, type BackoffPolicy } from '../resilience/backoff.js';
import type { TokenBucketOptions } from '../resilience/token-bucket.js';

export interface AppConfig {
  env: { nodeEnv: string; isDevelopment: boolean; isTest: boolean; isProduction: boolean };
  port: number;
  host: string;
  logLevel: string;
  verifyApi: {
    url: string;
    apiKey: string;
    timeoutMs: number;
    rateLimit: TokenBucketOptions;
  };
  discord: {
    botToken: string;
    commandGuildId?: string;
    roleRateLimit: TokenBucketOptions;
    maxRateLimitRetries: number;
  };
  batch: { concurrency: number; failureLimit: number };
  backoff: BackoffPolicy;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: positiveInt(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    VERIFY_API_URL: z.string().url(),
    VERIFY_API_KEY: z.string().min(1),
    VERIFY_API_TIMEOUT_MS: positiveInt(5_000),
    VERIFY_API_RATE_LIMIT: positiveInt(20),
    VERIFY_API_RATE_WINDOW_MS: positiveInt(1_000),

    DISCORD_BOT_TOKEN: z.string().min(1),
    DISCORD_COMMAND_GUILD_ID: optionalString,
    DISCORD_ROLE_RATE_LIMIT: positiveInt(10),
    DISCORD_ROLE_RATE_WINDOW_MS: positiveInt(1_000),
    DISCORD_MAX_RATE_LIMIT_RETRIES: z.coerce.number().int().nonnegative().default(3),

    BATCH_CONCURRENCY: positiveInt(4),
    REPORT_FAILURE_LIMIT: z.coerce.number().int().nonnegative().default(10),

    RETRY_INITIAL_DELAY_MS: z.coerce.number().nonnegative().default(250),
    RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
    RETRY_MAX_DELAY_MS: z.coerce.number().nonnegative().default(4_000),
    RETRY_MAX_ATTEMPTS: positiveInt(5),
  })
  .superRefine((env, ctx) => {
    // Workers must leave headroom in both rate limits for other traffic
    const ceiling = Math.min(env.VERIFY_API_RATE_LIMIT, env.DISCORD_ROLE_RATE_LIMIT);
    if (env.BATCH_CONCURRENCY >= ceiling) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BATCH_CONCURRENCY'],
        message: `must be smaller than both rate limits (${ceiling})`,
      });
    }
  });

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the app config from environment variables.
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const env = parsed.data;

  return {
    env: {
      nodeEnv: env.NODE_ENV,
      isDevelopment: env.NODE_ENV === 'development',
      isTest: env.NODE_ENV === 'test',
      isProduction: env.NODE_ENV === 'production',
    },
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    verifyApi: {
      url: env.VERIFY_API_URL,
      apiKey: env.VERIFY_API_KEY,
      timeoutMs: env.VERIFY_API_TIMEOUT_MS,
      rateLimit: { capacity: env.VERIFY_API_RATE_LIMIT, windowMs: env.VERIFY_API_RATE_WINDOW_MS },
    },
    discord: {
      botToken: env.DISCORD_BOT_TOKEN,
      commandGuildId: env.DISCORD_COMMAND_GUILD_ID,
      roleRateLimit: { capacity: env.DISCORD_ROLE_RATE_LIMIT, windowMs: env.DISCORD_ROLE_RATE_WINDOW_MS },
      maxRateLimitRetries: env.DISCORD_MAX_RATE_LIMIT_RETRIES,
    },
    batch: { concurrency: env.BATCH_CONCURRENCY, failureLimit: env.REPORT_FAILURE_LIMIT },
    backoff: createBackoffPolicy({
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
    }),
  };
}

// Mutable singleton — populated by initConfig() before the bot starts
export let config: AppConfig;

export function initConfig(): AppConfig {
  config = loadConfig();
  return config;
}
