import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config/index.js';
import { DEFAULT_BACKOFF } from '../resilience/backoff.js';

const BASE_ENV = {
  VERIFY_API_URL: 'https://verify.test',
  VERIFY_API_KEY: 'test-secret',
  DISCORD_BOT_TOKEN: 'test-token',
};

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('Expected the configuration to be rejected');
}

describe('loadConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = loadConfig(BASE_ENV);

    expect(config.port).toBe(3000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevel).toBe('info');
    expect(config.env.isDevelopment).toBe(true);
    expect(config.verifyApi).toEqual({
      url: 'https://verify.test',
      apiKey: 'test-secret',
      timeoutMs: 5000,
      rateLimit: { capacity: 20, windowMs: 1000 },
    });
    expect(config.discord).toEqual({
      botToken: 'test-token',
      commandGuildId: undefined,
      roleRateLimit: { capacity: 10, windowMs: 1000 },
      maxRateLimitRetries: 3,
    });
    expect(config.batch).toEqual({ concurrency: 4, failureLimit: 10 });
    expect(config.backoff).toEqual(DEFAULT_BACKOFF);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ ...BASE_ENV, PORT: '8080', BATCH_CONCURRENCY: '2', RETRY_MAX_ATTEMPTS: '7' });

    expect(config.port).toBe(8080);
    expect(config.batch.concurrency).toBe(2);
    expect(config.backoff.maxAttempts).toBe(7);
  });

  it('treats a blank command guild as unset', () => {
    expect(loadConfig({ ...BASE_ENV, DISCORD_COMMAND_GUILD_ID: '  ' }).discord.commandGuildId).toBeUndefined();
    expect(loadConfig({ ...BASE_ENV, DISCORD_COMMAND_GUILD_ID: '1234' }).discord.commandGuildId).toBe('1234');
  });

  it('lists every missing required variable', () => {
    expect(issuesOf({})).toEqual(
      expect.arrayContaining(['VERIFY_API_URL: Required', 'VERIFY_API_KEY: Required', 'DISCORD_BOT_TOKEN: Required']),
    );
  });

  it('keeps batch concurrency below both rate limits', () => {
    expect(issuesOf({ ...BASE_ENV, BATCH_CONCURRENCY: '10' })).toEqual([
      'BATCH_CONCURRENCY: must be smaller than both rate limits (10)',
    ]);
  });
});
