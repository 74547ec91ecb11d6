// Load environment-specific .env file
import { config as dotenvConfig } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const nodeEnv = process.env.NODE_ENV || 'development';
// .env files are in the server directory (one level up from src/)
dotenvConfig({ path: path.join(__dirname, '..', `.env.${nodeEnv}`) });

import { REST } from 'discord.js';
import { initConfig } from './config/index.js';
import { createDiscordClient, startDiscordBot } from './discord/bot.js';
import { DiscordMemberDirectory } from './discord/member-directory.js';
import { JobRegistry } from './engine/job-registry.js';
import { VerificationEngine } from './engine/reconciler.js';
import { DiscordRoleGateway } from './roles/discord-gateway.js';
import { RoleActionClient } from './roles/role-client.js';
import { buildServer } from './server.js';
import { VerifyApiClient } from './verification/api-client.js';

const config = initConfig();

const registry = new JobRegistry();

const verifyApi = new VerifyApiClient({
  baseUrl: config.verifyApi.url,
  apiKey: config.verifyApi.apiKey,
  timeoutMs: config.verifyApi.timeoutMs,
  rateLimit: config.verifyApi.rateLimit,
  backoff: config.backoff,
});

// Rate limits and retries are handled by RoleActionClient, not discord.js
const rest = new REST({ version: '10', rejectOnRateLimit: () => true, retries: 0 }).setToken(config.discord.botToken);
const roles = new RoleActionClient(new DiscordRoleGateway(rest), {
  rateLimit: config.discord.roleRateLimit,
  backoff: config.backoff,
  maxRateLimitRetries: config.discord.maxRateLimitRetries,
});

const client = createDiscordClient();

const engine = new VerificationEngine({
  lookup: verifyApi,
  roles,
  configs: verifyApi,
  members: new DiscordMemberDirectory(client),
  registry,
  concurrency: config.batch.concurrency,
});

const fastify = await buildServer({ registry, logLevel: config.logLevel });

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on ${config.host}:${config.port}`);

    await startDiscordBot(
      client,
      { token: config.discord.botToken, commandGuildId: config.discord.commandGuildId },
      { engine, verifyApi, verifyUrl: config.verifyApi.url, failureLimit: config.batch.failureLimit },
    );
  } catch (error) {
    fastify.log.error(error);
    process.exit(1);
  }
};

const shutdown = async (signal: string) => {
  console.log(`Shutting down (${signal})...`);
  const cancelled = registry.cancelAll();
  if (cancelled > 0) console.log(`Cancelled ${cancelled} running verification job(s)`);
  await client.destroy();
  await fastify.close();
  process.exit(0);
};

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

// Start the bot
await start();
