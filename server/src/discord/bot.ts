/**
 * Discord Bot Integration
 *
 * Registers the verification slash commands, dispatches them, and verifies
 * members automatically when they join a server.
 */

import { Client, Events, GatewayIntentBits, type GuildMember } from 'discord.js';
import { InvalidGuildConfigError } from '../engine/errors.js';
import { commandDefinitions, handleCommand, type CommandContext } from './commands.js';
import { snapshotOf } from './member-directory.js';

export interface DiscordBotConfig {
  token: string;
  /** Register commands to this guild only, which applies instantly */
  commandGuildId?: string;
}

export function createDiscordClient(): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
  });
}

/**
 * Attach handlers and log in.
 */
export async function startDiscordBot(client: Client, config: DiscordBotConfig, ctx: CommandContext): Promise<void> {
  console.log('[Discord] Starting Discord bot...');

  client.once(Events.ClientReady, (readyClient) => {
    console.log(`[Discord] Logged in as ${readyClient.user.tag}`);
    registerCommands(readyClient, config.commandGuildId).catch((error) => {
      console.error('[Discord] Failed to register slash commands:', error);
    });
  });

  client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) return;
    handleCommand(interaction, ctx).catch((error) => {
      console.error('[Discord] Cannot respond to slash command:', error);
    });
  });

  client.on(Events.GuildMemberAdd, (member) => {
    verifyNewMember(member, ctx).catch((error) => {
      console.error(`[Discord] Failed to verify new member ${member.id}:`, error);
    });
  });

  await client.login(config.token);
}

async function registerCommands(client: Client<true>, guildId?: string): Promise<void> {
  const commands = guildId
    ? await client.application.commands.set(commandDefinitions, guildId)
    : await client.application.commands.set(commandDefinitions);
  console.log(`[Discord] I now have the following slash commands: ${commands.map((c) => c.name).join(', ')}`);
}

async function verifyNewMember(member: GuildMember, ctx: CommandContext): Promise<void> {
  if (member.user.bot) return;
  try {
    const outcome = await ctx.engine.reconcileOne(snapshotOf(member));
    console.log(`[Discord] New member ${member.id} in ${member.guild.id}: ${outcome.disposition.kind}`);
  } catch (error) {
    if (!(error instanceof InvalidGuildConfigError)) throw error;
    console.log(`[Discord] Guild ${member.guild.id} is not configured, skipping new member ${member.id}`);
  }
}
