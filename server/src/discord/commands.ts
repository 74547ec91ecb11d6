/**
 * Slash commands
 *
 * /verify         - reconcile the caller's verified role
 * /re-verify      - reconcile every member of the server (Manage Roles)
 * /cancel-verify  - stop the server's running re-verification (Manage Roles)
 * /register       - register the server with the verification service (Manage Server)
 */

import {
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from 'discord.js';
import type { MemberOutcome, MemberSnapshot } from '@verify-bot/shared';
import { InvalidGuildConfigError, JobAlreadyRunningError } from '../engine/errors.js';
import type { VerificationEngine } from '../engine/reconciler.js';
import { buildReport, renderReport } from '../engine/report.js';
import type { RegisterGuildResult, VerifyApiClient } from '../verification/api-client.js';
import { snapshotOf } from './member-directory.js';

export interface CommandContext {
  engine: Pick<VerificationEngine, 'reconcileOne' | 'reconcileAll' | 'cancel'>;
  verifyApi: Pick<VerifyApiClient, 'registerGuild'>;
  /** Where unverified users are sent to link their account */
  verifyUrl: string;
  failureLimit: number;
}

/** The slice of an interaction used to answer slowly */
export interface DeferredReplyTarget {
  deferReply(options: { ephemeral: boolean }): Promise<unknown>;
  editReply(content: string): Promise<unknown>;
}

export interface DisposableInvite {
  url: string;
  delete(reason?: string): Promise<unknown>;
}

// Discord rejects messages longer than this
const MAX_MESSAGE_LENGTH = 2000;

export const UNSUPPORTED_SERVER_MESSAGE =
  "It looks like your server doesn't support this bot, please contact the admins.";
export const JOB_RUNNING_MESSAGE = 'A verification job is already running for this server.';
export const TRY_AGAIN_MESSAGE = 'Something went wrong while verifying, please try again later.';

export const commandDefinitions = [
  new SlashCommandBuilder()
    .setName('verify')
    .setDescription('Verifies you and gives you a nice role!')
    .setDMPermission(false),
  new SlashCommandBuilder()
    .setName('re-verify')
    .setDescription('Re-verifies everyone on the server (requires Manage Roles).')
    .setDMPermission(false)
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles),
  new SlashCommandBuilder()
    .setName('cancel-verify')
    .setDescription('Stops a running re-verification of this server.')
    .setDMPermission(false)
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageRoles),
  new SlashCommandBuilder()
    .setName('register')
    .setDescription('Registers this server with the verification service.')
    .setDMPermission(false)
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
    .addRoleOption((option) =>
      option.setName('role').setDescription('Role given to verified members').setRequired(true),
    ),
].map((command) => command.toJSON());

/**
 * The caller-facing reply for a /verify outcome.
 */
export function verifyReply(outcome: MemberOutcome, verifyUrl: string): string {
  const { disposition } = outcome;
  switch (disposition.kind) {
    case 'role_granted':
      return 'You have now been verified!';
    case 'role_revoked':
      return `Your verification could not be confirmed, so your verified role was removed. Please verify yourself by going to ${verifyUrl}`;
    case 'no_change':
      return disposition.holdsRole
        ? 'You are already verified!'
        : `Please verify yourself by going to ${verifyUrl}`;
    case 'error':
      return TRY_AGAIN_MESSAGE;
  }
}

export function truncateMessage(text: string, maxLength: number = MAX_MESSAGE_LENGTH): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 1)}…`;
}

/**
 * Dispatch a slash command. Never throws; failures are logged and reported
 * to the user.
 */
export async function handleCommand(interaction: ChatInputCommandInteraction, ctx: CommandContext): Promise<void> {
  if (!interaction.inCachedGuild()) {
    await interaction.reply({ content: 'This command can only be used in a server.', ephemeral: true });
    return;
  }

  console.log(`[Discord] /${interaction.commandName} from ${interaction.user.username} in ${interaction.guildId}`);

  try {
    switch (interaction.commandName) {
      case 'verify':
        await handleVerify(interaction, ctx);
        break;
      case 're-verify':
        await handleReVerify(interaction, ctx);
        break;
      case 'cancel-verify':
        await handleCancel(interaction, ctx);
        break;
      case 'register':
        await handleRegister(interaction, ctx);
        break;
      default:
        console.error(`[Discord] ${interaction.commandName} command is not implemented.`);
    }
  } catch (error) {
    console.error(`[Discord] /${interaction.commandName} failed:`, error);
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply(TRY_AGAIN_MESSAGE);
      } else {
        await interaction.reply({ content: TRY_AGAIN_MESSAGE, ephemeral: true });
      }
    } catch (replyError) {
      console.error('[Discord] Failed to send error reply:', replyError);
    }
  }
}

async function handleVerify(interaction: ChatInputCommandInteraction<'cached'>, ctx: CommandContext): Promise<void> {
  await verifyMember(interaction, snapshotOf(interaction.member), ctx);
}

/**
 * Answer /verify. The interaction is acknowledged before the lookup, which may
 * outlast Discord's three second reply window while it retries.
 */
export async function verifyMember(
  target: DeferredReplyTarget,
  member: MemberSnapshot,
  ctx: Pick<CommandContext, 'verifyUrl'> & { engine: Pick<VerificationEngine, 'reconcileOne'> },
): Promise<void> {
  await target.deferReply({ ephemeral: true });
  try {
    const outcome = await ctx.engine.reconcileOne(member);
    await target.editReply(verifyReply(outcome, ctx.verifyUrl));
  } catch (error) {
    if (!(error instanceof InvalidGuildConfigError)) throw error;
    await target.editReply(UNSUPPORTED_SERVER_MESSAGE);
  }
}

async function handleReVerify(interaction: ChatInputCommandInteraction<'cached'>, ctx: CommandContext): Promise<void> {
  await interaction.deferReply();
  try {
    const job = await ctx.engine.reconcileAll(interaction.guildId, interaction.user.id);
    await interaction.editReply(truncateMessage(renderReport(buildReport(job, ctx.failureLimit))));
  } catch (error) {
    if (error instanceof JobAlreadyRunningError) {
      await interaction.editReply(JOB_RUNNING_MESSAGE);
    } else if (error instanceof InvalidGuildConfigError) {
      await interaction.editReply(UNSUPPORTED_SERVER_MESSAGE);
    } else {
      throw error;
    }
  }
}

async function handleCancel(interaction: ChatInputCommandInteraction<'cached'>, ctx: CommandContext): Promise<void> {
  const cancelled = ctx.engine.cancel(interaction.guildId);
  await interaction.reply({
    content: cancelled
      ? 'Stopping the running re-verification. Members already being checked will finish first.'
      : 'No verification job is running for this server.',
    ephemeral: true,
  });
}

async function handleRegister(interaction: ChatInputCommandInteraction<'cached'>, ctx: CommandContext): Promise<void> {
  const role = interaction.options.getRole('role', true);
  const { guild } = interaction;
  await interaction.deferReply({ ephemeral: true });

  const invite = await guild.invites.create(interaction.channelId, {
    maxAge: 0,
    reason: 'Verification service registration',
  });

  const result = await registerWithInvite(invite, (inviteLink) =>
    ctx.verifyApi.registerGuild({
      guildId: guild.id,
      name: guild.name,
      icon: guild.iconURL(),
      createdAt: guild.createdAt.toISOString(),
      ownerId: guild.ownerId,
      inviteLink,
      roleId: role.id,
      roleName: role.name,
      roleColour: role.color,
    }),
  );

  if (result.kind === 'already_registered') {
    await interaction.editReply('This server has already been registered.');
  } else if (result.approved) {
    await interaction.editReply('This server is registered and approved, members can now use /verify.');
  } else {
    await interaction.editReply('This server is registered and will work once it has been approved.');
  }
}

/**
 * Register using a freshly created invite. The invite is deleted again when the
 * guild turns out to be registered already, or registration fails.
 */
export async function registerWithInvite(
  invite: DisposableInvite,
  register: (inviteLink: string) => Promise<RegisterGuildResult>,
): Promise<RegisterGuildResult> {
  let result: RegisterGuildResult;
  try {
    result = await register(invite.url);
  } catch (error) {
    await discardInvite(invite);
    throw error;
  }
  if (result.kind === 'already_registered') {
    await discardInvite(invite);
  }
  return result;
}

async function discardInvite(invite: DisposableInvite): Promise<void> {
  try {
    await invite.delete('Verification service registration not needed');
  } catch (error) {
    console.warn(`[Discord] Could not delete unused invite ${invite.url}:`, error);
  }
}
