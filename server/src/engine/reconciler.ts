import type {
  ActionResult,
  GuildConfig,
  MemberOutcome,
  MemberSnapshot,
  OutcomeError,
} from '@verify-bot/shared';
import { BatchJob } from './batch-job.js';
import { InvalidGuildConfigError } from './errors.js';
import type { JobRegistry } from './job-registry.js';
import type { GuildConfigStore, MemberDirectory, RoleActions, VerificationLookup } from './ports.js';
import { runWorkerPool } from './worker-pool.js';

export interface VerificationEngineOptions {
  lookup: VerificationLookup;
  roles: RoleActions;
  configs: GuildConfigStore;
  members: MemberDirectory;
  registry: JobRegistry;
  /** Members reconciled in parallel during a batch */
  concurrency: number;
}

/**
 * Brings members' verified-role membership in line with the verification
 * service, for one member or a whole guild.
 */
export class VerificationEngine {
  private readonly lookup: VerificationLookup;
  private readonly roles: RoleActions;
  private readonly configs: GuildConfigStore;
  private readonly members: MemberDirectory;
  private readonly registry: JobRegistry;
  private readonly concurrency: number;

  constructor(options: VerificationEngineOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Batch concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.lookup = options.lookup;
    this.roles = options.roles;
    this.configs = options.configs;
    this.members = options.members;
    this.registry = options.registry;
    this.concurrency = options.concurrency;
  }

  /**
   * Reconcile a single member. Does not touch the job registry, so it may run
   * alongside a batch for the same guild.
   *
   * @throws InvalidGuildConfigError when the guild has no usable configuration
   */
  async reconcileOne(member: MemberSnapshot): Promise<MemberOutcome> {
    const config = await this.requireConfig(member.guildId);
    return this.reconcileMember(member, config);
  }

  /**
   * Reconcile every member of a guild and resolve with the finished job.
   *
   * @throws InvalidGuildConfigError when the guild has no usable configuration
   * @throws JobAlreadyRunningError when the guild already has an active job
   */
  async reconcileAll(guildId: string, initiatorId: string): Promise<BatchJob> {
    const config = await this.requireConfig(guildId);
    const job = new BatchJob(guildId, initiatorId);
    this.registry.register(job);

    try {
      job.start();
      console.log(`[Engine] Job ${job.id} started for guild ${guildId} by ${initiatorId}`);

      let members: MemberSnapshot[];
      try {
        members = await this.collectMembers(guildId);
      } catch (error) {
        console.error(`[Engine] Job ${job.id} could not list members of guild ${guildId}:`, error);
        job.abort('enumeration_failed');
        return job;
      }
      job.setTotal(members.length);
      console.log(`[Engine] Job ${job.id} reconciling ${members.length} member(s)`);

      let configInvalid = false;
      const unscheduled = await runWorkerPool(members, {
        concurrency: this.concurrency,
        shouldStop: () => configInvalid || job.cancelRequested,
        worker: async (member) => {
          const outcome = await this.reconcileMember(member, config);
          job.record(outcome);
          if (isUnknownRoleOutcome(outcome)) {
            if (!configInvalid) {
              console.warn(`[Engine] Job ${job.id} — role ${config.roleId} no longer exists, stopping`);
            }
            configInvalid = true;
          }
        },
      });

      for (const member of unscheduled) {
        job.record({
          member: { guildId: member.guildId, userId: member.userId },
          disposition: { kind: 'error', error: { kind: 'aborted' } },
        });
      }

      if (configInvalid) {
        job.abort('invalid_config');
      } else if (job.cancelRequested && unscheduled.length > 0) {
        job.abort('cancelled');
      } else {
        job.complete();
      }
      console.log(
        `[Engine] Job ${job.id} ${job.state.status} — ${job.outcomes.length} outcome(s), ${unscheduled.length} not scheduled`,
      );
      return job;
    } finally {
      this.registry.release(job);
    }
  }

  /**
   * Request cancellation of the guild's running batch.
   */
  cancel(guildId: string): boolean {
    const cancelled = this.registry.cancel(guildId);
    if (cancelled) console.log(`[Engine] Cancellation requested for guild ${guildId}`);
    return cancelled;
  }

  private async requireConfig(guildId: string): Promise<GuildConfig> {
    const config = await this.configs.getGuildConfig(guildId);
    if (!config) throw new InvalidGuildConfigError(guildId);
    return config;
  }

  private async collectMembers(guildId: string): Promise<MemberSnapshot[]> {
    const seen = new Set<string>();
    const members: MemberSnapshot[] = [];
    for await (const page of this.members.listMembers(guildId)) {
      for (const member of page) {
        if (seen.has(member.userId)) continue;
        seen.add(member.userId);
        members.push(member);
      }
    }
    return members;
  }

  /**
   * Lookup first, then at most one role mutation. Never throws: every member
   * yields exactly one outcome.
   */
  private async reconcileMember(snapshot: MemberSnapshot, config: GuildConfig): Promise<MemberOutcome> {
    const member = { guildId: snapshot.guildId, userId: snapshot.userId };
    const holdsRole = snapshot.roleIds.includes(config.roleId);

    try {
      const status = await this.lookup.lookup(member);

      switch (status.kind) {
        case 'lookup_failed':
          return failed(member, { kind: 'lookup_failed', reason: status.reason });

        case 'verified': {
          if (holdsRole) return { member, disposition: { kind: 'no_change', holdsRole } };
          const result = await this.roles.grant(member, config.roleId);
          return applied(member, result, 'role_granted');
        }

        case 'not_verified': {
          if (!holdsRole) return { member, disposition: { kind: 'no_change', holdsRole } };
          const result = await this.roles.revoke(member, config.roleId);
          return applied(member, result, 'role_revoked');
        }
      }
    } catch (error) {
      console.error(`[Engine] Unexpected error reconciling ${member.userId} in ${member.guildId}:`, error);
      const message = error instanceof Error ? error.message : String(error);
      return failed(member, { kind: 'unexpected', message });
    }
  }
}

function failed(member: MemberOutcome['member'], error: OutcomeError): MemberOutcome {
  return { member, disposition: { kind: 'error', error } };
}

function applied(
  member: MemberOutcome['member'],
  result: ActionResult,
  kind: 'role_granted' | 'role_revoked',
): MemberOutcome {
  if (result.ok) return { member, disposition: { kind } };
  return failed(member, { kind: 'action_failed', error: result.error });
}

function isUnknownRoleOutcome(outcome: MemberOutcome): boolean {
  const { disposition } = outcome;
  return (
    disposition.kind === 'error' &&
    disposition.error.kind === 'action_failed' &&
    disposition.error.error.kind === 'permanent' &&
    disposition.error.error.reason === 'unknown_role'
  );
}
