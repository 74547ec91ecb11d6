import type {
  ActionResult,
  GuildConfig,
  Member,
  MemberSnapshot,
  VerificationStatus,
} from '@verify-bot/shared';
import type { GuildConfigStore, MemberDirectory, RoleActions, VerificationLookup } from '../engine/ports.js';
import type { Clock } from '../resilience/clock.js';

/**
 * Clock whose sleeps advance time instantly and are recorded.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public time = 0) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  // The executor runs synchronously, so resolve is bound before returning
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function snapshot(userId: string, roleIds: string[] = [], guildId = 'guild-1'): MemberSnapshot {
  return { guildId, userId, roleIds };
}

export class FakeLookup implements VerificationLookup {
  readonly calls: Member[] = [];
  readonly statuses = new Map<string, VerificationStatus>();
  onLookup?: (member: Member) => void;

  set(userId: string, status: VerificationStatus): this {
    this.statuses.set(userId, status);
    return this;
  }

  async lookup(member: Member): Promise<VerificationStatus> {
    this.calls.push(member);
    this.onLookup?.(member);
    return this.statuses.get(member.userId) ?? { kind: 'not_verified' };
  }
}

export class FakeRoles implements RoleActions {
  readonly grants: Array<{ member: Member; roleId: string }> = [];
  readonly revokes: Array<{ member: Member; roleId: string }> = [];
  readonly results = new Map<string, ActionResult>();

  async grant(member: Member, roleId: string): Promise<ActionResult> {
    this.grants.push({ member, roleId });
    return this.results.get(member.userId) ?? { ok: true };
  }

  async revoke(member: Member, roleId: string): Promise<ActionResult> {
    this.revokes.push({ member, roleId });
    return this.results.get(member.userId) ?? { ok: true };
  }

  get mutations(): number {
    return this.grants.length + this.revokes.length;
  }
}

export class FakeConfigs implements GuildConfigStore {
  constructor(private readonly configs: Record<string, string> = { 'guild-1': 'role-verified' }) {}

  async getGuildConfig(guildId: string): Promise<GuildConfig | null> {
    const roleId = this.configs[guildId];
    return roleId ? { guildId, roleId } : null;
  }
}

export class FakeDirectory implements MemberDirectory {
  /** Resolved before the first page is produced */
  gate: Promise<void> = Promise.resolve();
  readonly entered = deferred();
  failWith?: Error;

  constructor(private readonly pages: MemberSnapshot[][]) {}

  async *listMembers(): AsyncGenerator<MemberSnapshot[]> {
    this.entered.resolve();
    await this.gate;
    if (this.failWith) throw this.failWith;
    for (const page of this.pages) {
      yield page;
    }
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
