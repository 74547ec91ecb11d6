import { DiscordAPIError, HTTPError, RateLimitError, Routes, type REST } from 'discord.js';
import type { Member } from '@verify-bot/shared';
import type { RoleGateway, RoleRequestResult } from './role-client.js';

// Discord JSON error codes
const UNKNOWN_MEMBER = 10007;
const UNKNOWN_ROLE = 10011;
const MISSING_ACCESS = 50001;
const MISSING_PERMISSIONS = 50013;

const AUDIT_REASON = 'Verification status sync';

/**
 * Role mutations through Discord's REST API.
 *
 * The REST client must be created with `rejectOnRateLimit` and no retries so
 * that rate limits and server errors reach RoleActionClient instead of being
 * handled inside discord.js.
 */
export class DiscordRoleGateway implements RoleGateway {
  constructor(private readonly rest: Pick<REST, 'put' | 'delete'>) {}

  async addRole(member: Member, roleId: string): Promise<RoleRequestResult> {
    try {
      await this.rest.put(Routes.guildMemberRole(member.guildId, member.userId, roleId), { reason: AUDIT_REASON });
      return { kind: 'ok' };
    } catch (error) {
      return classifyRoleError(error);
    }
  }

  async removeRole(member: Member, roleId: string): Promise<RoleRequestResult> {
    try {
      await this.rest.delete(Routes.guildMemberRole(member.guildId, member.userId, roleId), { reason: AUDIT_REASON });
      return { kind: 'ok' };
    } catch (error) {
      return classifyRoleError(error);
    }
  }
}

export function classifyRoleError(error: unknown): RoleRequestResult {
  if (error instanceof RateLimitError) {
    return { kind: 'rate_limited', retryAfterMs: error.retryAfter };
  }

  if (error instanceof DiscordAPIError) {
    switch (error.code) {
      case UNKNOWN_MEMBER:
        return { kind: 'permanent', reason: 'unknown_member', detail: error.message };
      case UNKNOWN_ROLE:
        return { kind: 'permanent', reason: 'unknown_role', detail: error.message };
      case MISSING_ACCESS:
      case MISSING_PERMISSIONS:
        return { kind: 'permanent', reason: 'missing_permissions', detail: error.message };
    }
    if (error.status >= 500) return { kind: 'transient', detail: `HTTP ${error.status}: ${error.message}` };
    return { kind: 'permanent', reason: 'rejected', detail: `HTTP ${error.status}: ${error.message}` };
  }

  if (error instanceof HTTPError) {
    if (error.status >= 500) return { kind: 'transient', detail: `HTTP ${error.status}` };
    return { kind: 'permanent', reason: 'rejected', detail: `HTTP ${error.status}` };
  }

  // Network failures and request timeouts
  return { kind: 'transient', detail: error instanceof Error ? error.message : String(error) };
}
