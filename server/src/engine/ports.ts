import type {
  ActionResult,
  GuildConfig,
  Member,
  MemberSnapshot,
  VerificationStatus,
} from '@verify-bot/shared';

/**
 * Resolves a member to their current verification status.
 */
export interface VerificationLookup {
  lookup(member: Member): Promise<VerificationStatus>;
}

/**
 * Grants or revokes a single role on a single member.
 * Both operations succeed when the member is already in the requested state.
 */
export interface RoleActions {
  grant(member: Member, roleId: string): Promise<ActionResult>;
  revoke(member: Member, roleId: string): Promise<ActionResult>;
}

/**
 * Source of per-guild configuration. Resolves null when the guild has no
 * usable configuration.
 */
export interface GuildConfigStore {
  getGuildConfig(guildId: string): Promise<GuildConfig | null>;
}

/**
 * Paginated enumeration of a guild's members, one page per iteration.
 */
export interface MemberDirectory {
  listMembers(guildId: string): AsyncIterable<MemberSnapshot[]>;
}
