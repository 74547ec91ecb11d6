import type { Client, GuildMember } from 'discord.js';
import type { MemberSnapshot } from '@verify-bot/shared';
import type { MemberDirectory } from '../engine/ports.js';

// Discord's maximum page size for List Guild Members
const MAX_PAGE_SIZE = 1000;

export function snapshotOf(member: GuildMember): MemberSnapshot {
  return {
    guildId: member.guild.id,
    userId: member.id,
    roleIds: Array.from(member.roles.cache.keys()),
  };
}

/**
 * Enumerates guild members page by page. Bot accounts are skipped since they
 * can never be verified. Requires the Guild Members intent.
 */
export class DiscordMemberDirectory implements MemberDirectory {
  constructor(
    private readonly client: Client,
    private readonly pageSize: number = MAX_PAGE_SIZE,
  ) {}

  async *listMembers(guildId: string): AsyncGenerator<MemberSnapshot[]> {
    const guild = await this.client.guilds.fetch(guildId);
    let after: string | undefined;

    for (;;) {
      const page = await guild.members.list({ limit: this.pageSize, after, cache: false });
      if (page.size === 0) return;

      yield page.filter((member) => !member.user.bot).map(snapshotOf);

      if (page.size < this.pageSize) return;
      after = page.lastKey();
    }
  }
}
