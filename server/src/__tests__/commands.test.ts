import { describe, it, expect } from 'vitest';
import type { MemberOutcome, MemberSnapshot } from '@verify-bot/shared';
import {
  commandDefinitions,
  registerWithInvite,
  TRY_AGAIN_MESSAGE,
  truncateMessage,
  UNSUPPORTED_SERVER_MESSAGE,
  verifyMember,
  verifyReply,
  type DeferredReplyTarget,
  type DisposableInvite,
} from '../discord/commands.js';
import { InvalidGuildConfigError } from '../engine/errors.js';
import { deferred, snapshot } from './helpers.js';

const VERIFY_URL = 'https://verify.test/start';
const member = { guildId: 'guild-1', userId: 'u1' };

function reply(disposition: MemberOutcome['disposition']): string {
  return verifyReply({ member, disposition }, VERIFY_URL);
}

describe('verifyReply', () => {
  it('confirms a new verification', () => {
    expect(reply({ kind: 'role_granted' })).toBe('You have now been verified!');
  });

  it('tells a verified member nothing changed', () => {
    expect(reply({ kind: 'no_change', holdsRole: true })).toBe('You are already verified!');
  });

  it('points an unverified member at the verification page', () => {
    expect(reply({ kind: 'no_change', holdsRole: false })).toBe(
      'Please verify yourself by going to https://verify.test/start',
    );
    expect(reply({ kind: 'role_revoked' })).toBe(
      'Your verification could not be confirmed, so your verified role was removed. ' +
        'Please verify yourself by going to https://verify.test/start',
    );
  });

  it('asks the member to retry after an error', () => {
    expect(reply({ kind: 'error', error: { kind: 'lookup_failed', reason: 'timeout' } })).toBe(TRY_AGAIN_MESSAGE);
  });
});

describe('truncateMessage', () => {
  it('leaves short messages alone', () => {
    expect(truncateMessage('abcd', 4)).toBe('abcd');
  });

  it('cuts long messages to the limit with an ellipsis', () => {
    expect(truncateMessage('abcdef', 4)).toBe('abc…');
  });
});

describe('commandDefinitions', () => {
  it('keeps every description within Discord\'s limit', () => {
    for (const command of commandDefinitions) {
      expect(command.description.length).toBeGreaterThan(0);
      expect(command.description.length).toBeLessThanOrEqual(100);
    }
  });

  it('declares every slash command', () => {
    expect(commandDefinitions.map((command) => command.name)).toEqual([
      'verify',
      're-verify',
      'cancel-verify',
      'register',
    ]);
  });
});

// ---------------------------------------------------------------------------
// /verify
// ---------------------------------------------------------------------------

class RecordingReply implements DeferredReplyTarget {
  readonly events: string[] = [];
  readonly edits: string[] = [];

  async deferReply(options: { ephemeral: boolean }): Promise<void> {
    this.events.push(options.ephemeral ? 'defer:ephemeral' : 'defer');
  }

  async editReply(content: string): Promise<void> {
    this.events.push('edit');
    this.edits.push(content);
  }
}

function engineReturning(reconcileOne: (member: MemberSnapshot) => Promise<MemberOutcome>) {
  return { engine: { reconcileOne }, verifyUrl: VERIFY_URL };
}

describe('verifyMember', () => {
  it('acknowledges the interaction before the lookup starts', async () => {
    const target = new RecordingReply();
    const lookupDone = deferred<MemberOutcome>();
    const ctx = engineReturning(async () => {
      target.events.push('reconcile');
      return lookupDone.promise;
    });

    const pending = verifyMember(target, snapshot('u1'), ctx);
    await Promise.resolve();
    await Promise.resolve();
    expect(target.events).toEqual(['defer:ephemeral', 'reconcile']);

    lookupDone.resolve({ member, disposition: { kind: 'role_granted' } });
    await pending;

    expect(target.events).toEqual(['defer:ephemeral', 'reconcile', 'edit']);
    expect(target.edits).toEqual(['You have now been verified!']);
  });

  it('edits in the unsupported-server message for an unconfigured guild', async () => {
    const target = new RecordingReply();
    const ctx = engineReturning(async () => {
      throw new InvalidGuildConfigError('guild-1');
    });

    await verifyMember(target, snapshot('u1'), ctx);

    expect(target.events).toEqual(['defer:ephemeral', 'edit']);
    expect(target.edits).toEqual([UNSUPPORTED_SERVER_MESSAGE]);
  });

  it('leaves other failures to the command dispatcher after deferring', async () => {
    const target = new RecordingReply();
    const ctx = engineReturning(async () => {
      throw new Error('boom');
    });

    await expect(verifyMember(target, snapshot('u1'), ctx)).rejects.toThrow('boom');
    expect(target.events).toEqual(['defer:ephemeral']);
  });
});

// ---------------------------------------------------------------------------
// /register
// ---------------------------------------------------------------------------

class FakeInvite implements DisposableInvite {
  readonly url = 'https://discord.test/invite/abc';
  deleted = 0;

  async delete(): Promise<void> {
    this.deleted++;
  }
}

describe('registerWithInvite', () => {
  it('keeps the invite for a new registration', async () => {
    const invite = new FakeInvite();
    const links: string[] = [];

    const result = await registerWithInvite(invite, async (inviteLink) => {
      links.push(inviteLink);
      return { kind: 'registered', registered: true, approved: false };
    });

    expect(result).toEqual({ kind: 'registered', registered: true, approved: false });
    expect(links).toEqual(['https://discord.test/invite/abc']);
    expect(invite.deleted).toBe(0);
  });

  it('deletes the invite when the guild is already registered', async () => {
    const invite = new FakeInvite();

    const result = await registerWithInvite(invite, async () => ({ kind: 'already_registered' }));

    expect(result).toEqual({ kind: 'already_registered' });
    expect(invite.deleted).toBe(1);
  });

  it('deletes the invite when registration fails', async () => {
    const invite = new FakeInvite();

    await expect(
      registerWithInvite(invite, async () => {
        throw new Error('service down');
      }),
    ).rejects.toThrow('service down');
    expect(invite.deleted).toBe(1);
  });
});
