import type { ActionResult, Member, PermanentReason } from '@verify-bot/shared';
import type { RoleActions } from '../engine/ports.js';
import { backoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from '../resilience/backoff.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import { TokenBucket, type TokenBucketOptions } from '../resilience/token-bucket.js';

/**
 * Result of a single role request against the chat platform.
 */
export type RoleRequestResult =
  | { kind: 'ok' }
  | { kind: 'rate_limited'; retryAfterMs: number }
  | { kind: 'permanent'; reason: PermanentReason; detail: string }
  | { kind: 'transient'; detail: string };

/**
 * One request per call, no retries. Implementations classify failures.
 */
export interface RoleGateway {
  addRole(member: Member, roleId: string): Promise<RoleRequestResult>;
  removeRole(member: Member, roleId: string): Promise<RoleRequestResult>;
}

export interface RoleActionClientOptions {
  rateLimit: TokenBucketOptions;
  backoff?: BackoffPolicy;
  /** Rate-limit responses waited out before giving up */
  maxRateLimitRetries?: number;
  clock?: Clock;
}

type RoleOperation = 'grant' | 'revoke';

/**
 * Grants and revokes roles through a RoleGateway.
 *
 * Rate-limit responses are waited out for the duration the platform asks for,
 * transient failures are retried with backoff, permanent failures return at once.
 */
export class RoleActionClient implements RoleActions {
  private readonly bucket: TokenBucket;
  private readonly backoff: BackoffPolicy;
  private readonly maxRateLimitRetries: number;
  private readonly clock: Clock;

  constructor(private readonly gateway: RoleGateway, options: RoleActionClientOptions) {
    this.clock = options.clock ?? systemClock;
    this.bucket = new TokenBucket(options.rateLimit, this.clock);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 3;
  }

  grant(member: Member, roleId: string): Promise<ActionResult> {
    return this.execute('grant', member, roleId);
  }

  revoke(member: Member, roleId: string): Promise<ActionResult> {
    return this.execute('revoke', member, roleId);
  }

  private async execute(operation: RoleOperation, member: Member, roleId: string): Promise<ActionResult> {
    let rateLimited = 0;
    let transientFailures = 0;

    for (;;) {
      await this.bucket.take();
      const result = operation === 'grant'
        ? await this.gateway.addRole(member, roleId)
        : await this.gateway.removeRole(member, roleId);

      switch (result.kind) {
        case 'ok':
          console.log(`[Roles] ${operation} ${roleId} for ${member.userId} in ${member.guildId}`);
          return { ok: true };

        case 'permanent':
          console.warn(`[Roles] ${operation} ${roleId} for ${member.userId} failed permanently: ${result.detail}`);
          return { ok: false, error: { kind: 'permanent', reason: result.reason, detail: result.detail } };

        case 'rate_limited':
          if (rateLimited >= this.maxRateLimitRetries) {
            console.warn(`[Roles] ${operation} for ${member.userId} still rate limited after ${rateLimited} wait(s)`);
            return { ok: false, error: { kind: 'rate_limit_exceeded', attempts: rateLimited + 1 } };
          }
          rateLimited++;
          console.log(`[Roles] Rate limited, waiting ${result.retryAfterMs}ms before retrying ${member.userId}`);
          await this.clock.sleep(result.retryAfterMs);
          break;

        case 'transient':
          transientFailures++;
          if (transientFailures >= this.backoff.maxAttempts) {
            console.warn(`[Roles] ${operation} for ${member.userId} gave up after ${transientFailures} attempt(s): ${result.detail}`);
            return { ok: false, error: { kind: 'unavailable', attempts: transientFailures, detail: result.detail } };
          }
          await this.clock.sleep(backoffDelay(this.backoff, transientFailures));
          break;
      }
    }
  }
}
