/**
 * Verification Service Client
 *
 * Talks to the external verification API: member status lookups, guild
 * configuration and guild registration. Every request waits for a token from
 * the shared bucket, and timeouts, network errors and 5xx responses are retried
 * with the configured backoff.
 */

import {
  GuildResponseSchema,
  RegisterGuildParamsSchema,
  RegisterGuildResponseSchema,
  VerifiedResponseSchema,
  type GuildConfig,
  type Member,
  type RegisterGuildParams,
  type RegisterGuildResponse,
  type VerificationStatus,
} from '@verify-bot/shared';
import type { GuildConfigStore, VerificationLookup } from '../engine/ports.js';
import { backoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from '../resilience/backoff.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import { TokenBucket, type TokenBucketOptions } from '../resilience/token-bucket.js';

export interface VerifyApiClientOptions {
  baseUrl: string;
  apiKey: string;
  rateLimit: TokenBucketOptions;
  backoff?: BackoffPolicy;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Requests slower than this are logged */
  slowRequestMs?: number;
  clock?: Clock;
  fetch?: typeof fetch;
}

export class VerifyApiError extends Error {
  readonly code = 'VERIFY_API_ERROR';

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'VerifyApiError';
  }
}

export type RegisterGuildResult =
  | ({ kind: 'registered' } & RegisterGuildResponse)
  | { kind: 'already_registered' };

type SendResult =
  | { kind: 'response'; response: Response }
  | { kind: 'exhausted'; attempts: number; detail: string };

interface OutgoingRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  label: string;
}

export class VerifyApiClient implements VerificationLookup, GuildConfigStore {
  private readonly baseUrl: string;
  private readonly bucket: TokenBucket;
  private readonly backoff: BackoffPolicy;
  private readonly timeoutMs: number;
  private readonly slowRequestMs: number;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: VerifyApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.clock = options.clock ?? systemClock;
    this.bucket = new TokenBucket(options.rateLimit, this.clock);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.slowRequestMs = options.slowRequestMs ?? 400;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Look up whether a member is verified.
   */
  async lookup(member: Member): Promise<VerificationStatus> {
    const result = await this.send({
      method: 'GET',
      path: '/api/v1/verified',
      query: { userId: member.userId, guildId: member.guildId },
      label: `lookup ${member.userId}`,
    });

    if (result.kind === 'exhausted') {
      console.warn(`[Verify] Lookup for ${member.userId} gave up after ${result.attempts} attempt(s): ${result.detail}`);
      return { kind: 'lookup_failed', reason: 'timeout', detail: result.detail };
    }

    const { response } = result;
    if (response.status === 404) {
      return { kind: 'not_verified' };
    }
    if (!response.ok) {
      const detail = `HTTP ${response.status}${await readErrorText(response)}`;
      console.warn(`[Verify] Lookup for ${member.userId} rejected: ${detail}`);
      return { kind: 'lookup_failed', reason: 'bad_request', detail };
    }

    const parsed = VerifiedResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      console.warn(`[Verify] Malformed lookup response for ${member.userId}:`, parsed.error.issues);
      return { kind: 'lookup_failed', reason: 'bad_request', detail: 'malformed response' };
    }
    return parsed.data.verified ? { kind: 'verified' } : { kind: 'not_verified' };
  }

  /**
   * Read a guild's verified role. Resolves null for unknown or unapproved guilds.
   *
   * @throws VerifyApiError when the service cannot be reached or rejects the request
   */
  async getGuildConfig(guildId: string): Promise<GuildConfig | null> {
    const result = await this.send({
      method: 'GET',
      path: `/api/v1/guild/${encodeURIComponent(guildId)}`,
      label: `guild ${guildId}`,
    });
    if (result.kind === 'exhausted') {
      throw new VerifyApiError(`Guild lookup for ${guildId} failed: ${result.detail}`);
    }

    const { response } = result;
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new VerifyApiError(
        `Guild lookup for ${guildId} failed with HTTP ${response.status}${await readErrorText(response)}`,
        response.status,
      );
    }

    const parsed = GuildResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      console.warn(`[Verify] Malformed guild response for ${guildId}:`, parsed.error.issues);
      return null;
    }
    if (!parsed.data.approved) {
      console.log(`[Verify] Guild ${guildId} is registered but not approved`);
      return null;
    }
    return { guildId, roleId: parsed.data.roleId };
  }

  /**
   * Register a guild with the verification service.
   *
   * @throws VerifyApiError when the service cannot be reached or rejects the request
   */
  async registerGuild(params: RegisterGuildParams): Promise<RegisterGuildResult> {
    const body = RegisterGuildParamsSchema.parse(params);
    const result = await this.send({
      method: 'POST',
      path: '/api/v1/guild/register',
      body,
      label: `register ${body.guildId}`,
    });
    if (result.kind === 'exhausted') {
      throw new VerifyApiError(`Registering guild ${body.guildId} failed: ${result.detail}`);
    }

    const { response } = result;
    if (response.status === 409) return { kind: 'already_registered' };
    if (!response.ok) {
      throw new VerifyApiError(
        `Registering guild ${body.guildId} failed with HTTP ${response.status}${await readErrorText(response)}`,
        response.status,
      );
    }

    const parsed = RegisterGuildResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new VerifyApiError(`Malformed registration response for guild ${body.guildId}`, response.status);
    }
    return { kind: 'registered', ...parsed.data };
  }

  /**
   * Issue a request, retrying transient failures. Any response below 500 is
   * returned to the caller to interpret.
   */
  private async send(request: OutgoingRequest): Promise<SendResult> {
    let detail = 'no attempts made';

    for (let attempt = 1; attempt <= this.backoff.maxAttempts; attempt++) {
      await this.bucket.take();
      const started = this.clock.now();

      try {
        const response = await this.fetchImpl(this.buildUrl(request), {
          method: request.method,
          headers: {
            Authorization: this.options.apiKey,
            ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          },
          body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        this.warnIfSlow(request.label, started);

        if (response.status < 500) {
          return { kind: 'response', response };
        }
        detail = `HTTP ${response.status}`;
        // Unread bodies hold their connection until collected
        await response.body?.cancel();
      } catch (error) {
        this.warnIfSlow(request.label, started);
        detail = describeFetchError(error);
      }

      if (attempt < this.backoff.maxAttempts) {
        const delay = backoffDelay(this.backoff, attempt);
        console.warn(`[Verify] ${request.label} attempt ${attempt} failed (${detail}), retrying in ${delay}ms`);
        await this.clock.sleep(delay);
      }
    }

    return { kind: 'exhausted', attempts: this.backoff.maxAttempts, detail };
  }

  private buildUrl(request: OutgoingRequest): string {
    const url = new URL(this.baseUrl + request.path);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private warnIfSlow(label: string, started: number): void {
    const elapsed = this.clock.now() - started;
    if (elapsed > this.slowRequestMs) {
      console.warn(`[Verify] Took ${elapsed}ms to ${label}`);
    }
  }
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'timed out';
    return error.message;
  }
  return String(error);
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    // Unparseable bodies fail schema validation
    return undefined;
  }
}

async function readErrorText(response: Response): Promise<string> {
  try {
    const text = (await response.text()).trim();
    return text ? `: ${text.slice(0, 200)}` : '';
  } catch {
    return '';
  }
}
