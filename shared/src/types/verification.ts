// ============================================
// Identities
// ============================================

/**
 * A user's identity within one guild.
 * Used as the lookup key into both the verification service and Discord.
 */
export interface Member {
  guildId: string;
  userId: string;
}

/**
 * A member together with the roles they held when they were read from Discord.
 */
export interface MemberSnapshot extends Member {
  roleIds: readonly string[];
}

export interface GuildConfig {
  guildId: string;
  /** Role granted to verified members */
  roleId: string;
}

// ============================================
// Verification lookups
// ============================================

export type LookupFailureReason = 'timeout' | 'bad_request';

/**
 * Fresh answer from the verification service. Never cached between calls.
 */
export type VerificationStatus =
  | { kind: 'verified' }
  | { kind: 'not_verified' }
  | { kind: 'lookup_failed'; reason: LookupFailureReason; detail?: string };

// ============================================
// Role actions
// ============================================

export type PermanentReason =
  | 'missing_permissions'
  | 'unknown_member'
  | 'unknown_role'
  | 'rejected';

export type ActionError =
  | { kind: 'rate_limit_exceeded'; attempts: number }
  | { kind: 'permanent'; reason: PermanentReason; detail?: string }
  | { kind: 'unavailable'; attempts: number; detail: string };

export type ActionResult = { ok: true } | { ok: false; error: ActionError };

// ============================================
// Outcomes
// ============================================

export type OutcomeError =
  | { kind: 'lookup_failed'; reason: LookupFailureReason }
  | { kind: 'action_failed'; error: ActionError }
  | { kind: 'aborted' }
  | { kind: 'unexpected'; message: string };

export type Disposition =
  | { kind: 'role_granted' }
  | { kind: 'role_revoked' }
  // holdsRole tells "already verified" apart from "still unverified"
  | { kind: 'no_change'; holdsRole: boolean }
  | { kind: 'error'; error: OutcomeError };

export interface MemberOutcome {
  member: Member;
  disposition: Disposition;
}

// ============================================
// Batch jobs
// ============================================

export type AbortReason = 'cancelled' | 'invalid_config' | 'enumeration_failed';

export type JobState =
  | { status: 'pending'; createdAt: string }
  | { status: 'running'; createdAt: string; startedAt: string }
  | { status: 'completed'; createdAt: string; startedAt: string; finishedAt: string }
  | { status: 'aborted'; createdAt: string; startedAt: string; finishedAt: string; reason: AbortReason };

export type JobStatus = JobState['status'];

export interface JobSummary {
  id: string;
  guildId: string;
  initiatorId: string;
  state: JobState;
  /** Members with a recorded outcome so far */
  processed: number;
  /** Members enumerated for the job, null until enumeration finishes */
  total: number | null;
  cancelRequested: boolean;
}

export interface FailedMember {
  userId: string;
  error: OutcomeError;
}

export interface OutcomeReport {
  jobId: string;
  guildId: string;
  status: 'completed' | 'aborted';
  abortReason?: AbortReason;
  total: number;
  granted: number;
  revoked: number;
  unchanged: number;
  errors: number;
  /** At most the configured number of failures; successes are only counted */
  failures: FailedMember[];
  omittedFailures: number;
}
