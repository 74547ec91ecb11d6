// Schemas
export * from './schemas/index.js';

// Types
export type {
  Member,
  MemberSnapshot,
  GuildConfig,
  LookupFailureReason,
  VerificationStatus,
  PermanentReason,
  ActionError,
  ActionResult,
  OutcomeError,
  Disposition,
  MemberOutcome,
  AbortReason,
  JobState,
  JobStatus,
  JobSummary,
  FailedMember,
  OutcomeReport,
} from './types/verification.js';
