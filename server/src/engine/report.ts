import type {
  AbortReason,
  ActionError,
  FailedMember,
  JobState,
  MemberOutcome,
  OutcomeError,
  OutcomeReport,
} from '@verify-bot/shared';

export const DEFAULT_FAILURE_LIMIT = 10;

/** The parts of a finished job the report reads */
export interface ReportableJob {
  id: string;
  guildId: string;
  state: JobState;
  outcomes: readonly MemberOutcome[];
}

/**
 * Tally a finished job's outcomes. Only failures are listed by member, and
 * at most `failureLimit` of them.
 */
export function buildReport(job: ReportableJob, failureLimit: number = DEFAULT_FAILURE_LIMIT): OutcomeReport {
  const { state } = job;
  if (state.status !== 'completed' && state.status !== 'aborted') {
    throw new Error(`Job ${job.id} is ${state.status}; only finished jobs can be reported`);
  }

  let granted = 0;
  let revoked = 0;
  let unchanged = 0;
  const failures: FailedMember[] = [];

  for (const { member, disposition } of job.outcomes) {
    switch (disposition.kind) {
      case 'role_granted':
        granted++;
        break;
      case 'role_revoked':
        revoked++;
        break;
      case 'no_change':
        unchanged++;
        break;
      case 'error':
        failures.push({ userId: member.userId, error: disposition.error });
        break;
    }
  }

  const limit = Math.max(0, failureLimit);
  return {
    jobId: job.id,
    guildId: job.guildId,
    status: state.status,
    ...(state.status === 'aborted' ? { abortReason: state.reason } : {}),
    total: job.outcomes.length,
    granted,
    revoked,
    unchanged,
    errors: failures.length,
    failures: failures.slice(0, limit),
    omittedFailures: Math.max(0, failures.length - limit),
  };
}

function describeActionError(error: ActionError): string {
  switch (error.kind) {
    case 'rate_limit_exceeded':
      return 'rate limited by Discord';
    case 'unavailable':
      return 'Discord did not respond';
    case 'permanent':
      switch (error.reason) {
        case 'missing_permissions':
          return 'missing permissions to manage the role';
        case 'unknown_member':
          return 'member left the server';
        case 'unknown_role':
          return 'verified role no longer exists';
        case 'rejected':
          return error.detail ? `request rejected (${error.detail})` : 'request rejected';
      }
  }
}

export function describeOutcomeError(error: OutcomeError): string {
  switch (error.kind) {
    case 'lookup_failed':
      return error.reason === 'timeout'
        ? 'verification service unavailable'
        : 'verification service rejected the request';
    case 'action_failed':
      return describeActionError(error.error);
    case 'aborted':
      return 'not processed, job stopped';
    case 'unexpected':
      return `unexpected error: ${error.message}`;
  }
}

const ABORT_LABELS: Record<AbortReason, string> = {
  cancelled: 'cancelled',
  invalid_config: 'stopped because the verified role is no longer valid',
  enumeration_failed: 'stopped because the member list could not be read',
};

/**
 * Render a report as a Discord message.
 */
export function renderReport(report: OutcomeReport): string {
  const heading = report.status === 'completed'
    ? 'Successfully completed re-verifications.'
    : `Re-verification ${ABORT_LABELS[report.abortReason ?? 'cancelled']}.`;

  const lines = [
    heading,
    `Members checked: ${report.total} — granted: ${report.granted}, revoked: ${report.revoked}, ` +
      `unchanged: ${report.unchanged}, errors: ${report.errors}`,
  ];

  if (report.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of report.failures) {
      lines.push(`• <@${failure.userId}>: ${describeOutcomeError(failure.error)}`);
    }
    if (report.omittedFailures > 0) {
      lines.push(`…and ${report.omittedFailures} more`);
    }
  }

  return lines.join('\n');
}
