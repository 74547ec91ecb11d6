import type { JobStatus } from '@verify-bot/shared';

export class JobAlreadyRunningError extends Error {
  readonly code = 'JOB_ALREADY_RUNNING';

  constructor(readonly guildId: string, readonly activeJobId: string) {
    super(`A verification job (${activeJobId}) is already running for guild ${guildId}`);
    this.name = 'JobAlreadyRunningError';
  }
}

export class InvalidGuildConfigError extends Error {
  readonly code = 'INVALID_GUILD_CONFIG';

  constructor(readonly guildId: string) {
    super(`Guild ${guildId} has no valid verification configuration`);
    this.name = 'InvalidGuildConfigError';
  }
}

export class JobStateError extends Error {
  readonly code = 'INVALID_JOB_TRANSITION';

  constructor(readonly jobId: string, from: JobStatus, action: string) {
    super(`Job ${jobId} cannot ${action} while ${from}`);
    this.name = 'JobStateError';
  }
}
