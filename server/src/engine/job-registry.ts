import type { BatchJob } from './batch-job.js';
import { JobAlreadyRunningError } from './errors.js';

/**
 * Tracks the single active batch job per guild.
 *
 * register/release are synchronous, so a check-and-set can never interleave
 * with another caller. The registry is never held across a job's execution.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, BatchJob>(); // guildId -> active job

  register(job: BatchJob): void {
    const active = this.jobs.get(job.guildId);
    if (active && !active.isTerminal) {
      throw new JobAlreadyRunningError(job.guildId, active.id);
    }
    this.jobs.set(job.guildId, job);
    console.log(`[Jobs] Registered job ${job.id} for guild ${job.guildId}`);
  }

  /**
   * Remove a job. A no-op if another job has since taken the guild's slot.
   */
  release(job: BatchJob): void {
    if (this.jobs.get(job.guildId) !== job) return;
    this.jobs.delete(job.guildId);
    console.log(`[Jobs] Released job ${job.id} for guild ${job.guildId}`);
  }

  get(guildId: string): BatchJob | undefined {
    return this.jobs.get(guildId);
  }

  list(): BatchJob[] {
    return Array.from(this.jobs.values());
  }

  /**
   * Request cancellation of the guild's active job, if any.
   */
  cancel(guildId: string): boolean {
    return this.jobs.get(guildId)?.requestCancel() ?? false;
  }

  cancelAll(): number {
    let cancelled = 0;
    for (const job of this.jobs.values()) {
      if (job.requestCancel()) cancelled++;
    }
    return cancelled;
  }
}
