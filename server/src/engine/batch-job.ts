import { v4 as uuidv4 } from 'uuid';
import type { AbortReason, JobState, JobSummary, MemberOutcome } from '@verify-bot/shared';
import { JobStateError } from './errors.js';

/**
 * One re-verification run across a guild.
 *
 * pending -> running -> completed | aborted. Outcomes are only accepted while
 * running, and each member may be recorded once.
 */
export class BatchJob {
  readonly id = uuidv4();
  private _state: JobState;
  private readonly _outcomes: MemberOutcome[] = [];
  private readonly recorded = new Set<string>();
  private _total: number | null = null;
  private _cancelRequested = false;

  constructor(
    readonly guildId: string,
    readonly initiatorId: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this._state = { status: 'pending', createdAt: this.now().toISOString() };
  }

  get state(): JobState {
    return this._state;
  }

  get outcomes(): readonly MemberOutcome[] {
    return this._outcomes;
  }

  get total(): number | null {
    return this._total;
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  get isTerminal(): boolean {
    return this._state.status === 'completed' || this._state.status === 'aborted';
  }

  /**
   * Ask the job to stop scheduling members. Returns false once terminal.
   */
  requestCancel(): boolean {
    if (this.isTerminal) return false;
    this._cancelRequested = true;
    return true;
  }

  start(): void {
    if (this._state.status !== 'pending') {
      throw new JobStateError(this.id, this._state.status, 'start');
    }
    this._state = {
      status: 'running',
      createdAt: this._state.createdAt,
      startedAt: this.now().toISOString(),
    };
  }

  setTotal(total: number): void {
    if (this._state.status !== 'running') {
      throw new JobStateError(this.id, this._state.status, 'set its member count');
    }
    this._total = total;
  }

  record(outcome: MemberOutcome): void {
    if (this._state.status !== 'running') {
      throw new JobStateError(this.id, this._state.status, 'record outcomes');
    }
    const { userId } = outcome.member;
    if (this.recorded.has(userId)) {
      throw new Error(`Job ${this.id} already has an outcome for member ${userId}`);
    }
    this.recorded.add(userId);
    this._outcomes.push(outcome);
  }

  complete(): void {
    if (this._state.status !== 'running') {
      throw new JobStateError(this.id, this._state.status, 'complete');
    }
    this._state = {
      status: 'completed',
      createdAt: this._state.createdAt,
      startedAt: this._state.startedAt,
      finishedAt: this.now().toISOString(),
    };
  }

  abort(reason: AbortReason): void {
    if (this._state.status !== 'running') {
      throw new JobStateError(this.id, this._state.status, 'abort');
    }
    this._state = {
      status: 'aborted',
      createdAt: this._state.createdAt,
      startedAt: this._state.startedAt,
      finishedAt: this.now().toISOString(),
      reason,
    };
  }

  summary(): JobSummary {
    return {
      id: this.id,
      guildId: this.guildId,
      initiatorId: this.initiatorId,
      state: this._state,
      processed: this._outcomes.length,
      total: this._total,
      cancelRequested: this._cancelRequested,
    };
  }
}
