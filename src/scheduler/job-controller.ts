import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { JobState, JobStatus, RunCounters } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ConflictError, errorMessage } from '../utils/errors.js';
import { captureError, captureMessage } from '../utils/sentry.js';

/**
 * Handed to the running task. The task reports progress through it and
 * checks `signal` at its checkpoints.
 */
export interface JobContext {
  runId: string;
  signal: AbortSignal;
  reportProgress(percent: number, message: string, counters?: Partial<RunCounters>): void;
}

export interface JobResult {
  outcome: 'completed' | 'cancelled';
  message: string;
}

export type JobTask = (ctx: JobContext) => Promise<JobResult>;

type TerminalStatus = Exclude<JobStatus, 'idle' | 'running'>;

export type JobStateListener = (state: Readonly<JobState>) => void;

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['completed', 'failed', 'cancelled']);

function emptyCounters(): RunCounters {
  return { listingsSeen: 0, added: 0, priceChanges: 0, growthSteps: 0 };
}

function clampProgress(percent: number): number {
  if (!Number.isFinite(percent)) return 0;
  return Math.min(100, Math.max(0, Math.round(percent)));
}

function copyDate(date: Date | null): Date | null {
  return date ? new Date(date.getTime()) : null;
}

function freezeState(state: JobState): Readonly<JobState> {
  return Object.freeze({
    ...state,
    startedAt: copyDate(state.startedAt),
    finishedAt: copyDate(state.finishedAt),
    lastRun: copyDate(state.lastRun),
    counters: Object.freeze({ ...state.counters }),
  });
}

/**
 * Run lifecycle: idle -> running -> completed | failed | cancelled -> idle
 *
 * Single writer of JobState. Every transition replaces the whole state object,
 * so a snapshot always carries a consistent {progress, message} pair.
 * start() checks and sets the status synchronously; on the single JS thread
 * no other start() can interleave between the check and the set.
 */
export class JobController {
  private state: JobState = {
    status: 'idle',
    runId: null,
    progress: 0,
    message: 'Ready',
    startedAt: null,
    finishedAt: null,
    lastRun: null,
    error: null,
    counters: emptyCounters(),
  };
  private abortController: AbortController | null = null;
  private current: Promise<Readonly<JobState>> | null = null;
  private readonly events = new EventEmitter();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Start a run. Throws ConflictError when one is already running.
   * A terminal state left by the previous run is acknowledged implicitly.
   */
  start(task: JobTask): Readonly<JobState> {
    if (this.state.status === 'running') {
      throw new ConflictError();
    }

    const runId = uuidv4();
    const abortController = new AbortController();
    this.abortController = abortController;

    this.commit({
      status: 'running',
      runId,
      progress: 0,
      message: 'Starting scraper...',
      startedAt: this.clock(),
      finishedAt: null,
      lastRun: this.state.lastRun,
      error: null,
      counters: emptyCounters(),
    });

    logger.info('Sync run started', { runId });

    const ctx: JobContext = {
      runId,
      signal: abortController.signal,
      reportProgress: (percent, message, counters) => {
        if (this.state.runId === runId) {
          this.reportProgress(percent, message, counters);
        }
      },
    };

    const started = this.snapshot();
    this.current = this.execute(task, ctx, abortController);
    return started;
  }

  /**
   * Overwrite progress and message in one step. Ignored unless running.
   */
  reportProgress(percent: number, message: string, counters?: Partial<RunCounters>): void {
    if (this.state.status !== 'running') return;

    this.commit({
      ...this.state,
      progress: clampProgress(percent),
      message,
      counters: { ...this.state.counters, ...counters },
    });
  }

  /**
   * Request cooperative cancellation. The run stops at its next checkpoint.
   * Returns false when nothing is running.
   */
  cancel(): boolean {
    if (this.state.status !== 'running' || !this.abortController) {
      return false;
    }

    if (!this.abortController.signal.aborted) {
      logger.info('Cancellation requested', { runId: this.state.runId });
      this.abortController.abort();
      this.commit({ ...this.state, message: 'Cancelling after the current batch...' });
    }
    return true;
  }

  /**
   * Reset a terminal state to idle. Returns false when there is nothing to acknowledge.
   */
  acknowledge(): boolean {
    if (!TERMINAL_STATUSES.has(this.state.status)) {
      return false;
    }

    this.commit({
      ...this.state,
      status: 'idle',
      progress: 0,
      message: 'Ready',
      error: null,
    });
    return true;
  }

  snapshot(): Readonly<JobState> {
    return freezeState(this.state);
  }

  isRunning(): boolean {
    return this.state.status === 'running';
  }

  /**
   * Resolves with the terminal snapshot of the current (or last) run
   */
  async waitForCompletion(): Promise<Readonly<JobState>> {
    return this.current ?? this.snapshot();
  }

  subscribe(listener: JobStateListener): () => void {
    this.events.on('change', listener);
    return () => {
      this.events.off('change', listener);
    };
  }

  private async execute(
    task: JobTask,
    ctx: JobContext,
    abortController: AbortController
  ): Promise<Readonly<JobState>> {
    let status: TerminalStatus;
    let message: string;
    let failure: string | null = null;

    try {
      const result = await task(ctx);
      message = result.message;

      if (result.outcome === 'cancelled') {
        logger.warn('Sync run cancelled', { runId: ctx.runId, message });
        captureMessage('Sync run cancelled', 'info', { runId: ctx.runId });
        status = 'cancelled';
      } else {
        logger.info('Sync run completed', { runId: ctx.runId, message });
        status = 'completed';
      }
    } catch (error) {
      failure = errorMessage(error);
      logger.error('Sync run failed', {
        runId: ctx.runId,
        error: failure,
        stack: error instanceof Error ? error.stack : undefined,
      });
      captureError(error instanceof Error ? error : new Error(failure), { runId: ctx.runId });
      status = 'failed';
      message = `Error: ${failure}`;
    }

    // Released before listeners run: one of them may already start the next run
    if (this.abortController === abortController) {
      this.abortController = null;
    }

    return this.finish(status, message, failure);
  }

  /**
   * Commit the terminal state and return its snapshot, taken before
   * listeners can move the controller on.
   */
  private finish(status: TerminalStatus, message: string, error: string | null): Readonly<JobState> {
    const finishedAt = this.clock();

    const terminal: JobState = {
      ...this.state,
      status,
      progress: status === 'completed' ? 100 : this.state.progress,
      message,
      finishedAt,
      lastRun: status === 'completed' ? finishedAt : this.state.lastRun,
      error,
    };
    const snapshot = freezeState(terminal);
    this.commit(terminal);
    return snapshot;
  }

  private commit(next: JobState): void {
    this.state = next;

    try {
      this.events.emit('change', this.snapshot());
    } catch (error) {
      logger.error('Job state listener threw', { error: errorMessage(error) });
    }
  }
}

export const jobController = new JobController();
