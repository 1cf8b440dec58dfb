import crypto from 'crypto';
import { errorMessage } from './errors';
import { Logger, MemorySink } from './logger';

export type JobKind = 'run' | 'cleanup';
export type JobStatus = 'running' | 'succeeded' | 'failed';

export interface JobOutcome {
  runId?: string;
  errors?: number;
}

export type JobTask = (log: Logger) => Promise<JobOutcome>;

interface Job {
  id: string;
  kind: JobKind;
  status: JobStatus;
  startedAt: string;
  finishedAt: string | null;
  outcome: JobOutcome;
  error: string | null;
  output: MemorySink;
  done: Promise<void>;
}

export interface JobView {
  id: string;
  kind: JobKind;
  status: JobStatus;
  startedAt: string;
  finishedAt: string | null;
  runId: string | null;
  errors: number;
  error: string | null;
  lines: string[];
  // pass back as `offset` to get only newer lines
  nextOffset: number;
}

export interface JobManagerOptions {
  silent?: boolean;
  newId?: () => string;
}

/**
 * Background jobs for the dashboard. One job runs at a time; each keeps its
 * log lines in memory so clients can poll them.
 */
export class JobManager {
  private jobs = new Map<string, Job>();
  private active: Job | null = null;
  private readonly newId: () => string;

  constructor(private readonly options: JobManagerOptions = {}) {
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  get activeJobId(): string | null {
    return this.active?.id ?? null;
  }

  /**
   * Starts `task` unless another job is still running, in which case nothing happens and null comes back.
   */
  start(kind: JobKind, task: JobTask): string | null {
    if (this.active) return null;

    const id = this.newId();
    const output = new MemorySink();
    const log = new Logger({ context: `${kind}:${id.slice(0, 8)}`, silent: this.options.silent, sinks: [output] });
    const job: Job = {
      id,
      kind,
      status: 'running',
      startedAt: new Date().toISOString(),
      finishedAt: null,
      outcome: {},
      error: null,
      output,
      done: Promise.resolve(),
    };
    this.jobs.set(id, job);
    this.active = job;

    job.done = task(log)
      .then(
        (outcome) => {
          job.outcome = outcome;
          job.status = outcome.errors ? 'failed' : 'succeeded';
        },
        (error: unknown) => {
          job.error = errorMessage(error);
          job.status = 'failed';
          log.error(`Job failed: ${job.error}`);
        }
      )
      .finally(() => {
        job.finishedAt = new Date().toISOString();
        if (this.active === job) this.active = null;
      });
    return id;
  }

  view(id: string, offset = 0): JobView | null {
    const job = this.jobs.get(id);
    if (!job) return null;
    const from = Math.max(0, Math.min(offset, job.output.lines.length));
    return {
      id: job.id,
      kind: job.kind,
      status: job.status,
      startedAt: job.startedAt,
      finishedAt: job.finishedAt,
      runId: job.outcome.runId ?? null,
      errors: job.outcome.errors ?? 0,
      error: job.error,
      lines: job.output.lines.slice(from),
      nextOffset: job.output.lines.length,
    };
  }

  async wait(id: string): Promise<void> {
    await this.jobs.get(id)?.done;
  }
}
