import { randomUUID } from "crypto";
import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import { unixNow } from "../core/retry";

export type JobStatus = "queued" | "running" | "succeeded" | "failed";

export interface JobRecord {
  id: string;
  kind: string;
  status: JobStatus;
  result: unknown;
  error: string | null;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
}

const MAX_RETAINED_JOBS = 200;

/**
 * In-process background queue. Jobs run one at a time in submission order;
 * a failed job is recorded and never stops the ones after it.
 */
export class JobQueue {
  private readonly jobs = new Map<string, JobRecord>();
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly newId: () => string = randomUUID) {}

  enqueue<T>(kind: string, task: () => Promise<T>): JobRecord {
    const job: JobRecord = {
      id: this.newId(),
      kind,
      status: "queued",
      result: null,
      error: null,
      createdAt: unixNow(),
      startedAt: null,
      finishedAt: null,
    };
    this.jobs.set(job.id, job);
    this.prune();
    logger.info({ jobId: job.id, kind }, "Job queued");

    this.tail = this.tail.then(() => this.run(job, task));
    return { ...job };
  }

  get(id: string): JobRecord | null {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  list(): JobRecord[] {
    return [...this.jobs.values()].reverse().map((job) => ({ ...job }));
  }

  /** Resolves once every job queued so far has finished. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private async run<T>(job: JobRecord, task: () => Promise<T>): Promise<void> {
    job.status = "running";
    job.startedAt = unixNow();
    logger.info({ jobId: job.id, kind: job.kind }, "Job started");
    try {
      job.result = await task();
      job.status = "succeeded";
      logger.info({ jobId: job.id, kind: job.kind }, "Job succeeded");
    } catch (error) {
      job.status = "failed";
      job.error = errorMessage(error);
      logger.error({ jobId: job.id, kind: job.kind, err: error }, "Job failed");
    } finally {
      job.finishedAt = unixNow();
    }
  }

  private prune(): void {
    if (this.jobs.size <= MAX_RETAINED_JOBS) return;
    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= MAX_RETAINED_JOBS) break;
      if (job.status === "succeeded" || job.status === "failed") this.jobs.delete(id);
    }
  }
}
