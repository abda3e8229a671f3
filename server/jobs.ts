import { z } from "zod";
import { RESOURCE_KINDS, type BackgroundJob, type JobKind } from "@shared/schema";
import type { IStorage } from "./storage";

// Durable job queue on the background_jobs table.
//
// Status flow: PENDING -> RUNNING -> COMPLETED
//                          RUNNING -> RETRY -> RUNNING ... -> FAILED
// A RUNNING job whose lease lapses (worker crash) is claimed again.

export const jobPayloadSchemas = {
  sync: z.object({
    shopDomain: z.string(),
    resourceKind: z.enum(RESOURCE_KINDS),
  }),
  data_export: z.object({
    shopDomain: z.string(),
    dataRequestId: z.string(),
  }),
} satisfies Record<JobKind, z.ZodTypeAny>;

export type JobPayload<K extends JobKind> = z.infer<typeof jobPayloadSchemas[K]>;

export interface JobQueueOptions {
  maxAttempts: number;
  deadlineMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  now?: () => Date;
}

export class JobDeadlineExceeded extends Error {
  constructor(jobId: string, deadlineMs: number) {
    super(`Job ${jobId} exceeded its ${deadlineMs}ms deadline`);
    this.name = "JobDeadlineExceeded";
  }
}

export class JobQueue {
  private readonly now: () => Date;

  constructor(
    private readonly storage: IStorage,
    readonly options: JobQueueOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Adds a job unless an active job with the same dedupe key exists. */
  async enqueue<K extends JobKind>(
    kind: K,
    shopDomain: string,
    dedupeKey: string,
    payload: JobPayload<K>
  ): Promise<{ job: BackgroundJob; created: boolean }> {
    const now = this.now();
    const result = await this.storage.enqueueJob({
      kind,
      shopDomain,
      dedupeKey,
      payloadJson: payload,
      status: "PENDING",
      maxAttempts: this.options.maxAttempts,
      runAt: now,
      createdAt: now,
      updatedAt: now,
    });
    if (result.created) {
      console.log(`[Jobs] Enqueued ${kind} job ${result.job.id} (${dedupeKey})`);
    }
    return result;
  }

  async get(id: string): Promise<BackgroundJob | undefined> {
    return this.storage.getJob(id);
  }

  async findActive(dedupeKey: string): Promise<BackgroundJob | undefined> {
    return this.storage.findActiveJob(dedupeKey);
  }

  async claim(): Promise<BackgroundJob | undefined> {
    const now = this.now();
    return this.storage.claimNextJob(now, new Date(now.getTime() + this.options.deadlineMs));
  }

  async complete(job: BackgroundJob, result: unknown): Promise<void> {
    await this.storage.completeJob(job.id, result ?? null, this.now());
  }

  /** Reschedules with exponential backoff, or marks FAILED once attempts run out. */
  async retryOrFail(job: BackgroundJob, errorMessage: string, retryable = true): Promise<"RETRY" | "FAILED"> {
    const now = this.now();
    if (!retryable || job.attempts >= job.maxAttempts) {
      await this.storage.failJob(job.id, errorMessage, now);
      console.error(`[Jobs] ${job.kind} job ${job.id} failed after ${job.attempts} attempt(s): ${errorMessage}`);
      return "FAILED";
    }
    const backoff = Math.min(this.options.backoffMaxMs, this.options.backoffBaseMs * 2 ** (job.attempts - 1));
    await this.storage.retryJob(job.id, new Date(now.getTime() + backoff), errorMessage, now);
    console.warn(`[Jobs] ${job.kind} job ${job.id} attempt ${job.attempts} failed, retrying in ${backoff}ms: ${errorMessage}`);
    return "RETRY";
  }
}

export type JobHandler = (job: BackgroundJob, signal: AbortSignal) => Promise<unknown>;

export interface JobWorkerOptions {
  queue: JobQueue;
  handlers: Record<JobKind, JobHandler>;
  pollIntervalMs: number;
  concurrency: number;
  deadlineMs: number;
  isRetryable?: (error: unknown) => boolean;
  maintenance?: () => Promise<void>;
}

export class JobWorker {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: JobWorkerOptions) {}

  start(): void {
    if (this.timer) return;
    console.log(`[Jobs] Worker started (concurrency ${this.options.concurrency}, poll ${this.options.pollIntervalMs}ms)`);
    this.timer = setInterval(() => {
      this.tick().catch((error) => console.error("[Jobs] Poll failed:", error));
    }, this.options.pollIntervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled([...this.inFlight]);
    console.log("[Jobs] Worker stopped");
  }

  /**
   * One poll: runs maintenance, then claims jobs until the pool is full or the
   * queue is empty. Resolves once every job claimed in this tick has settled.
   */
  async tick(): Promise<number> {
    if (this.ticking) return 0;
    this.ticking = true;
    const started: Promise<void>[] = [];
    try {
      if (this.options.maintenance) {
        await this.options.maintenance();
      }
      while (this.inFlight.size < this.options.concurrency) {
        const job = await this.options.queue.claim();
        if (!job) break;
        const run = this.run(job).finally(() => this.inFlight.delete(run));
        this.inFlight.add(run);
        started.push(run);
      }
    } finally {
      this.ticking = false;
    }
    await Promise.all(started);
    return started.length;
  }

  private async run(job: BackgroundJob): Promise<void> {
    const { queue, handlers, deadlineMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new JobDeadlineExceeded(job.id, deadlineMs);
        controller.abort(error);
        reject(error);
      }, deadlineMs);
    });

    console.log(`[Jobs] Running ${job.kind} job ${job.id} (attempt ${job.attempts}/${job.maxAttempts})`);
    const handling = handlers[job.kind](job, controller.signal);
    try {
      const result = await Promise.race([handling, deadline]);
      await queue.complete(job, result);
      console.log(`[Jobs] ${job.kind} job ${job.id} completed`);
    } catch (error) {
      if (controller.signal.aborted) {
        // The handler may still hold resources (a sync lease); the job is only
        // rescheduled once it has unwound
        await handling.then(
          () => console.warn(`[Jobs] ${job.kind} job ${job.id} finished after its deadline; result discarded`),
          (late: unknown) => console.warn(`[Jobs] ${job.kind} job ${job.id} unwound after abort:`, late instanceof Error ? late.message : late)
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      const retryable = this.options.isRetryable ? this.options.isRetryable(error) : true;
      await queue.retryOrFail(job, message, retryable);
    } finally {
      clearTimeout(timer);
    }
  }
}
