import { beforeEach, describe, expect, it, vi } from "vitest";
import type { BackgroundJob } from "@shared/schema";
import { MemStorage } from "./test-utils/memStorage";
import { fixedClock } from "./test-utils/fixtures";
import { JobQueue, JobWorker, type JobHandler } from "./jobs";

const SHOP = "shop1.example";

describe("JobQueue and JobWorker", () => {
  let storage: MemStorage;
  let clock: ReturnType<typeof fixedClock>;
  let queue: JobQueue;

  beforeEach(() => {
    clock = fixedClock();
    storage = new MemStorage(clock.now);
    queue = new JobQueue(storage, {
      maxAttempts: 3,
      deadlineMs: 60_000,
      backoffBaseMs: 100,
      backoffMaxMs: 1_000,
      now: clock.now,
    });
  });

  function worker(handlers: { sync?: JobHandler; data_export?: JobHandler }, extra: Partial<{
    concurrency: number;
    deadlineMs: number;
    isRetryable: (error: unknown) => boolean;
    maintenance: () => Promise<void>;
  }> = {}) {
    const unused: JobHandler = async () => {
      throw new Error("unexpected job");
    };
    return new JobWorker({
      queue,
      handlers: { sync: handlers.sync ?? unused, data_export: handlers.data_export ?? unused },
      pollIntervalMs: 1_000,
      concurrency: extra.concurrency ?? 2,
      deadlineMs: extra.deadlineMs ?? 60_000,
      isRetryable: extra.isRetryable,
      maintenance: extra.maintenance,
    });
  }

  const enqueueSync = (kind: "products" | "orders" | "inventory" = "orders") =>
    queue.enqueue("sync", SHOP, `sync:${SHOP}:${kind}`, { shopDomain: SHOP, resourceKind: kind });

  it("dedupes active jobs by key", async () => {
    const first = await enqueueSync();
    const second = await enqueueSync();

    expect(first.created).toBe(true);
    expect(second).toEqual({ job: first.job, created: false });
    expect(storage.jobs).toHaveLength(1);
  });

  it("runs a due job to completion", async () => {
    const { job } = await enqueueSync();
    const handler = vi.fn<JobHandler>(async () => ({ pages: 1 }));

    expect(await worker({ sync: handler }).tick()).toBe(1);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(await queue.get(job.id)).toMatchObject({ status: "COMPLETED", attempts: 1, resultJson: { pages: 1 }, leaseExpiresAt: null });
  });

  it("accepts a new job for the key once the previous one completed", async () => {
    await enqueueSync();
    await worker({ sync: async () => null }).tick();
    expect((await enqueueSync()).created).toBe(true);
  });

  it("retries with exponential backoff and fails after the last attempt", async () => {
    const { job } = await enqueueSync();
    const w = worker({ sync: async () => {
      throw new Error("boom");
    } });

    await w.tick();
    expect(await queue.get(job.id)).toMatchObject({
      status: "RETRY",
      attempts: 1,
      lastErrorMessage: "boom",
      runAt: new Date("2024-05-01T12:00:00.100Z"),
    });

    expect(await w.tick()).toBe(0);

    clock.advance(100);
    await w.tick();
    expect(await queue.get(job.id)).toMatchObject({ status: "RETRY", attempts: 2, runAt: new Date("2024-05-01T12:00:00.300Z") });

    clock.advance(200);
    await w.tick();
    expect(await queue.get(job.id)).toMatchObject({ status: "FAILED", attempts: 3, lastErrorMessage: "boom" });
  });

  it("fails at once when the error is not retryable", async () => {
    const { job } = await enqueueSync();
    await worker(
      { sync: async () => {
        throw new Error("bad request");
      } },
      { isRetryable: () => false }
    ).tick();

    expect(await queue.get(job.id)).toMatchObject({ status: "FAILED", attempts: 1 });
  });

  it("aborts a job that overruns its deadline", async () => {
    const { job } = await enqueueSync();
    let aborted = false;
    const hanging: JobHandler = (_job, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          reject(signal.reason);
        });
      });

    await worker({ sync: hanging }, { deadlineMs: 10 }).tick();

    expect(aborted).toBe(true);
    expect(await queue.get(job.id)).toMatchObject({
      status: "RETRY",
      lastErrorMessage: `Job ${job.id} exceeded its 10ms deadline`,
    });
  });

  it("reschedules an overrun job only after its handler has unwound", async () => {
    const { job } = await enqueueSync();
    let statusAtRelease: string | undefined;
    const slowToUnwind: JobHandler = async (_job, signal) => {
      await storage.acquireSyncLease(SHOP, "orders", "job-holder", new Date("2024-05-01T12:05:00.000Z"), clock.now());
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve()));
      await new Promise((resolve) => setTimeout(resolve, 20));
      statusAtRelease = (await queue.get(job.id))?.status;
      await storage.releaseSyncLease(SHOP, "orders", "job-holder");
      throw signal.reason;
    };

    await worker({ sync: slowToUnwind }, { deadlineMs: 10 }).tick();

    expect(statusAtRelease).toBe("RUNNING");
    expect(storage.syncLeases).toHaveLength(0);
    expect(await queue.get(job.id)).toMatchObject({
      status: "RETRY",
      lastErrorMessage: `Job ${job.id} exceeded its 10ms deadline`,
    });
  });

  it("claims no more jobs than the concurrency allows", async () => {
    await enqueueSync("products");
    await enqueueSync("orders");
    await enqueueSync("inventory");

    const ran: string[] = [];
    const handler: JobHandler = async (job: BackgroundJob) => {
      ran.push(job.dedupeKey);
      return null;
    };

    expect(await worker({ sync: handler }, { concurrency: 2 }).tick()).toBe(2);
    expect(ran).toHaveLength(2);
    expect(storage.jobs.filter((j) => j.status === "PENDING")).toHaveLength(1);
  });

  it("redelivers a running job whose lease lapsed", async () => {
    const { job } = await enqueueSync();
    const claimed = await queue.claim();
    expect(claimed?.id).toBe(job.id);
    expect(await queue.claim()).toBeUndefined();

    clock.advance(60_000);
    const again = await queue.claim();
    expect(again).toMatchObject({ id: job.id, status: "RUNNING", attempts: 2 });
  });

  it("runs maintenance on every tick", async () => {
    const maintenance = vi.fn(async () => {});
    const w = worker({}, { maintenance });

    await w.tick();
    await w.tick();
    expect(maintenance).toHaveBeenCalledTimes(2);
  });
});
