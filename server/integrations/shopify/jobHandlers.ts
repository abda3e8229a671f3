import { ZodError } from "zod";
import type { JobKind } from "@shared/schema";
import { jobPayloadSchemas, type JobHandler } from "../../jobs";
import type { IStorage } from "../../storage";
import { runDataExport, type ComplianceDeps } from "./compliance";
import { ConcurrentSyncRejected, IntegrationError } from "./errors";
import { pruneExpiredOAuthAttempts } from "./oauth";
import type { SyncEngine } from "./syncEngine";
import { pruneWebhookReceipts } from "./webhookHandler";

export function createJobHandlers(deps: {
  engine: SyncEngine;
  compliance: ComplianceDeps;
}): Record<JobKind, JobHandler> {
  return {
    sync: async (job, signal) => {
      const payload = jobPayloadSchemas.sync.parse(job.payloadJson);
      try {
        return await deps.engine.syncResource(payload.shopDomain, payload.resourceKind, { signal });
      } catch (error) {
        // Another run holds the lease; this request is covered by it
        if (error instanceof ConcurrentSyncRejected) {
          console.log(`[Jobs] sync job ${job.id} coalesced into the running ${payload.resourceKind} sync`);
          return { coalesced: true };
        }
        throw error;
      }
    },
    data_export: async (job) => {
      const payload = jobPayloadSchemas.data_export.parse(job.payloadJson);
      return runDataExport(deps.compliance, payload.dataRequestId);
    },
  };
}

/** Request and shop errors are terminal; remote and infrastructure errors are retried. */
export function isRetryableJobError(error: unknown): boolean {
  if (error instanceof ZodError) return false;
  if (error instanceof IntegrationError) {
    return error.code === "SYNC_FAILED" || error.code === "SHOPIFY_API_ERROR";
  }
  return true;
}

export function createMaintenanceTask(deps: {
  storage: IStorage;
  receiptRetentionMs: number;
  now?: () => Date;
}): () => Promise<void> {
  return async () => {
    const now = deps.now?.() ?? new Date();
    const attempts = await pruneExpiredOAuthAttempts(deps.storage, now);
    const receipts = await pruneWebhookReceipts(deps.storage, now, deps.receiptRetentionMs);
    if (attempts > 0 || receipts > 0) {
      console.log(`[Jobs] Maintenance pruned ${attempts} OAuth attempt(s), ${receipts} webhook receipt(s)`);
    }
  };
}
