import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { DatabaseStorage } from "./storage";
import { JobQueue, JobWorker } from "./jobs";
import { EmailService } from "./email";
import { createApp } from "./app";
import {
  createJobHandlers,
  createMaintenanceTask,
  createShopifyClientFactory,
  isRetryableJobError,
  SyncEngine,
  type ComplianceDeps,
} from "./integrations/shopify";

async function main() {
  const config = loadConfig();
  const { pool, db } = createDatabase(config.databaseUrl);
  const storage = new DatabaseStorage(db);

  const queue = new JobQueue(storage, {
    maxAttempts: config.jobs.maxAttempts,
    deadlineMs: config.jobs.deadlineMs,
    backoffBaseMs: config.sync.backoffBaseMs,
    backoffMaxMs: config.sync.backoffMaxMs,
  });
  const clientFactory = createShopifyClientFactory(config);
  const engine = new SyncEngine({
    storage,
    clientFactory,
    queue,
    options: { leaseMs: config.sync.leaseMs },
  });

  const emailService = EmailService.fromConfig(config.smtp, config.dataExportEmail);
  if (config.smtp) {
    await emailService.verify();
  }
  const compliance: ComplianceDeps = { storage, queue, exportTransport: emailService };

  const app = createApp({
    storage,
    config,
    oauth: { storage, config, clientFactory },
    webhooks: { storage, config, compliance },
    engine,
    queue,
  });

  const worker = new JobWorker({
    queue,
    handlers: createJobHandlers({ engine, compliance }),
    pollIntervalMs: config.jobs.pollIntervalMs,
    concurrency: config.jobs.concurrency,
    deadlineMs: config.jobs.deadlineMs,
    isRetryable: isRetryableJobError,
    maintenance: createMaintenanceTask({ storage, receiptRetentionMs: config.webhookReceiptRetentionMs }),
  });

  const server = app.listen(config.port, "0.0.0.0", () => {
    console.log(`serving on port ${config.port}`);
  });
  worker.start();

  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close();
    await worker.stop();
    await pool.end();
    process.exit(0);
  };
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
