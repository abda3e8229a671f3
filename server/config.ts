import { z } from "zod";

const DEFAULT_SCOPES = [
  "read_products",
  "write_products",
  "read_orders",
  "write_orders",
  "read_inventory",
  "write_inventory",
].join(",");

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: intFromEnv(5000),
  APP_URL: z.string().url().transform((url) => url.replace(/\/+$/, "")),

  SHOPIFY_API_KEY: z.string().min(1),
  SHOPIFY_API_SECRET: z.string().min(1),
  SHOPIFY_WEBHOOK_SECRET: z.string().min(1),
  SHOPIFY_SCOPES: z.string().default(DEFAULT_SCOPES),
  SHOPIFY_API_VERSION: z.string().regex(/^\d{4}-\d{2}$/).default("2024-01"),
  SHOP_DOMAIN_SUFFIX: z
    .string()
    .regex(/^\.[a-z0-9.-]+$/, "must start with a dot, e.g. .myshopify.com")
    .default(".myshopify.com"),

  DATABASE_URL: z.string().min(1),
  ENCRYPTION_KEY: z.string().min(16),

  OAUTH_STATE_TTL_MINUTES: intFromEnv(10),
  SYNC_MAX_ATTEMPTS: intFromEnv(5),
  SYNC_BACKOFF_BASE_MS: intFromEnv(500),
  SYNC_BACKOFF_MAX_MS: intFromEnv(30_000),
  SYNC_LEASE_SECONDS: intFromEnv(120),
  REQUEST_TIMEOUT_MS: intFromEnv(15_000),
  JOB_POLL_INTERVAL_MS: intFromEnv(2_000),
  JOB_DEADLINE_SECONDS: intFromEnv(1_500),
  JOB_MAX_ATTEMPTS: intFromEnv(3),
  JOB_CONCURRENCY: intFromEnv(2),
  WEBHOOK_RECEIPT_RETENTION_DAYS: intFromEnv(30),

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().optional(),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  SMTP_FROM_EMAIL: optionalString,
  SMTP_FROM_NAME: z.string().default("Shop Sync"),
  DATA_EXPORT_EMAIL: optionalString,
});

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  fromEmail: string;
  fromName: string;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  appUrl: string;
  shopify: {
    apiKey: string;
    apiSecret: string;
    webhookSecret: string;
    scopes: string[];
    apiVersion: string;
    shopDomainSuffix: string;
  };
  databaseUrl: string;
  encryptionKey: string;
  oauthStateTtlMs: number;
  sync: {
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    leaseMs: number;
    requestTimeoutMs: number;
  };
  jobs: {
    pollIntervalMs: number;
    deadlineMs: number;
    maxAttempts: number;
    concurrency: number;
  };
  webhookReceiptRetentionMs: number;
  smtp: SmtpSettings | null;
  dataExportEmail: string | null;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(issues);
  }
  const e = parsed.data;

  let smtp: SmtpSettings | null = null;
  if (e.SMTP_HOST && e.SMTP_PORT && e.SMTP_USER && e.SMTP_PASSWORD && e.SMTP_FROM_EMAIL) {
    smtp = {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_PORT === 465,
      user: e.SMTP_USER,
      password: e.SMTP_PASSWORD,
      fromEmail: e.SMTP_FROM_EMAIL,
      fromName: e.SMTP_FROM_NAME,
    };
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    appUrl: e.APP_URL,
    shopify: {
      apiKey: e.SHOPIFY_API_KEY,
      apiSecret: e.SHOPIFY_API_SECRET,
      webhookSecret: e.SHOPIFY_WEBHOOK_SECRET,
      scopes: e.SHOPIFY_SCOPES.split(",").map((s) => s.trim()).filter(Boolean),
      apiVersion: e.SHOPIFY_API_VERSION,
      shopDomainSuffix: e.SHOP_DOMAIN_SUFFIX,
    },
    databaseUrl: e.DATABASE_URL,
    encryptionKey: e.ENCRYPTION_KEY,
    oauthStateTtlMs: e.OAUTH_STATE_TTL_MINUTES * 60 * 1000,
    sync: {
      maxAttempts: e.SYNC_MAX_ATTEMPTS,
      backoffBaseMs: e.SYNC_BACKOFF_BASE_MS,
      backoffMaxMs: e.SYNC_BACKOFF_MAX_MS,
      leaseMs: e.SYNC_LEASE_SECONDS * 1000,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    jobs: {
      pollIntervalMs: e.JOB_POLL_INTERVAL_MS,
      deadlineMs: e.JOB_DEADLINE_SECONDS * 1000,
      maxAttempts: e.JOB_MAX_ATTEMPTS,
      concurrency: e.JOB_CONCURRENCY,
    },
    webhookReceiptRetentionMs: e.WEBHOOK_RECEIPT_RETENTION_DAYS * 24 * 60 * 60 * 1000,
    smtp,
    dataExportEmail: e.DATA_EXPORT_EMAIL ?? null,
  };
}
