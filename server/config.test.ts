import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

const baseEnv = {
  APP_URL: "https://app.test/",
  SHOPIFY_API_KEY: "test-api-key",
  SHOPIFY_API_SECRET: "test-api-secret",
  SHOPIFY_WEBHOOK_SECRET: "test-webhook-secret",
  DATABASE_URL: "postgres://localhost/test",
  ENCRYPTION_KEY: "test-encryption-key",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(baseEnv);

    expect(config.env).toBe("development");
    expect(config.port).toBe(5000);
    expect(config.appUrl).toBe("https://app.test");
    expect(config.shopify.shopDomainSuffix).toBe(".myshopify.com");
    expect(config.shopify.scopes).toContain("read_orders");
    expect(config.oauthStateTtlMs).toBe(600_000);
    expect(config.sync).toEqual({
      maxAttempts: 5,
      backoffBaseMs: 500,
      backoffMaxMs: 30_000,
      leaseMs: 120_000,
      requestTimeoutMs: 15_000,
    });
    expect(config.jobs.concurrency).toBe(2);
    expect(config.smtp).toBeNull();
    expect(config.dataExportEmail).toBeNull();
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: "8080",
      SHOPIFY_SCOPES: "read_products, read_orders",
      SHOP_DOMAIN_SUFFIX: ".example",
      SYNC_LEASE_SECONDS: "30",
      SMTP_HOST: "smtp.app.test",
      SMTP_PORT: "465",
      SMTP_USER: "mailer",
      SMTP_PASSWORD: "test-password",
      SMTP_FROM_EMAIL: "noreply@app.test",
      DATA_EXPORT_EMAIL: "privacy@app.test",
    });

    expect(config.port).toBe(8080);
    expect(config.shopify.scopes).toEqual(["read_products", "read_orders"]);
    expect(config.shopify.shopDomainSuffix).toBe(".example");
    expect(config.sync.leaseMs).toBe(30_000);
    expect(config.smtp).toMatchObject({ host: "smtp.app.test", port: 465, secure: true, fromName: "Shop Sync" });
    expect(config.dataExportEmail).toBe("privacy@app.test");
  });

  it("lists every problem", () => {
    const error = (() => {
      try {
        loadConfig({ APP_URL: "not a url", ENCRYPTION_KEY: "short", SHOP_DOMAIN_SUFFIX: "example" });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues.map((issue) => issue.split(":")[0]) : [];
    expect(issues).toEqual(expect.arrayContaining([
      "APP_URL",
      "SHOPIFY_API_KEY",
      "SHOPIFY_API_SECRET",
      "SHOPIFY_WEBHOOK_SECRET",
      "SHOP_DOMAIN_SUFFIX",
      "DATABASE_URL",
      "ENCRYPTION_KEY",
    ]));
  });
});
