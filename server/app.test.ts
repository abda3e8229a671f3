import { afterEach, beforeEach, describe, expect, it } from "vitest";
import crypto from "crypto";
import type { Server } from "http";
import { createApp } from "./app";
import { JobQueue } from "./jobs";
import { EmailService } from "./email";
import { MemStorage } from "./test-utils/memStorage";
import { FakeShopify, TEST_SHOP, fixedClock, installShop, jsonResponse, testConfig } from "./test-utils/fixtures";
import { createShopifyClientFactory } from "./integrations/shopify/shopifyClient";
import { SyncEngine } from "./integrations/shopify/syncEngine";
import { signWebhookBody } from "./integrations/shopify/webhookVerifier";
import { storeOrder, storeProduct } from "./integrations/shopify/syncStore";
import { shopifyOrderSchema, shopifyProductSchema } from "./integrations/shopify/types";

describe("HTTP surface", () => {
  const config = testConfig();
  let storage: MemStorage;
  let api: FakeShopify;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const clock = fixedClock();
    storage = new MemStorage(clock.now);
    api = new FakeShopify()
      .on("POST", "/admin/oauth/access_token", () => jsonResponse({ access_token: "tok_abc", scope: "read_products" }))
      .on("GET", "/webhooks.json", () => jsonResponse({ webhooks: [] }))
      .on("POST", "/webhooks.json", () => jsonResponse({ webhook: { id: 1, topic: "shop/redact", address: "x" } }));
    const queue = new JobQueue(storage, {
      maxAttempts: 3,
      deadlineMs: 60_000,
      backoffBaseMs: 100,
      backoffMaxMs: 1_000,
      now: clock.now,
    });
    const clientFactory = createShopifyClientFactory(config, { fetch: api.fetch });
    const engine = new SyncEngine({ storage, clientFactory, queue, options: { leaseMs: 60_000, now: clock.now } });
    const compliance = {
      storage,
      queue,
      exportTransport: new EmailService({ transporter: null, fromEmail: "", fromName: "", recipient: null }),
      now: clock.now,
    };

    const app = createApp({
      storage,
      config,
      oauth: { storage, config, clientFactory, fetch: api.fetch, now: clock.now },
      webhooks: { storage, config, compliance, now: clock.now },
      engine,
      queue,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function signedCallbackQuery(params: Record<string, string>): string {
    const message = Object.keys(params).sort().map((k) => `${k}=${params[k]}`).join("&");
    const hmac = crypto.createHmac("sha256", config.shopify.apiSecret).update(message).digest("hex");
    return new URLSearchParams({ ...params, hmac }).toString();
  }

  async function startInstall(): Promise<string> {
    const res = await fetch(`${baseUrl}/auth?tenant=${TEST_SHOP}`, { redirect: "manual" });
    const location = res.headers.get("location") ?? "";
    return new URL(location).searchParams.get("state") ?? "";
  }

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  describe("OAuth", () => {
    it("redirects to the authorization page", async () => {
      const res = await fetch(`${baseUrl}/auth?tenant=${TEST_SHOP}`, { redirect: "manual" });

      expect(res.status).toBe(302);
      const location = new URL(res.headers.get("location") ?? "");
      expect(`${location.origin}${location.pathname}`).toBe("https://shop1.example/admin/oauth/authorize");
      expect(location.searchParams.get("state")).toBe(storage.oauthAttempts[0].nonce);
    });

    it("rejects an invalid tenant", async () => {
      const res = await fetch(`${baseUrl}/auth?tenant=shop1.evil.test`, { redirect: "manual" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid shop domain: shop1.evil.test", code: "INVALID_TENANT" });
    });

    it("completes the install and lands on the success page", async () => {
      const state = await startInstall();
      const query = signedCallbackQuery({ code: "code-1", shop: TEST_SHOP, state, timestamp: "1714564800" });

      const res = await fetch(`${baseUrl}/auth/callback?${query}`, { redirect: "manual" });

      expect(res.status).toBe(302);
      expect(res.headers.get("location")).toBe("/auth/success?shop=shop1.example");
      expect(storage.shops.map((s) => s.shopDomain)).toEqual([TEST_SHOP]);
    });

    it("answers JSON clients with the error code", async () => {
      const state = await startInstall();
      const query = signedCallbackQuery({ code: "code-1", shop: TEST_SHOP, state, timestamp: "1714564800" });
      await fetch(`${baseUrl}/auth/callback?${query}`, { redirect: "manual" });

      const replay = await fetch(`${baseUrl}/auth/callback?${query}`, { headers: { Accept: "application/json" } });
      expect(replay.status).toBe(400);
      expect(await replay.json()).toEqual({ error: "Invalid or expired OAuth state", code: "INVALID_STATE" });
    });

    it("sends browsers to the error page on a bad callback signature", async () => {
      const state = await startInstall();
      const query = new URLSearchParams({ code: "code-1", shop: TEST_SHOP, state, hmac: "0".repeat(64) }).toString();

      const res = await fetch(`${baseUrl}/auth/callback?${query}`, { redirect: "manual" });

      expect(res.status).toBe(302);
      expect(res.headers.get("location")).toBe("/auth/error?reason=INVALID_STATE");
      expect(storage.oauthAttempts).toHaveLength(1);
      expect(api.callsTo("POST", "/admin/oauth/access_token")).toHaveLength(0);
    });

    it("escapes the shop on the success page", async () => {
      const res = await fetch(`${baseUrl}/auth/success?shop=${encodeURIComponent("<script>")}`);
      expect(await res.text()).toContain("<strong>&lt;script&gt;</strong>");
    });
  });

  describe("webhooks", () => {
    const body = JSON.stringify({ id: 1, title: "Mug" });

    it("answers 401 to a bad signature", async () => {
      const res = await fetch(`${baseUrl}/webhooks/products/update`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Shopify-Hmac-Sha256": signWebhookBody("wrong-secret", body),
          "X-Shopify-Shop-Domain": TEST_SHOP,
        },
        body,
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Invalid signature", code: "SIGNATURE_ERROR" });
    });

    it("verifies the exact bytes and processes the delivery", async () => {
      await installShop(storage, config);
      const res = await fetch(`${baseUrl}/webhooks/products/update`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Shopify-Hmac-Sha256": signWebhookBody(config.shopify.webhookSecret, body),
          "X-Shopify-Shop-Domain": TEST_SHOP,
          "X-Shopify-Webhook-Id": "wh-1",
        },
        body,
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, duplicate: false, ignored: false });
      expect(storage.products.map((p) => p.title)).toEqual(["Mug"]);
    });

    it("answers 404 to an unknown topic", async () => {
      const res = await fetch(`${baseUrl}/webhooks/carts/update`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Shopify-Hmac-Sha256": signWebhookBody(config.shopify.webhookSecret, body),
          "X-Shopify-Shop-Domain": TEST_SHOP,
        },
        body,
      });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Unknown webhook topic: carts/update", code: "UNKNOWN_TOPIC" });
    });
  });

  describe("sync API", () => {
    it("answers 404 for a shop that is not installed", async () => {
      const res = await fetch(`${baseUrl}/api/products?tenant=shop9.example`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Shop not found", code: "TENANT_NOT_FOUND" });
    });

    it("answers 400 for an unknown resource", async () => {
      await installShop(storage, config);
      const res = await fetch(`${baseUrl}/api/widgets?tenant=${TEST_SHOP}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Unknown resource: widgets", code: "INVALID_PAYLOAD" });
    });

    it("lists orders with their line items", async () => {
      await installShop(storage, config);
      await storeOrder(storage, TEST_SHOP, shopifyOrderSchema.parse({
        id: 5001,
        name: "#1001",
        line_items: [{ id: 1, quantity: 2 }],
      }), new Date("2024-05-01T12:00:00.000Z"));

      const res = await fetch(`${baseUrl}/api/orders?tenant=${TEST_SHOP}`);
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json).toMatchObject({
        orders: [{ remoteId: "5001", orderNumber: "#1001", lineItems: [{ lineItemRemoteId: "1", quantity: 2 }] }],
      });
    });

    it("lists products with their variants", async () => {
      await installShop(storage, config);
      await storeProduct(storage, TEST_SHOP, shopifyProductSchema.parse({
        id: 1,
        title: "Mug",
        variants: [{ id: 11, sku: "MUG-S", price: "9.50" }],
      }), new Date("2024-05-01T12:00:00.000Z"));

      const res = await fetch(`${baseUrl}/api/products?tenant=${TEST_SHOP}`);
      const json = await res.json();

      expect(res.status).toBe(200);
      expect(json).toMatchObject({
        products: [{ remoteId: "1", title: "Mug", variants: [{ variantRemoteId: "11", sku: "MUG-S", price: "9.50" }] }],
      });
    });

    it("queues a sync and rejects a second one while it is pending", async () => {
      await installShop(storage, config);
      const post = () => fetch(`${baseUrl}/api/sync/orders`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ tenant: TEST_SHOP }),
      });

      const first = await post();
      expect(first.status).toBe(202);
      const jobId = storage.jobs[0].id;
      expect(await first.json()).toEqual({ jobId, status: "PENDING" });

      const second = await post();
      expect(second.status).toBe(409);
      expect(await second.json()).toMatchObject({ code: "CONCURRENT_SYNC_REJECTED" });

      const job = await fetch(`${baseUrl}/api/jobs/${jobId}`);
      expect(await job.json()).toMatchObject({ id: jobId, kind: "sync", status: "PENDING", attempts: 0 });

      const shopStatus = await fetch(`${baseUrl}/api/shops/${TEST_SHOP}/status`);
      expect(await shopStatus.json()).toMatchObject({
        shopDomain: TEST_SHOP,
        counts: { products: 0, orders: 0 },
        activeJobs: [{ id: jobId, resourceKind: "orders", status: "PENDING" }],
      });
    });

    it("answers 404 for an unknown job", async () => {
      const res = await fetch(`${baseUrl}/api/jobs/missing`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Job not found" });
    });
  });
});
