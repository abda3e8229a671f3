import { beforeEach, describe, expect, it } from "vitest";
import crypto from "crypto";
import { MemStorage } from "../../test-utils/memStorage";
import { FakeShopify, TEST_SHOP, fixedClock, jsonResponse, testConfig } from "../../test-utils/fixtures";
import { decrypt } from "./credentials";
import { InvalidState, InvalidTenant, TokenExchangeFailed } from "./errors";
import {
  COMPLIANCE_TOPICS,
  handleOAuthCallback,
  initiateOAuth,
  normalizeShopDomain,
  pruneExpiredOAuthAttempts,
  verifyOAuthQuery,
  type OAuthDeps,
} from "./oauth";
import { createShopifyClientFactory } from "./shopifyClient";

const TOKEN_PATH = "/admin/oauth/access_token";

describe("normalizeShopDomain", () => {
  it("lowercases and strips scheme and path", () => {
    expect(normalizeShopDomain("  HTTPS://Shop1.Example/admin  ", ".example")).toBe("shop1.example");
  });

  it("rejects domains outside the platform suffix", () => {
    expect(() => normalizeShopDomain("shop1.evil.test", ".example")).toThrow(InvalidTenant);
    expect(() => normalizeShopDomain("shop1.example.evil", ".example")).toThrow(InvalidTenant);
    expect(() => normalizeShopDomain("-shop.example", ".example")).toThrow(InvalidTenant);
    expect(() => normalizeShopDomain(undefined, ".example")).toThrow(InvalidTenant);
    expect(() => normalizeShopDomain(["shop1.example"], ".example")).toThrow(InvalidTenant);
  });
});

describe("OAuth flow", () => {
  const config = testConfig();
  let storage: MemStorage;
  let api: FakeShopify;
  let clock: ReturnType<typeof fixedClock>;
  let deps: OAuthDeps;

  beforeEach(() => {
    clock = fixedClock();
    storage = new MemStorage(clock.now);
    api = new FakeShopify()
      .on("POST", TOKEN_PATH, () => jsonResponse({ access_token: "tok_abc", scope: "read_products,read_orders" }))
      .on("GET", "/webhooks.json", () => jsonResponse({ webhooks: [] }))
      .on("POST", "/webhooks.json", (call) => jsonResponse({ webhook: { id: 1, topic: "x", address: "y" }, echo: call.body }));
    deps = {
      storage,
      config,
      clientFactory: createShopifyClientFactory(config, { fetch: api.fetch }),
      fetch: api.fetch,
      now: clock.now,
    };
  });

  it("builds the authorization redirect and records the attempt", async () => {
    const result = await initiateOAuth(deps, "shop1.example");
    const url = new URL(result.redirectUrl);

    expect(url.origin).toBe("https://shop1.example");
    expect(url.pathname).toBe("/admin/oauth/authorize");
    expect(url.searchParams.get("client_id")).toBe("test-api-key");
    expect(url.searchParams.get("scope")).toBe("read_products,read_orders,read_inventory");
    expect(url.searchParams.get("redirect_uri")).toBe("https://app.test/auth/callback");
    expect(url.searchParams.get("state")).toBe(result.nonce);
    expect(result.nonce).toMatch(/^[0-9a-f]{64}$/);
    expect(storage.oauthAttempts).toEqual([
      {
        nonce: result.nonce,
        shopDomain: TEST_SHOP,
        createdAt: new Date("2024-05-01T12:00:00.000Z"),
        expiresAt: new Date("2024-05-01T12:10:00.000Z"),
      },
    ]);
  });

  it("issues a different nonce for every attempt", async () => {
    const first = await initiateOAuth(deps, TEST_SHOP);
    const second = await initiateOAuth(deps, TEST_SHOP);
    expect(first.nonce).not.toBe(second.nonce);
  });

  it("rejects an invalid tenant before storing anything", async () => {
    await expect(initiateOAuth(deps, "shop1.other")).rejects.toBeInstanceOf(InvalidTenant);
    expect(storage.oauthAttempts).toHaveLength(0);
  });

  it("exchanges the code, stores the encrypted token and registers compliance webhooks", async () => {
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    const completion = await handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1");

    expect(storage.shops).toHaveLength(1);
    expect(storage.shops[0].accessTokenEncrypted).not.toContain("tok_abc");
    expect(decrypt(storage.shops[0].accessTokenEncrypted, config.encryptionKey)).toBe("tok_abc");
    expect(completion.shop.scope).toBe("read_products,read_orders");
    expect(storage.oauthAttempts).toHaveLength(0);

    expect(api.callsTo("POST", TOKEN_PATH)[0].body).toEqual({
      client_id: "test-api-key",
      client_secret: "test-api-secret",
      code: "code-1",
    });
    expect(api.callsTo("POST", "/webhooks.json").map((c) => c.body)).toEqual(
      COMPLIANCE_TOPICS.map((topic) => ({
        webhook: { topic, address: `https://app.test/webhooks/${topic}`, format: "json" },
      }))
    );
    expect(completion.webhooks).toEqual({ registered: [...COMPLIANCE_TOPICS], skipped: [], errors: [] });
  });

  it("rejects a replayed nonce", async () => {
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    await handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1");
    await expect(handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1")).rejects.toBeInstanceOf(InvalidState);
    expect(api.callsTo("POST", TOKEN_PATH)).toHaveLength(1);
  });

  it("rejects an unknown or missing nonce", async () => {
    await expect(handleOAuthCallback(deps, TEST_SHOP, "f".repeat(64), "code-1")).rejects.toBeInstanceOf(InvalidState);
    await expect(handleOAuthCallback(deps, TEST_SHOP, undefined, "code-1")).rejects.toBeInstanceOf(InvalidState);
  });

  it("rejects an expired nonce and consumes it", async () => {
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    clock.advance(config.oauthStateTtlMs);
    await expect(handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1")).rejects.toThrow("OAuth state expired");
    expect(storage.oauthAttempts).toHaveLength(0);
    expect(storage.shops).toHaveLength(0);
  });

  it("rejects a callback for another shop than the one that started", async () => {
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    await expect(handleOAuthCallback(deps, "shop2.example", nonce, "code-1")).rejects.toBeInstanceOf(InvalidState);
    expect(api.callsTo("POST", TOKEN_PATH)).toHaveLength(0);
    expect(storage.shops).toHaveLength(0);
  });

  it("leaves no credential behind when the exchange fails", async () => {
    api.on("POST", TOKEN_PATH, () => jsonResponse({ error: "invalid_request" }, { status: 400 }));
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);

    await expect(handleOAuthCallback(deps, TEST_SHOP, nonce, "bad-code")).rejects.toBeInstanceOf(TokenExchangeFailed);
    expect(storage.shops).toHaveLength(0);
    expect(storage.oauthAttempts).toHaveLength(0);
  });

  it("treats a token response without a token as a failed exchange", async () => {
    api.on("POST", TOKEN_PATH, () => jsonResponse({ scope: "read_products" }));
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    await expect(handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1")).rejects.toBeInstanceOf(TokenExchangeFailed);
  });

  it("requires a code", async () => {
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    await expect(handleOAuthCallback(deps, TEST_SHOP, nonce, "")).rejects.toBeInstanceOf(TokenExchangeFailed);
  });

  it("refreshes the token of an installed shop", async () => {
    const first = await initiateOAuth(deps, TEST_SHOP);
    await handleOAuthCallback(deps, TEST_SHOP, first.nonce, "code-1");
    api.on("POST", TOKEN_PATH, () => jsonResponse({ access_token: "tok_def", scope: "read_products" }));
    clock.advance(60_000);

    const second = await initiateOAuth(deps, TEST_SHOP);
    await handleOAuthCallback(deps, TEST_SHOP, second.nonce, "code-2");

    expect(storage.shops).toHaveLength(1);
    expect(decrypt(storage.shops[0].accessTokenEncrypted, config.encryptionKey)).toBe("tok_def");
    expect(storage.shops[0].tokenRefreshedAt).toEqual(new Date("2024-05-01T12:01:00.000Z"));
  });

  it("skips topics already subscribed and keeps going past failures", async () => {
    api
      .on("GET", "/webhooks.json", () => jsonResponse({
        webhooks: [{ id: 9, topic: "shop/redact", address: "https://app.test/webhooks/shop/redact" }],
      }))
      .on(
        "POST",
        "/webhooks.json",
        () => jsonResponse({ errors: { topic: ["Invalid topic"] } }, { status: 422 }),
        () => jsonResponse({ webhook: { id: 2, topic: "customers/redact", address: "https://app.test/webhooks/customers/redact" } })
      );
    const { nonce } = await initiateOAuth(deps, TEST_SHOP);
    const { webhooks } = await handleOAuthCallback(deps, TEST_SHOP, nonce, "code-1");

    expect(webhooks.registered).toEqual(["customers/redact"]);
    expect(webhooks.skipped).toEqual(["shop/redact"]);
    expect(webhooks.errors).toHaveLength(1);
    expect(webhooks.errors[0].topic).toBe("customers/data_request");
    expect(storage.shops).toHaveLength(1);
  });

  it("prunes expired attempts", async () => {
    await initiateOAuth(deps, TEST_SHOP);
    clock.advance(5 * 60 * 1000);
    await initiateOAuth(deps, TEST_SHOP);
    clock.advance(6 * 60 * 1000);

    expect(await pruneExpiredOAuthAttempts(storage, clock.now())).toBe(1);
    expect(storage.oauthAttempts).toHaveLength(1);
  });
});

describe("verifyOAuthQuery", () => {
  const secret = "test-api-secret";
  const sign = (params: Record<string, string>) =>
    crypto
      .createHmac("sha256", secret)
      .update(Object.keys(params).sort().map((k) => `${k}=${params[k]}`).join("&"))
      .digest("hex");

  it("accepts a correctly signed query", () => {
    const params = { code: "code-1", shop: TEST_SHOP, state: "abc", timestamp: "1714564800" };
    expect(verifyOAuthQuery({ ...params, hmac: sign(params) }, secret)).toBe(true);
  });

  it("rejects a tampered or unsigned query", () => {
    const params = { code: "code-1", shop: TEST_SHOP, state: "abc", timestamp: "1714564800" };
    expect(verifyOAuthQuery({ ...params, shop: "shop2.example", hmac: sign(params) }, secret)).toBe(false);
    expect(verifyOAuthQuery(params, secret)).toBe(false);
    expect(verifyOAuthQuery({ ...params, hmac: "zz" }, secret)).toBe(false);
  });
});
