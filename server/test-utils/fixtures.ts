import type { AppConfig } from "../config";
import type { Shop } from "@shared/schema";
import type { FetchLike } from "../integrations/shopify/shopifyClient";
import { encrypt } from "../integrations/shopify/credentials";
import type { MemStorage } from "./memStorage";

export const TEST_SHOP = "shop1.example";
export const TEST_API_VERSION = "2024-10";

export function testConfig(): AppConfig {
  return {
    env: "test",
    port: 0,
    appUrl: "https://app.test",
    shopify: {
      apiKey: "test-api-key",
      apiSecret: "test-api-secret",
      webhookSecret: "test-webhook-secret",
      scopes: ["read_products", "read_orders", "read_inventory"],
      apiVersion: TEST_API_VERSION,
      shopDomainSuffix: ".example",
    },
    databaseUrl: "postgres://unused",
    encryptionKey: "test-encryption-key",
    oauthStateTtlMs: 10 * 60 * 1000,
    sync: {
      maxAttempts: 3,
      backoffBaseMs: 100,
      backoffMaxMs: 1_000,
      leaseMs: 60_000,
      requestTimeoutMs: 5_000,
    },
    jobs: {
      pollIntervalMs: 1_000,
      deadlineMs: 60_000,
      maxAttempts: 3,
      concurrency: 2,
    },
    webhookReceiptRetentionMs: 24 * 60 * 60 * 1000,
    smtp: null,
    dataExportEmail: null,
  };
}

/** Mutable clock for code that takes a `now` function. */
export function fixedClock(start = "2024-05-01T12:00:00.000Z") {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export async function installShop(
  storage: MemStorage,
  config: AppConfig,
  shopDomain = TEST_SHOP,
  accessToken = "tok_test"
): Promise<Shop> {
  return storage.upsertShop(
    { shopDomain, accessTokenEncrypted: encrypt(accessToken, config.encryptionKey), scope: "read_products" },
    new Date("2024-05-01T00:00:00.000Z")
  );
}

export function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "Content-Type": "application/json", ...init.headers },
  });
}

type Responder = (call: RecordedCall) => Response | Promise<Response>;

export interface RecordedCall {
  method: string;
  url: string;
  /** Path with the `/admin/api/<version>` prefix removed, plus the query string. */
  path: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Scripted Admin API. Responders for a `METHOD path` key are used in order;
 * the last one keeps answering once the others are spent.
 */
export class FakeShopify {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, Responder[]>();

  constructor(private readonly apiVersion = TEST_API_VERSION) {}

  on(method: string, path: string, ...responders: Responder[]): this {
    this.routes.set(`${method} ${path}`, responders);
    return this;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((c) => c.method === method && c.path === path);
  }

  readonly fetch: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const prefix = `/admin/api/${this.apiVersion}`;
    const pathname = parsed.pathname.startsWith(prefix) ? parsed.pathname.slice(prefix.length) : parsed.pathname;
    const method = init?.method ?? "GET";
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const call: RecordedCall = {
      method,
      url,
      path: `${pathname}${parsed.search}`,
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    this.calls.push(call);

    const responders = this.routes.get(`${method} ${call.path}`);
    if (!responders || responders.length === 0) {
      return jsonResponse({ errors: "Not Found" }, { status: 404 });
    }
    const responder = responders.length > 1 ? responders.shift() : responders[0];
    if (!responder) {
      return jsonResponse({ errors: "Not Found" }, { status: 404 });
    }
    return responder(call);
  };
}

export function linkHeader(shopDomain: string, path: string, apiVersion = TEST_API_VERSION): Record<string, string> {
  return { Link: `<https://${shopDomain}/admin/api/${apiVersion}${path}>; rel="next"` };
}
