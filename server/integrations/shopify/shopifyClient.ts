import { setTimeout as delay } from "timers/promises";
import type { ZodType, ZodTypeDef } from "zod";
import type { Shop } from "@shared/schema";
import type { AppConfig } from "../../config";
import { decrypt } from "./credentials";
import { ShopifyApiError, SyncFailed } from "./errors";
import {
  shopifyLocationsResponseSchema,
  shopifyWebhooksResponseSchema,
  shopifyWebhookResponseSchema,
  type ShopifyLocation,
  type ShopifyWebhook,
} from "./types";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface ShopifyClientOptions {
  shopDomain: string;
  accessToken: string;
  apiVersion: string;
  timeoutMs: number;
  retry: RetryPolicy;
  fetch?: FetchLike;
  sleep?: SleepFn;
}

export interface ShopifyPage<T> {
  data: T;
  /** Path of the next page (relative to the API base), or null on the last page. */
  nextPath: string | null;
}

export interface PageOptions {
  signal?: AbortSignal;
  beforeRetryWait?: (waitMs: number) => Promise<void>;
}

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function computeBackoff(attempt: number, policy: Pick<RetryPolicy, "backoffBaseMs" | "backoffMaxMs">): number {
  return Math.min(policy.backoffMaxMs, policy.backoffBaseMs * 2 ** (attempt - 1));
}

/** Parses `Retry-After` (delta seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now.getTime());
}

/**
 * Extracts the `rel="next"` target of a `Link` header as a path relative to
 * `/admin/api/<version>`.
 */
export function parseNextLink(linkHeader: string | null, apiVersion: string): string | null {
  if (!linkHeader) return null;
  for (const part of linkHeader.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (!match) continue;
    const url = new URL(match[1], "https://placeholder.invalid");
    const prefix = `/admin/api/${apiVersion}`;
    const path = url.pathname.startsWith(prefix) ? url.pathname.slice(prefix.length) : url.pathname;
    return `${path}${url.search}`;
  }
  return null;
}

export class ShopifyClient {
  private readonly shopDomain: string;
  private readonly accessToken: string;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: SleepFn;

  constructor(options: ShopifyClientOptions) {
    this.shopDomain = options.shopDomain;
    this.accessToken = options.accessToken;
    this.apiVersion = options.apiVersion;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getShopDomain(): string {
    return this.shopDomain;
  }

  private getBaseUrl(): string {
    return `https://${this.shopDomain}/admin/api/${this.apiVersion}`;
  }

  /** One attempt. Failures surface as ShopifyApiError; `transient` marks retryable ones. */
  private async send<T>(
    method: string,
    endpoint: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<{ data: T; headers: Headers }> {
    const url = `${this.getBaseUrl()}${endpoint}`;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    console.log(`[Shopify] ${method} ${endpoint}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          "Content-Type": "application/json",
          "Accept": "application/json",
          "X-Shopify-Access-Token": this.accessToken,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      if (timedOut) {
        throw new ShopifyApiError(`Request timed out after ${this.timeoutMs}ms`, null, null, true);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ShopifyApiError(`Network error: ${message}`, null, null, true);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      console.error(`[Shopify] API error ${response.status} on ${method} ${endpoint}`);
      const transient = response.status === 429 || response.status >= 500;
      throw new ShopifyApiError(
        `Shopify API error ${response.status}: ${errorText.slice(0, 200)}`,
        response.status,
        parseRetryAfter(response.headers.get("retry-after")),
        transient
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new ShopifyApiError(`Invalid JSON from ${endpoint}`, response.status);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ShopifyApiError(`Unexpected response shape from ${endpoint}: ${parsed.error.message}`, response.status);
    }
    return { data: parsed.data, headers: response.headers };
  }

  /**
   * Fetches one page of a collection, retrying 429, 5xx, timeouts and network
   * errors with exponential backoff or the server's `Retry-After`.
   * `beforeRetryWait` runs with the wait length before every backoff sleep;
   * if it throws, the fetch stops with that error.
   */
  async getPage<T>(
    endpoint: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    opts: PageOptions = {}
  ): Promise<ShopifyPage<T>> {
    const { signal, beforeRetryWait } = opts;
    for (let attempt = 1; ; attempt++) {
      try {
        const { data, headers } = await this.send("GET", endpoint, schema, undefined, signal);
        return { data, nextPath: parseNextLink(headers.get("link"), this.apiVersion) };
      } catch (error) {
        if (signal?.aborted) throw error;
        if (!(error instanceof ShopifyApiError)) throw error;
        if (!error.transient) {
          throw new SyncFailed(`GET ${endpoint} failed: ${error.message}`, { cause: error });
        }
        if (attempt >= this.retry.maxAttempts) {
          throw new SyncFailed(
            `GET ${endpoint} failed after ${attempt} attempts: ${error.message}`,
            { cause: error }
          );
        }
        const wait = error.retryAfterMs ?? computeBackoff(attempt, this.retry);
        console.warn(`[Shopify] ${error.message}; retrying ${endpoint} in ${wait}ms (attempt ${attempt + 1}/${this.retry.maxAttempts})`);
        await beforeRetryWait?.(wait);
        await this.sleep(wait, signal);
      }
    }
  }

  // ==========================================
  // Locations
  // ==========================================

  async getLocations(opts: PageOptions = {}): Promise<ShopifyLocation[]> {
    const page = await this.getPage("/locations.json", shopifyLocationsResponseSchema, opts);
    return page.data.locations;
  }

  // ==========================================
  // Webhooks
  // ==========================================

  async getWebhooks(): Promise<ShopifyWebhook[]> {
    const { data } = await this.send("GET", "/webhooks.json", shopifyWebhooksResponseSchema);
    return data.webhooks;
  }

  async registerWebhook(topic: string, address: string): Promise<ShopifyWebhook> {
    const { data } = await this.send("POST", "/webhooks.json", shopifyWebhookResponseSchema, {
      webhook: {
        topic,
        address,
        format: "json",
      },
    });
    return data.webhook;
  }
}

export type ShopCredential = Pick<Shop, "shopDomain" | "accessTokenEncrypted">;
export type ShopifyClientFactory = (shop: ShopCredential) => ShopifyClient;

export function createShopifyClientFactory(
  config: AppConfig,
  overrides: { fetch?: FetchLike; sleep?: SleepFn } = {}
): ShopifyClientFactory {
  return (shop) =>
    new ShopifyClient({
      shopDomain: shop.shopDomain,
      accessToken: decrypt(shop.accessTokenEncrypted, config.encryptionKey),
      apiVersion: config.shopify.apiVersion,
      timeoutMs: config.sync.requestTimeoutMs,
      retry: {
        maxAttempts: config.sync.maxAttempts,
        backoffBaseMs: config.sync.backoffBaseMs,
        backoffMaxMs: config.sync.backoffMaxMs,
      },
      fetch: overrides.fetch,
      sleep: overrides.sleep,
    });
}
