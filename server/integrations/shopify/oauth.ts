import crypto from "crypto";
import type { Shop } from "@shared/schema";
import type { AppConfig } from "../../config";
import type { IStorage } from "../../storage";
import { encrypt } from "./credentials";
import { InvalidState, InvalidTenant, TokenExchangeFailed } from "./errors";
import type { FetchLike, ShopifyClientFactory } from "./shopifyClient";
import { accessTokenResponseSchema } from "./types";

export const COMPLIANCE_TOPICS = [
  "customers/data_request",
  "customers/redact",
  "shop/redact",
] as const;

export interface OAuthDeps {
  storage: IStorage;
  config: Pick<AppConfig, "appUrl" | "shopify" | "encryptionKey" | "oauthStateTtlMs" | "sync">;
  clientFactory: ShopifyClientFactory;
  fetch?: FetchLike;
  now?: () => Date;
}

export interface OAuthInitiation {
  shopDomain: string;
  redirectUrl: string;
  nonce: string;
  expiresAt: Date;
}

export interface WebhookRegistrationResult {
  registered: string[];
  skipped: string[];
  errors: Array<{ topic: string; message: string }>;
}

export interface OAuthCompletion {
  shop: Shop;
  webhooks: WebhookRegistrationResult;
}

const shortNonce = (nonce: string) => `${nonce.slice(0, 8)}…`;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function normalizeShopDomain(input: unknown, suffix: string): string {
  if (typeof input !== "string") {
    throw new InvalidTenant("Shop domain is required");
  }
  const cleanDomain = input
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, "")
    .replace(/\/.*$/, "");

  const pattern = new RegExp(`^[a-z0-9][a-z0-9-]*${escapeRegExp(suffix)}$`);
  if (!pattern.test(cleanDomain)) {
    throw new InvalidTenant(`Invalid shop domain: ${input.slice(0, 100)}`);
  }
  return cleanDomain;
}

export function callbackUrl(appUrl: string): string {
  return `${appUrl}/auth/callback`;
}

export async function initiateOAuth(deps: OAuthDeps, shopInput: unknown): Promise<OAuthInitiation> {
  const { config, storage } = deps;
  const now = deps.now?.() ?? new Date();
  const shopDomain = normalizeShopDomain(shopInput, config.shopify.shopDomainSuffix);

  const nonce = crypto.randomBytes(32).toString("hex");
  const expiresAt = new Date(now.getTime() + config.oauthStateTtlMs);
  await storage.createOAuthAttempt({ nonce, shopDomain, createdAt: now, expiresAt });

  const authUrl = new URL(`https://${shopDomain}/admin/oauth/authorize`);
  authUrl.searchParams.set("client_id", config.shopify.apiKey);
  authUrl.searchParams.set("scope", config.shopify.scopes.join(","));
  authUrl.searchParams.set("redirect_uri", callbackUrl(config.appUrl));
  authUrl.searchParams.set("state", nonce);

  console.log(`[Shopify OAuth] Authorization started for ${shopDomain} (state ${shortNonce(nonce)})`);
  return { shopDomain, redirectUrl: authUrl.toString(), nonce, expiresAt };
}

/**
 * Checks the `hmac` parameter the platform adds to the OAuth redirect: a hex
 * HMAC-SHA256 over the remaining parameters, sorted and joined as `k=v&k=v`.
 */
export function verifyOAuthQuery(query: Record<string, unknown>, clientSecret: string): boolean {
  const provided = query.hmac;
  if (typeof provided !== "string" || !/^[0-9a-f]{64}$/i.test(provided)) {
    return false;
  }

  const message = Object.keys(query)
    .filter((key) => key !== "hmac" && key !== "signature")
    .sort()
    .flatMap((key) => {
      const value = query[key];
      return typeof value === "string" ? [`${key}=${value}`] : [];
    })
    .join("&");

  const expected = crypto.createHmac("sha256", clientSecret).update(message).digest();
  return crypto.timingSafeEqual(expected, Buffer.from(provided, "hex"));
}

export async function exchangeCodeForToken(
  deps: Pick<OAuthDeps, "config" | "fetch">,
  shopDomain: string,
  code: string
): Promise<{ accessToken: string; scope: string }> {
  const { config } = deps;
  const fetchImpl = deps.fetch ?? fetch;
  const tokenUrl = `https://${shopDomain}/admin/oauth/access_token`;

  console.log(`[Shopify OAuth] Exchanging code for token at ${tokenUrl}`);

  let response: Response;
  try {
    response = await fetchImpl(tokenUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Accept": "application/json",
      },
      body: JSON.stringify({
        client_id: config.shopify.apiKey,
        client_secret: config.shopify.apiSecret,
        code,
      }),
      signal: AbortSignal.timeout(config.sync.requestTimeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Shopify OAuth] Token exchange request failed for ${shopDomain}: ${message}`);
    throw new TokenExchangeFailed(`Token exchange request failed: ${message}`);
  }

  if (!response.ok) {
    console.error(`[Shopify OAuth] Token exchange failed for ${shopDomain}: ${response.status}`);
    throw new TokenExchangeFailed(`Token exchange failed with status ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new TokenExchangeFailed("Token exchange returned invalid JSON");
  }
  const parsed = accessTokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new TokenExchangeFailed("Token exchange response carried no access token");
  }

  console.log(`[Shopify OAuth] Token exchange successful, scope: ${parsed.data.scope}`);
  return { accessToken: parsed.data.access_token, scope: parsed.data.scope };
}

/**
 * Subscribes the compliance topics for a freshly installed shop. Topics already
 * subscribed at the same address are skipped; a failing topic is logged and the
 * rest are still attempted.
 */
export async function registerComplianceWebhooks(
  deps: Pick<OAuthDeps, "config" | "clientFactory">,
  shop: Shop
): Promise<WebhookRegistrationResult> {
  const result: WebhookRegistrationResult = { registered: [], skipped: [], errors: [] };
  const client = deps.clientFactory(shop);

  let existing: Array<{ topic: string; address: string }> = [];
  try {
    existing = await client.getWebhooks();
  } catch (error) {
    console.error(`[Shopify OAuth] Could not list webhooks for ${shop.shopDomain}:`, error);
  }

  for (const topic of COMPLIANCE_TOPICS) {
    const address = `${deps.config.appUrl}/webhooks/${topic}`;
    if (existing.some((w) => w.topic === topic && w.address === address)) {
      result.skipped.push(topic);
      continue;
    }
    try {
      await client.registerWebhook(topic, address);
      result.registered.push(topic);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Shopify OAuth] Failed to register ${topic} for ${shop.shopDomain}: ${message}`);
      result.errors.push({ topic, message });
    }
  }

  return result;
}

/**
 * Completes an authorization attempt. The attempt is consumed before any other
 * check, so a nonce is never accepted twice whatever the outcome.
 */
export async function handleOAuthCallback(
  deps: OAuthDeps,
  shopInput: unknown,
  nonce: unknown,
  code: unknown
): Promise<OAuthCompletion> {
  const { config, storage } = deps;
  const now = deps.now?.() ?? new Date();

  if (typeof nonce !== "string" || nonce.length === 0) {
    throw new InvalidState("Missing state parameter");
  }
  const attempt = await storage.consumeOAuthAttempt(nonce);
  if (!attempt) {
    console.warn(`[Shopify OAuth] Unknown or already used state ${shortNonce(nonce)}`);
    throw new InvalidState();
  }
  if (attempt.expiresAt.getTime() <= now.getTime()) {
    console.warn(`[Shopify OAuth] Expired state ${shortNonce(nonce)} for ${attempt.shopDomain}`);
    throw new InvalidState("OAuth state expired");
  }

  let shopDomain: string;
  try {
    shopDomain = normalizeShopDomain(shopInput, config.shopify.shopDomainSuffix);
  } catch {
    throw new InvalidState("Callback shop does not match the authorization attempt");
  }
  if (shopDomain !== attempt.shopDomain) {
    console.warn(`[Shopify OAuth] State ${shortNonce(nonce)} bound to ${attempt.shopDomain}, callback for ${shopDomain}`);
    throw new InvalidState("Callback shop does not match the authorization attempt");
  }

  if (typeof code !== "string" || code.length === 0) {
    throw new TokenExchangeFailed("Missing authorization code");
  }

  const token = await exchangeCodeForToken(deps, shopDomain, code);
  const shop = await storage.upsertShop(
    {
      shopDomain,
      accessTokenEncrypted: encrypt(token.accessToken, config.encryptionKey),
      scope: token.scope,
    },
    now
  );

  const webhooks = await registerComplianceWebhooks(deps, shop);
  console.log(
    `[Shopify OAuth] Installed ${shopDomain}; webhooks: ${webhooks.registered.length} registered, ` +
    `${webhooks.skipped.length} already present, ${webhooks.errors.length} errors`
  );

  return { shop, webhooks };
}

export async function pruneExpiredOAuthAttempts(storage: IStorage, now: Date): Promise<number> {
  return storage.deleteExpiredOAuthAttempts(now);
}
