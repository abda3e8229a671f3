import crypto from "crypto";
import { z, type ZodType, type ZodTypeDef } from "zod";
import type { IStorage } from "../../storage";
import type { AppConfig } from "../../config";
import { verifyWebhookSignature } from "./webhookVerifier";
import { InvalidPayload, SignatureError, UnknownTopic } from "./errors";
import { normalizeShopDomain } from "./oauth";
import { storeInventoryLevel, storeOrder, storeProduct } from "./syncStore";
import {
  handleCustomersDataRequest,
  handleCustomersRedact,
  handleShopRedact,
  type ComplianceDeps,
} from "./compliance";
import {
  customersDataRequestSchema,
  customersRedactSchema,
  shopRedactSchema,
  shopifyDeletedEntitySchema,
  shopifyInventoryDisconnectSchema,
  shopifyInventoryLevelSchema,
  shopifyOrderSchema,
  shopifyProductSchema,
} from "./types";

/** Arrival window for deliveries that carry no webhook id. */
export const RECEIPT_BUCKET_MS = 5 * 60 * 1000;

export interface WebhookDeps {
  storage: IStorage;
  config: { shopify: Pick<AppConfig["shopify"], "webhookSecret" | "shopDomainSuffix"> };
  compliance: ComplianceDeps;
  now?: () => Date;
}

export interface IncomingWebhook {
  topic: string;
  rawBody: Buffer | undefined;
  hmac: string | undefined;
  shopDomain?: string;
  webhookId?: string;
}

export interface WebhookResult {
  topic: string;
  shopDomain: string;
  duplicate: boolean;
  ignored: boolean;
  outcome: unknown;
}

interface TopicContext {
  deps: WebhookDeps;
  shopDomain: string;
  payload: unknown;
  now: Date;
}

interface TopicDefinition {
  /**
   * Shop without an installation: "ignore" acknowledges and drops the delivery,
   * "erase" still runs the handler (erasure is idempotent) but keeps no receipt.
   */
  uninstalled: "ignore" | "erase";
  handle: (ctx: TopicContext) => Promise<unknown>;
}

function parsePayload<T>(schema: ZodType<T, ZodTypeDef, unknown>, payload: unknown, topic: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidPayload(`Invalid ${topic} payload: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unreadable"}`);
  }
  return parsed.data;
}

const productUpsert: TopicDefinition = {
  uninstalled: "ignore",
  handle: ({ deps, shopDomain, payload, now }) =>
    storeProduct(deps.storage, shopDomain, parsePayload(shopifyProductSchema, payload, "product"), now),
};

const orderUpsert: TopicDefinition = {
  uninstalled: "ignore",
  handle: ({ deps, shopDomain, payload, now }) =>
    storeOrder(deps.storage, shopDomain, parsePayload(shopifyOrderSchema, payload, "order"), now),
};

/** Closed dispatch table; any other topic is UnknownTopic. */
export const WEBHOOK_TOPICS: ReadonlyMap<string, TopicDefinition> = new Map<string, TopicDefinition>([
  ["customers/data_request", {
    uninstalled: "ignore",
    handle: ({ deps, shopDomain, payload }) =>
      handleCustomersDataRequest(deps.compliance, shopDomain, parsePayload(customersDataRequestSchema, payload, "customers/data_request")),
  }],
  ["customers/redact", {
    uninstalled: "erase",
    handle: ({ deps, shopDomain, payload }) =>
      handleCustomersRedact(deps.compliance, shopDomain, parsePayload(customersRedactSchema, payload, "customers/redact")),
  }],
  ["shop/redact", {
    uninstalled: "erase",
    handle: ({ deps, shopDomain, payload }) => {
      parsePayload(shopRedactSchema, payload, "shop/redact");
      return handleShopRedact(deps.compliance, shopDomain);
    },
  }],
  ["products/create", productUpsert],
  ["products/update", productUpsert],
  ["products/delete", {
    uninstalled: "ignore",
    handle: async ({ deps, shopDomain, payload }) => {
      const { id } = parsePayload(shopifyDeletedEntitySchema, payload, "products/delete");
      return { deleted: await deps.storage.deleteProduct(shopDomain, id) };
    },
  }],
  ["orders/create", orderUpsert],
  ["orders/updated", orderUpsert],
  ["orders/paid", orderUpsert],
  ["orders/cancelled", orderUpsert],
  ["orders/delete", {
    uninstalled: "ignore",
    handle: async ({ deps, shopDomain, payload }) => {
      const { id } = parsePayload(shopifyDeletedEntitySchema, payload, "orders/delete");
      return deps.storage.deleteOrders(shopDomain, [id]);
    },
  }],
  ["inventory_levels/update", {
    uninstalled: "ignore",
    handle: ({ deps, shopDomain, payload, now }) =>
      storeInventoryLevel(deps.storage, shopDomain, parsePayload(shopifyInventoryLevelSchema, payload, "inventory level"), now),
  }],
  ["inventory_levels/disconnect", {
    uninstalled: "ignore",
    handle: async ({ deps, shopDomain, payload }) => {
      const level = parsePayload(shopifyInventoryDisconnectSchema, payload, "inventory_levels/disconnect");
      return { deleted: await deps.storage.deleteInventoryLevel(shopDomain, level.inventory_item_id, level.location_id) };
    },
  }],
]);

export function deliveryKey(topic: string, rawBody: Buffer, webhookId: string | undefined, now: Date): string {
  if (webhookId) return webhookId;
  const bucket = Math.floor(now.getTime() / RECEIPT_BUCKET_MS);
  return crypto
    .createHash("sha256")
    .update(`${topic}\n${bucket}\n`)
    .update(rawBody)
    .digest("hex");
}

const shopDomainFieldSchema = z.object({ shop_domain: z.string() }).passthrough();

/**
 * Verifies, de-duplicates and dispatches one webhook delivery. Nothing is
 * parsed or read from the database before the signature check passes.
 */
export async function handleShopifyWebhook(deps: WebhookDeps, webhook: IncomingWebhook): Promise<WebhookResult> {
  const { storage, config } = deps;

  const verification = verifyWebhookSignature(config.shopify.webhookSecret, webhook.rawBody, webhook.hmac);
  if (!verification.accepted) {
    console.warn(`[Shopify Webhook] Rejected ${webhook.topic}: ${verification.reason}`);
    throw new SignatureError(verification.reason);
  }
  const rawBody = webhook.rawBody ?? Buffer.alloc(0);

  const definition = WEBHOOK_TOPICS.get(webhook.topic);
  if (!definition) {
    console.warn(`[Shopify Webhook] Unknown topic: ${webhook.topic}`);
    throw new UnknownTopic(webhook.topic);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString("utf8"));
  } catch {
    throw new InvalidPayload("Invalid JSON payload");
  }

  const fromPayload = shopDomainFieldSchema.safeParse(payload);
  const shopInput = webhook.shopDomain || (fromPayload.success ? fromPayload.data.shop_domain : undefined);
  if (!shopInput) {
    throw new InvalidPayload("Missing shop domain");
  }
  let shopDomain: string;
  try {
    shopDomain = normalizeShopDomain(shopInput, config.shopify.shopDomainSuffix);
  } catch {
    throw new InvalidPayload(`Invalid shop domain: ${shopInput.slice(0, 100)}`);
  }

  const now = deps.now?.() ?? new Date();

  const shop = await storage.getShop(shopDomain);
  if (!shop) {
    if (definition.uninstalled === "ignore") {
      console.log(`[Shopify Webhook] No installation for ${shopDomain}, ignoring ${webhook.topic}`);
      return { topic: webhook.topic, shopDomain, duplicate: false, ignored: true, outcome: null };
    }
    const outcome = await definition.handle({ deps, shopDomain, payload, now });
    console.log(`[Shopify Webhook] Processed ${webhook.topic} for uninstalled ${shopDomain}`);
    return { topic: webhook.topic, shopDomain, duplicate: false, ignored: false, outcome };
  }

  const receipt = await storage.recordWebhookReceipt({
    shopDomain,
    deliveryKey: deliveryKey(webhook.topic, rawBody, webhook.webhookId, now),
    topic: webhook.topic,
    status: "received",
    createdAt: now,
  });
  if (receipt.status === "processed") {
    console.log(`[Shopify Webhook] Duplicate ${webhook.topic} for ${shopDomain} ignored`);
    return { topic: webhook.topic, shopDomain, duplicate: true, ignored: false, outcome: null };
  }

  try {
    const outcome = await definition.handle({ deps, shopDomain, payload, now });
    await storage.markWebhookReceipt(receipt.id, "processed", null, deps.now?.() ?? new Date());
    console.log(`[Shopify Webhook] Processed ${webhook.topic} for ${shopDomain}`);
    return { topic: webhook.topic, shopDomain, duplicate: false, ignored: false, outcome };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    console.error(`[Shopify Webhook] Error processing ${webhook.topic} for ${shopDomain}:`, error);
    await storage.markWebhookReceipt(receipt.id, "failed", errorMessage, deps.now?.() ?? new Date());
    throw error;
  }
}

export async function pruneWebhookReceipts(storage: IStorage, now: Date, retentionMs: number): Promise<number> {
  return storage.deleteWebhookReceiptsBefore(new Date(now.getTime() - retentionMs));
}
