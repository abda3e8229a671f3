import type {
  InsertSyncedProduct, InsertProductVariant, InsertSyncedOrder, InsertOrderLineItem, InsertInventoryLevel,
} from "@shared/schema";
import type { IStorage, UpsertOutcome } from "../../storage";
import type { ShopifyProduct, ShopifyOrder, ShopifyInventoryLevel } from "./types";

// Mapping from Shopify payloads to local rows, shared by the sync engine and
// the catalog/order webhooks.

function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

export function toProductRow(shopDomain: string, product: ShopifyProduct): InsertSyncedProduct {
  return {
    shopDomain,
    remoteId: product.id,
    title: product.title ?? null,
    handle: product.handle ?? null,
    status: product.status ?? null,
    payloadJson: product,
    remoteUpdatedAt: parseTimestamp(product.updated_at),
  };
}

/** Variant rows for a product, or null when the payload carries no variant list. */
export function toVariantRows(shopDomain: string, product: ShopifyProduct, now: Date): InsertProductVariant[] | null {
  if (!product.variants) return null;
  return product.variants.map((variant) => ({
    shopDomain,
    productRemoteId: product.id,
    variantRemoteId: variant.id,
    title: variant.title ?? null,
    sku: variant.sku ?? null,
    barcode: variant.barcode ?? null,
    price: variant.price,
    inventoryItemId: variant.inventory_item_id,
    inventoryQuantity: variant.inventory_quantity ?? null,
    payloadJson: variant,
    lastSyncedAt: now,
  }));
}

export function toOrderRow(shopDomain: string, order: ShopifyOrder): InsertSyncedOrder {
  const orderNumber = order.name ?? (order.order_number != null ? String(order.order_number) : null);
  return {
    shopDomain,
    remoteId: order.id,
    orderNumber,
    customerRemoteId: order.customer?.id ?? null,
    customerEmail: order.email || order.customer?.email || null,
    financialStatus: order.financial_status ?? null,
    totalPrice: order.total_price,
    currency: order.currency ?? null,
    payloadJson: order,
    remoteUpdatedAt: parseTimestamp(order.updated_at),
  };
}

export function toLineItemRows(shopDomain: string, order: ShopifyOrder, now: Date): InsertOrderLineItem[] {
  return order.line_items.map((item) => ({
    shopDomain,
    orderRemoteId: order.id,
    lineItemRemoteId: item.id,
    productRemoteId: item.product_id,
    variantRemoteId: item.variant_id,
    title: item.title ?? null,
    sku: item.sku ?? null,
    quantity: item.quantity,
    price: item.price,
    payloadJson: item,
    lastSyncedAt: now,
  }));
}

export function toInventoryRow(shopDomain: string, level: ShopifyInventoryLevel): InsertInventoryLevel {
  return {
    shopDomain,
    inventoryItemId: level.inventory_item_id,
    locationId: level.location_id,
    available: level.available ?? null,
    payloadJson: level,
    remoteUpdatedAt: parseTimestamp(level.updated_at),
  };
}

export interface StoredProduct {
  outcome: UpsertOutcome;
  variantsRemoved: number;
}

/**
 * Upserts a product and reconciles its variants in one storage call, so a
 * concurrent older payload cannot restore variants a newer one removed.
 */
export async function storeProduct(
  storage: IStorage,
  shopDomain: string,
  product: ShopifyProduct,
  now: Date
): Promise<StoredProduct> {
  const { outcome, childrenRemoved } = await storage.upsertProductWithVariants(
    toProductRow(shopDomain, product),
    toVariantRows(shopDomain, product, now),
    now
  );
  return { outcome, variantsRemoved: childrenRemoved };
}

export interface StoredOrder {
  outcome: UpsertOutcome;
  lineItemsRemoved: number;
}

/**
 * Upserts an order and reconciles its line items against the payload: items
 * missing from the payload are deleted. A stale payload leaves the stored line
 * items alone.
 */
export async function storeOrder(
  storage: IStorage,
  shopDomain: string,
  order: ShopifyOrder,
  now: Date
): Promise<StoredOrder> {
  const { outcome, childrenRemoved } = await storage.upsertOrderWithLineItems(
    toOrderRow(shopDomain, order),
    toLineItemRows(shopDomain, order, now),
    now
  );
  return { outcome, lineItemsRemoved: childrenRemoved };
}

export async function storeInventoryLevel(
  storage: IStorage,
  shopDomain: string,
  level: ShopifyInventoryLevel,
  now: Date
): Promise<UpsertOutcome> {
  return storage.upsertInventoryLevel(toInventoryRow(shopDomain, level), now);
}
