import {
  shops, oauthAttempts, syncedProducts, productVariants, syncedOrders, orderLineItems, inventoryLevels,
  webhookReceipts, syncLeases, backgroundJobs, dataRequests, ACTIVE_JOB_STATUSES,
  type Shop, type InsertShop, type OAuthAttempt, type InsertOAuthAttempt,
  type SyncedProduct, type InsertSyncedProduct, type ProductVariant, type InsertProductVariant,
  type SyncedOrder, type InsertSyncedOrder,
  type OrderLineItem, type InsertOrderLineItem, type InventoryLevel, type InsertInventoryLevel,
  type WebhookReceipt, type InsertWebhookReceipt, type SyncLease, type ResourceKind,
  type BackgroundJob, type InsertBackgroundJob, type DataRequest, type InsertDataRequest,
} from "@shared/schema";
import type { Database } from "./db";
import { eq, and, or, lt, lte, inArray, notInArray, asc, sql, type SQL } from "drizzle-orm";

/** "stale" means the stored revision is newer; only last_synced_at was refreshed. */
export type UpsertOutcome = "written" | "stale";

/** Tables holding per-shop rows, in the order tenant erasure empties them. */
export const SHOP_SCOPED_TABLES = [
  "orderLineItems",
  "orders",
  "productVariants",
  "products",
  "inventoryLevels",
  "dataRequests",
  "backgroundJobs",
  "syncLeases",
  "oauthAttempts",
  "webhookReceipts",
] as const;
export type ShopScopedTable = typeof SHOP_SCOPED_TABLES[number];

export interface ShopEntityCounts {
  products: number;
  variants: number;
  orders: number;
  lineItems: number;
  inventoryLevels: number;
  webhookReceipts: number;
}

export interface CustomerLookup {
  customerRemoteId: string | null;
  customerEmail: string | null;
  orderRemoteIds: string[];
}

/**
 * Result of upserting a parent row together with its children. Children are
 * only reconciled when the parent was written; a stale parent leaves them as
 * they are.
 */
export interface ReconciledUpsert {
  outcome: UpsertOutcome;
  childrenUpserted: number;
  childrenRemoved: number;
}

export interface IStorage {
  // Shops (tenant credentials)
  getShop(shopDomain: string): Promise<Shop | undefined>;
  upsertShop(shop: InsertShop, now: Date): Promise<Shop>;
  deleteShop(shopDomain: string): Promise<number>;

  // OAuth attempts
  createOAuthAttempt(attempt: InsertOAuthAttempt): Promise<OAuthAttempt>;
  /** Deletes and returns the attempt; a second call for the same nonce returns undefined. */
  consumeOAuthAttempt(nonce: string): Promise<OAuthAttempt | undefined>;
  deleteExpiredOAuthAttempts(now: Date): Promise<number>;

  // Synchronized entities
  /**
   * Revision-checked product upsert and variant reconciliation, as one
   * transaction. `variants: null` leaves the stored variants untouched.
   */
  upsertProductWithVariants(
    product: InsertSyncedProduct,
    variants: InsertProductVariant[] | null,
    now: Date
  ): Promise<ReconciledUpsert>;
  /** Deletes the product and its variants. */
  deleteProduct(shopDomain: string, remoteId: string): Promise<number>;
  listProducts(shopDomain: string): Promise<SyncedProduct[]>;
  listVariants(shopDomain: string, productRemoteIds?: string[]): Promise<ProductVariant[]>;

  /** Revision-checked order upsert and line-item reconciliation, as one transaction. */
  upsertOrderWithLineItems(
    order: InsertSyncedOrder,
    items: InsertOrderLineItem[],
    now: Date
  ): Promise<ReconciledUpsert>;
  listOrders(shopDomain: string): Promise<SyncedOrder[]>;
  listLineItems(shopDomain: string, orderRemoteIds?: string[]): Promise<OrderLineItem[]>;
  findOrdersForCustomer(shopDomain: string, lookup: CustomerLookup): Promise<SyncedOrder[]>;
  /** Deletes the orders and their line items (line items first). */
  deleteOrders(shopDomain: string, remoteIds: string[]): Promise<{ orders: number; lineItems: number }>;

  upsertInventoryLevel(level: InsertInventoryLevel, now: Date): Promise<UpsertOutcome>;
  deleteInventoryLevel(shopDomain: string, inventoryItemId: string, locationId: string): Promise<number>;
  listInventoryLevels(shopDomain: string): Promise<InventoryLevel[]>;

  countShopEntities(shopDomain: string): Promise<ShopEntityCounts>;
  deleteAllForShop(table: ShopScopedTable, shopDomain: string): Promise<number>;

  // Webhook receipts
  getWebhookReceipt(shopDomain: string, deliveryKey: string): Promise<WebhookReceipt | undefined>;
  /** Inserts the receipt, or bumps `attempts` on a redelivery. */
  recordWebhookReceipt(receipt: InsertWebhookReceipt): Promise<WebhookReceipt>;
  markWebhookReceipt(
    id: string,
    status: "processed" | "failed",
    errorMessage: string | null,
    now: Date
  ): Promise<void>;
  deleteWebhookReceiptsBefore(cutoff: Date): Promise<number>;

  // Sync leases
  acquireSyncLease(
    shopDomain: string,
    resourceKind: ResourceKind,
    holder: string,
    expiresAt: Date,
    now: Date
  ): Promise<boolean>;
  renewSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string, expiresAt: Date): Promise<boolean>;
  releaseSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string): Promise<void>;
  getSyncLease(shopDomain: string, resourceKind: ResourceKind): Promise<SyncLease | undefined>;
  listSyncLeases(shopDomain: string): Promise<SyncLease[]>;

  // Background jobs
  enqueueJob(job: InsertBackgroundJob): Promise<{ job: BackgroundJob; created: boolean }>;
  getJob(id: string): Promise<BackgroundJob | undefined>;
  findActiveJob(dedupeKey: string): Promise<BackgroundJob | undefined>;
  /** Claims the oldest due job, or a RUNNING one whose lease has lapsed. */
  claimNextJob(now: Date, leaseExpiresAt: Date): Promise<BackgroundJob | undefined>;
  completeJob(id: string, result: unknown, now: Date): Promise<void>;
  retryJob(id: string, runAt: Date, errorMessage: string, now: Date): Promise<void>;
  failJob(id: string, errorMessage: string, now: Date): Promise<void>;
  deletePendingJobs(dedupeKeys: string[]): Promise<number>;

  // Data requests
  createDataRequest(request: InsertDataRequest): Promise<{ request: DataRequest; created: boolean }>;
  getDataRequest(id: string): Promise<DataRequest | undefined>;
  completeDataRequest(id: string, snapshot: unknown, now: Date): Promise<void>;
  findDataRequestsForCustomer(
    shopDomain: string,
    customerRemoteId: string | null,
    customerEmail: string | null
  ): Promise<DataRequest[]>;
  deleteDataRequests(ids: string[]): Promise<number>;
}

// Raw timestamps in hand-written SQL follow the same UTC mapping drizzle uses
function ts(date: Date): SQL {
  return sql`${date.toISOString()}::timestamp`;
}

function excluded(column: string): SQL {
  return sql.raw(`excluded.${column}`);
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // Shops
  async getShop(shopDomain: string): Promise<Shop | undefined> {
    const [shop] = await this.db.select().from(shops).where(eq(shops.shopDomain, shopDomain));
    return shop || undefined;
  }

  async upsertShop(shop: InsertShop, now: Date): Promise<Shop> {
    const [saved] = await this.db.insert(shops)
      .values({ ...shop, installedAt: now, tokenRefreshedAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: shops.shopDomain,
        set: {
          accessTokenEncrypted: shop.accessTokenEncrypted,
          scope: shop.scope,
          tokenRefreshedAt: now,
          updatedAt: now,
        },
      })
      .returning();
    return saved;
  }

  async deleteShop(shopDomain: string): Promise<number> {
    const deleted = await this.db.delete(shops).where(eq(shops.shopDomain, shopDomain)).returning({ id: shops.id });
    return deleted.length;
  }

  // OAuth attempts
  async createOAuthAttempt(attempt: InsertOAuthAttempt): Promise<OAuthAttempt> {
    const [created] = await this.db.insert(oauthAttempts).values(attempt).returning();
    return created;
  }

  async consumeOAuthAttempt(nonce: string): Promise<OAuthAttempt | undefined> {
    const [consumed] = await this.db.delete(oauthAttempts).where(eq(oauthAttempts.nonce, nonce)).returning();
    return consumed || undefined;
  }

  async deleteExpiredOAuthAttempts(now: Date): Promise<number> {
    const deleted = await this.db.delete(oauthAttempts)
      .where(lte(oauthAttempts.expiresAt, now))
      .returning({ nonce: oauthAttempts.nonce });
    return deleted.length;
  }

  // Products
  async upsertProductWithVariants(
    product: InsertSyncedProduct,
    variants: InsertProductVariant[] | null,
    now: Date
  ): Promise<ReconciledUpsert> {
    return this.db.transaction(async (tx): Promise<ReconciledUpsert> => {
      await tx.select({ id: syncedProducts.id }).from(syncedProducts)
        .where(and(eq(syncedProducts.shopDomain, product.shopDomain), eq(syncedProducts.remoteId, product.remoteId)))
        .for("update");

      const written = await tx.insert(syncedProducts)
        .values({ ...product, lastSyncedAt: now })
        .onConflictDoUpdate({
          target: [syncedProducts.shopDomain, syncedProducts.remoteId],
          set: {
            title: product.title,
            handle: product.handle,
            status: product.status,
            payloadJson: product.payloadJson,
            remoteUpdatedAt: product.remoteUpdatedAt,
            lastSyncedAt: now,
          },
          setWhere: sql`${syncedProducts.remoteUpdatedAt} is null or ${excluded("remote_updated_at")} is null or ${excluded("remote_updated_at")} >= ${syncedProducts.remoteUpdatedAt}`,
        })
        .returning({ id: syncedProducts.id });
      if (written.length === 0) {
        await tx.update(syncedProducts)
          .set({ lastSyncedAt: now })
          .where(and(eq(syncedProducts.shopDomain, product.shopDomain), eq(syncedProducts.remoteId, product.remoteId)));
        return { outcome: "stale", childrenUpserted: 0, childrenRemoved: 0 };
      }
      if (variants === null) return { outcome: "written", childrenUpserted: 0, childrenRemoved: 0 };

      for (const variant of variants) {
        await tx.insert(productVariants)
          .values(variant)
          .onConflictDoUpdate({
            target: [productVariants.shopDomain, productVariants.productRemoteId, productVariants.variantRemoteId],
            set: {
              title: variant.title,
              sku: variant.sku,
              barcode: variant.barcode,
              price: variant.price,
              inventoryItemId: variant.inventoryItemId,
              inventoryQuantity: variant.inventoryQuantity,
              payloadJson: variant.payloadJson,
              lastSyncedAt: variant.lastSyncedAt,
            },
          });
      }

      const keep = variants.map((variant) => variant.variantRemoteId);
      const removed = await tx.delete(productVariants)
        .where(and(
          eq(productVariants.shopDomain, product.shopDomain),
          eq(productVariants.productRemoteId, product.remoteId),
          keep.length > 0 ? notInArray(productVariants.variantRemoteId, keep) : undefined
        ))
        .returning({ id: productVariants.id });

      return { outcome: "written", childrenUpserted: variants.length, childrenRemoved: removed.length };
    });
  }

  async deleteProduct(shopDomain: string, remoteId: string): Promise<number> {
    return this.db.transaction(async (tx) => {
      await tx.delete(productVariants)
        .where(and(eq(productVariants.shopDomain, shopDomain), eq(productVariants.productRemoteId, remoteId)));
      const deleted = await tx.delete(syncedProducts)
        .where(and(eq(syncedProducts.shopDomain, shopDomain), eq(syncedProducts.remoteId, remoteId)))
        .returning({ id: syncedProducts.id });
      return deleted.length;
    });
  }

  async listProducts(shopDomain: string): Promise<SyncedProduct[]> {
    return this.db.select().from(syncedProducts)
      .where(eq(syncedProducts.shopDomain, shopDomain))
      .orderBy(asc(syncedProducts.remoteId));
  }

  async listVariants(shopDomain: string, productRemoteIds?: string[]): Promise<ProductVariant[]> {
    if (productRemoteIds && productRemoteIds.length === 0) return [];
    return this.db.select().from(productVariants)
      .where(and(
        eq(productVariants.shopDomain, shopDomain),
        productRemoteIds ? inArray(productVariants.productRemoteId, productRemoteIds) : undefined
      ))
      .orderBy(asc(productVariants.productRemoteId), asc(productVariants.variantRemoteId));
  }

  // Orders
  async upsertOrderWithLineItems(
    order: InsertSyncedOrder,
    items: InsertOrderLineItem[],
    now: Date
  ): Promise<ReconciledUpsert> {
    return this.db.transaction(async (tx): Promise<ReconciledUpsert> => {
      // Serializes writers of the same order so an older payload cannot
      // reconcile line items after a newer one committed
      await tx.select({ id: syncedOrders.id }).from(syncedOrders)
        .where(and(eq(syncedOrders.shopDomain, order.shopDomain), eq(syncedOrders.remoteId, order.remoteId)))
        .for("update");

      const written = await tx.insert(syncedOrders)
        .values({ ...order, lastSyncedAt: now })
        .onConflictDoUpdate({
          target: [syncedOrders.shopDomain, syncedOrders.remoteId],
          set: {
            orderNumber: order.orderNumber,
            customerRemoteId: order.customerRemoteId,
            customerEmail: order.customerEmail,
            financialStatus: order.financialStatus,
            totalPrice: order.totalPrice,
            currency: order.currency,
            payloadJson: order.payloadJson,
            remoteUpdatedAt: order.remoteUpdatedAt,
            lastSyncedAt: now,
          },
          setWhere: sql`${syncedOrders.remoteUpdatedAt} is null or ${excluded("remote_updated_at")} is null or ${excluded("remote_updated_at")} >= ${syncedOrders.remoteUpdatedAt}`,
        })
        .returning({ id: syncedOrders.id });
      if (written.length === 0) {
        await tx.update(syncedOrders)
          .set({ lastSyncedAt: now })
          .where(and(eq(syncedOrders.shopDomain, order.shopDomain), eq(syncedOrders.remoteId, order.remoteId)));
        return { outcome: "stale", childrenUpserted: 0, childrenRemoved: 0 };
      }

      for (const item of items) {
        await tx.insert(orderLineItems)
          .values(item)
          .onConflictDoUpdate({
            target: [orderLineItems.shopDomain, orderLineItems.orderRemoteId, orderLineItems.lineItemRemoteId],
            set: {
              productRemoteId: item.productRemoteId,
              variantRemoteId: item.variantRemoteId,
              title: item.title,
              sku: item.sku,
              quantity: item.quantity,
              price: item.price,
              payloadJson: item.payloadJson,
              lastSyncedAt: item.lastSyncedAt,
            },
          });
      }

      const keep = items.map((item) => item.lineItemRemoteId);
      const removed = await tx.delete(orderLineItems)
        .where(and(
          eq(orderLineItems.shopDomain, order.shopDomain),
          eq(orderLineItems.orderRemoteId, order.remoteId),
          keep.length > 0 ? notInArray(orderLineItems.lineItemRemoteId, keep) : undefined
        ))
        .returning({ id: orderLineItems.id });

      return { outcome: "written", childrenUpserted: items.length, childrenRemoved: removed.length };
    });
  }

  async listOrders(shopDomain: string): Promise<SyncedOrder[]> {
    return this.db.select().from(syncedOrders)
      .where(eq(syncedOrders.shopDomain, shopDomain))
      .orderBy(asc(syncedOrders.remoteId));
  }

  async listLineItems(shopDomain: string, orderRemoteIds?: string[]): Promise<OrderLineItem[]> {
    if (orderRemoteIds && orderRemoteIds.length === 0) return [];
    return this.db.select().from(orderLineItems)
      .where(and(
        eq(orderLineItems.shopDomain, shopDomain),
        orderRemoteIds ? inArray(orderLineItems.orderRemoteId, orderRemoteIds) : undefined
      ))
      .orderBy(asc(orderLineItems.orderRemoteId), asc(orderLineItems.lineItemRemoteId));
  }

  async findOrdersForCustomer(shopDomain: string, lookup: CustomerLookup): Promise<SyncedOrder[]> {
    const matches: SQL[] = [];
    if (lookup.customerRemoteId) matches.push(eq(syncedOrders.customerRemoteId, lookup.customerRemoteId));
    if (lookup.customerEmail) matches.push(sql`lower(${syncedOrders.customerEmail}) = ${lookup.customerEmail.toLowerCase()}`);
    if (lookup.orderRemoteIds.length > 0) matches.push(inArray(syncedOrders.remoteId, lookup.orderRemoteIds));
    if (matches.length === 0) return [];

    return this.db.select().from(syncedOrders)
      .where(and(eq(syncedOrders.shopDomain, shopDomain), or(...matches)))
      .orderBy(asc(syncedOrders.remoteId));
  }

  async deleteOrders(shopDomain: string, remoteIds: string[]): Promise<{ orders: number; lineItems: number }> {
    if (remoteIds.length === 0) return { orders: 0, lineItems: 0 };
    return this.db.transaction(async (tx) => {
      const lineItems = await tx.delete(orderLineItems)
        .where(and(eq(orderLineItems.shopDomain, shopDomain), inArray(orderLineItems.orderRemoteId, remoteIds)))
        .returning({ id: orderLineItems.id });
      const orders = await tx.delete(syncedOrders)
        .where(and(eq(syncedOrders.shopDomain, shopDomain), inArray(syncedOrders.remoteId, remoteIds)))
        .returning({ id: syncedOrders.id });
      return { orders: orders.length, lineItems: lineItems.length };
    });
  }

  // Inventory
  async upsertInventoryLevel(level: InsertInventoryLevel, now: Date): Promise<UpsertOutcome> {
    const written = await this.db.insert(inventoryLevels)
      .values({ ...level, lastSyncedAt: now })
      .onConflictDoUpdate({
        target: [inventoryLevels.shopDomain, inventoryLevels.inventoryItemId, inventoryLevels.locationId],
        set: {
          available: level.available,
          payloadJson: level.payloadJson,
          remoteUpdatedAt: level.remoteUpdatedAt,
          lastSyncedAt: now,
        },
        setWhere: sql`${inventoryLevels.remoteUpdatedAt} is null or ${excluded("remote_updated_at")} is null or ${excluded("remote_updated_at")} >= ${inventoryLevels.remoteUpdatedAt}`,
      })
      .returning({ id: inventoryLevels.id });
    if (written.length > 0) return "written";

    await this.db.update(inventoryLevels)
      .set({ lastSyncedAt: now })
      .where(and(
        eq(inventoryLevels.shopDomain, level.shopDomain),
        eq(inventoryLevels.inventoryItemId, level.inventoryItemId),
        eq(inventoryLevels.locationId, level.locationId)
      ));
    return "stale";
  }

  async deleteInventoryLevel(shopDomain: string, inventoryItemId: string, locationId: string): Promise<number> {
    const deleted = await this.db.delete(inventoryLevels)
      .where(and(
        eq(inventoryLevels.shopDomain, shopDomain),
        eq(inventoryLevels.inventoryItemId, inventoryItemId),
        eq(inventoryLevels.locationId, locationId)
      ))
      .returning({ id: inventoryLevels.id });
    return deleted.length;
  }

  async listInventoryLevels(shopDomain: string): Promise<InventoryLevel[]> {
    return this.db.select().from(inventoryLevels)
      .where(eq(inventoryLevels.shopDomain, shopDomain))
      .orderBy(asc(inventoryLevels.inventoryItemId), asc(inventoryLevels.locationId));
  }

  async countShopEntities(shopDomain: string): Promise<ShopEntityCounts> {
    const count = sql<number>`count(*)::int`;
    const [[p], [v], [o], [li], [inv], [rcpt]] = await Promise.all([
      this.db.select({ count }).from(syncedProducts).where(eq(syncedProducts.shopDomain, shopDomain)),
      this.db.select({ count }).from(productVariants).where(eq(productVariants.shopDomain, shopDomain)),
      this.db.select({ count }).from(syncedOrders).where(eq(syncedOrders.shopDomain, shopDomain)),
      this.db.select({ count }).from(orderLineItems).where(eq(orderLineItems.shopDomain, shopDomain)),
      this.db.select({ count }).from(inventoryLevels).where(eq(inventoryLevels.shopDomain, shopDomain)),
      this.db.select({ count }).from(webhookReceipts).where(eq(webhookReceipts.shopDomain, shopDomain)),
    ]);
    return {
      products: p?.count ?? 0,
      variants: v?.count ?? 0,
      orders: o?.count ?? 0,
      lineItems: li?.count ?? 0,
      inventoryLevels: inv?.count ?? 0,
      webhookReceipts: rcpt?.count ?? 0,
    };
  }

  async deleteAllForShop(table: ShopScopedTable, shopDomain: string): Promise<number> {
    switch (table) {
      case "orderLineItems":
        return (await this.db.delete(orderLineItems).where(eq(orderLineItems.shopDomain, shopDomain)).returning({ id: orderLineItems.id })).length;
      case "orders":
        return (await this.db.delete(syncedOrders).where(eq(syncedOrders.shopDomain, shopDomain)).returning({ id: syncedOrders.id })).length;
      case "productVariants":
        return (await this.db.delete(productVariants).where(eq(productVariants.shopDomain, shopDomain)).returning({ id: productVariants.id })).length;
      case "products":
        return (await this.db.delete(syncedProducts).where(eq(syncedProducts.shopDomain, shopDomain)).returning({ id: syncedProducts.id })).length;
      case "inventoryLevels":
        return (await this.db.delete(inventoryLevels).where(eq(inventoryLevels.shopDomain, shopDomain)).returning({ id: inventoryLevels.id })).length;
      case "dataRequests":
        return (await this.db.delete(dataRequests).where(eq(dataRequests.shopDomain, shopDomain)).returning({ id: dataRequests.id })).length;
      case "backgroundJobs":
        return (await this.db.delete(backgroundJobs).where(eq(backgroundJobs.shopDomain, shopDomain)).returning({ id: backgroundJobs.id })).length;
      case "syncLeases":
        return (await this.db.delete(syncLeases).where(eq(syncLeases.shopDomain, shopDomain)).returning({ holder: syncLeases.holder })).length;
      case "oauthAttempts":
        return (await this.db.delete(oauthAttempts).where(eq(oauthAttempts.shopDomain, shopDomain)).returning({ nonce: oauthAttempts.nonce })).length;
      case "webhookReceipts":
        return (await this.db.delete(webhookReceipts).where(eq(webhookReceipts.shopDomain, shopDomain)).returning({ id: webhookReceipts.id })).length;
    }
  }

  // Webhook receipts
  async getWebhookReceipt(shopDomain: string, deliveryKey: string): Promise<WebhookReceipt | undefined> {
    const [receipt] = await this.db.select().from(webhookReceipts)
      .where(and(eq(webhookReceipts.shopDomain, shopDomain), eq(webhookReceipts.deliveryKey, deliveryKey)));
    return receipt || undefined;
  }

  async recordWebhookReceipt(receipt: InsertWebhookReceipt): Promise<WebhookReceipt> {
    const [saved] = await this.db.insert(webhookReceipts)
      .values(receipt)
      .onConflictDoUpdate({
        target: [webhookReceipts.shopDomain, webhookReceipts.deliveryKey],
        set: { attempts: sql`${webhookReceipts.attempts} + 1` },
      })
      .returning();
    return saved;
  }

  async markWebhookReceipt(
    id: string,
    status: "processed" | "failed",
    errorMessage: string | null,
    now: Date
  ): Promise<void> {
    await this.db.update(webhookReceipts)
      .set({ status, errorMessage, processedAt: status === "processed" ? now : null })
      .where(eq(webhookReceipts.id, id));
  }

  async deleteWebhookReceiptsBefore(cutoff: Date): Promise<number> {
    const deleted = await this.db.delete(webhookReceipts)
      .where(lt(webhookReceipts.createdAt, cutoff))
      .returning({ id: webhookReceipts.id });
    return deleted.length;
  }

  // Sync leases
  async acquireSyncLease(
    shopDomain: string,
    resourceKind: ResourceKind,
    holder: string,
    expiresAt: Date,
    now: Date
  ): Promise<boolean> {
    const acquired = await this.db.insert(syncLeases)
      .values({ shopDomain, resourceKind, holder, expiresAt, acquiredAt: now })
      .onConflictDoUpdate({
        target: [syncLeases.shopDomain, syncLeases.resourceKind],
        set: { holder, expiresAt, acquiredAt: now },
        setWhere: sql`${syncLeases.expiresAt} <= ${ts(now)}`,
      })
      .returning({ holder: syncLeases.holder });
    return acquired.length > 0;
  }

  async renewSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string, expiresAt: Date): Promise<boolean> {
    const renewed = await this.db.update(syncLeases)
      .set({ expiresAt })
      .where(and(
        eq(syncLeases.shopDomain, shopDomain),
        eq(syncLeases.resourceKind, resourceKind),
        eq(syncLeases.holder, holder)
      ))
      .returning({ holder: syncLeases.holder });
    return renewed.length > 0;
  }

  async releaseSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string): Promise<void> {
    await this.db.delete(syncLeases)
      .where(and(
        eq(syncLeases.shopDomain, shopDomain),
        eq(syncLeases.resourceKind, resourceKind),
        eq(syncLeases.holder, holder)
      ));
  }

  async getSyncLease(shopDomain: string, resourceKind: ResourceKind): Promise<SyncLease | undefined> {
    const [lease] = await this.db.select().from(syncLeases)
      .where(and(eq(syncLeases.shopDomain, shopDomain), eq(syncLeases.resourceKind, resourceKind)));
    return lease || undefined;
  }

  async listSyncLeases(shopDomain: string): Promise<SyncLease[]> {
    return this.db.select().from(syncLeases).where(eq(syncLeases.shopDomain, shopDomain));
  }

  // Background jobs
  async enqueueJob(job: InsertBackgroundJob): Promise<{ job: BackgroundJob; created: boolean }> {
    const [created] = await this.db.insert(backgroundJobs).values(job).onConflictDoNothing().returning();
    if (created) return { job: created, created: true };

    const existing = await this.findActiveJob(job.dedupeKey);
    if (!existing) {
      throw new Error(`Job ${job.dedupeKey} conflicted but no active job was found`);
    }
    return { job: existing, created: false };
  }

  async getJob(id: string): Promise<BackgroundJob | undefined> {
    const [job] = await this.db.select().from(backgroundJobs).where(eq(backgroundJobs.id, id));
    return job || undefined;
  }

  async findActiveJob(dedupeKey: string): Promise<BackgroundJob | undefined> {
    const [job] = await this.db.select().from(backgroundJobs)
      .where(and(
        eq(backgroundJobs.dedupeKey, dedupeKey),
        inArray(backgroundJobs.status, [...ACTIVE_JOB_STATUSES])
      ));
    return job || undefined;
  }

  async claimNextJob(now: Date, leaseExpiresAt: Date): Promise<BackgroundJob | undefined> {
    const nextDue = sql`(
      select id from background_jobs
      where (status in ('PENDING', 'RETRY') and run_at <= ${ts(now)})
         or (status = 'RUNNING' and lease_expires_at <= ${ts(now)})
      order by run_at
      limit 1
      for update skip locked
    )`;
    const [claimed] = await this.db.update(backgroundJobs)
      .set({
        status: "RUNNING",
        attempts: sql`${backgroundJobs.attempts} + 1`,
        leaseExpiresAt,
        updatedAt: now,
      })
      .where(eq(backgroundJobs.id, nextDue))
      .returning();
    return claimed || undefined;
  }

  async completeJob(id: string, result: unknown, now: Date): Promise<void> {
    await this.db.update(backgroundJobs)
      .set({ status: "COMPLETED", resultJson: result, leaseExpiresAt: null, updatedAt: now })
      .where(eq(backgroundJobs.id, id));
  }

  async retryJob(id: string, runAt: Date, errorMessage: string, now: Date): Promise<void> {
    await this.db.update(backgroundJobs)
      .set({ status: "RETRY", runAt, lastErrorMessage: errorMessage, leaseExpiresAt: null, updatedAt: now })
      .where(eq(backgroundJobs.id, id));
  }

  async failJob(id: string, errorMessage: string, now: Date): Promise<void> {
    await this.db.update(backgroundJobs)
      .set({ status: "FAILED", lastErrorMessage: errorMessage, leaseExpiresAt: null, updatedAt: now })
      .where(eq(backgroundJobs.id, id));
  }

  async deletePendingJobs(dedupeKeys: string[]): Promise<number> {
    if (dedupeKeys.length === 0) return 0;
    const deleted = await this.db.delete(backgroundJobs)
      .where(and(
        inArray(backgroundJobs.dedupeKey, dedupeKeys),
        inArray(backgroundJobs.status, ["PENDING", "RETRY"])
      ))
      .returning({ id: backgroundJobs.id });
    return deleted.length;
  }

  // Data requests
  async createDataRequest(request: InsertDataRequest): Promise<{ request: DataRequest; created: boolean }> {
    const [created] = await this.db.insert(dataRequests).values(request).onConflictDoNothing().returning();
    if (created) return { request: created, created: true };

    const [existing] = await this.db.select().from(dataRequests)
      .where(and(
        eq(dataRequests.shopDomain, request.shopDomain),
        eq(dataRequests.remoteRequestId, request.remoteRequestId)
      ));
    if (!existing) {
      throw new Error(`Data request ${request.remoteRequestId} conflicted but was not found`);
    }
    return { request: existing, created: false };
  }

  async getDataRequest(id: string): Promise<DataRequest | undefined> {
    const [request] = await this.db.select().from(dataRequests).where(eq(dataRequests.id, id));
    return request || undefined;
  }

  async completeDataRequest(id: string, snapshot: unknown, now: Date): Promise<void> {
    await this.db.update(dataRequests)
      .set({ status: "exported", snapshotJson: snapshot, completedAt: now })
      .where(eq(dataRequests.id, id));
  }

  async findDataRequestsForCustomer(
    shopDomain: string,
    customerRemoteId: string | null,
    customerEmail: string | null
  ): Promise<DataRequest[]> {
    const matches: SQL[] = [];
    if (customerRemoteId) matches.push(eq(dataRequests.customerRemoteId, customerRemoteId));
    if (customerEmail) matches.push(sql`lower(${dataRequests.customerEmail}) = ${customerEmail.toLowerCase()}`);
    if (matches.length === 0) return [];
    return this.db.select().from(dataRequests)
      .where(and(eq(dataRequests.shopDomain, shopDomain), or(...matches)));
  }

  async deleteDataRequests(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const deleted = await this.db.delete(dataRequests)
      .where(inArray(dataRequests.id, ids))
      .returning({ id: dataRequests.id });
    return deleted.length;
  }
}
