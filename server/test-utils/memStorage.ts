import crypto from "crypto";
import {
  ACTIVE_JOB_STATUSES,
  type Shop, type InsertShop, type OAuthAttempt, type InsertOAuthAttempt,
  type SyncedProduct, type InsertSyncedProduct, type ProductVariant, type InsertProductVariant,
  type SyncedOrder, type InsertSyncedOrder,
  type OrderLineItem, type InsertOrderLineItem, type InventoryLevel, type InsertInventoryLevel,
  type WebhookReceipt, type InsertWebhookReceipt, type SyncLease, type ResourceKind,
  type BackgroundJob, type InsertBackgroundJob, type DataRequest, type InsertDataRequest,
  type JobStatus,
} from "@shared/schema";
import type {
  IStorage, UpsertOutcome, ShopScopedTable, ShopEntityCounts, CustomerLookup, ReconciledUpsert,
} from "../storage";

// In-process IStorage used by tests. Every method checks and mutates state
// before its first await, so concurrent calls see each other's writes.

const isActive = (status: JobStatus) => ACTIVE_JOB_STATUSES.some((s) => s === status);

function removeWhere<T>(rows: T[], predicate: (row: T) => boolean): number {
  const kept = rows.filter((row) => !predicate(row));
  const removed = rows.length - kept.length;
  rows.splice(0, rows.length, ...kept);
  return removed;
}

function isStale(stored: Date | null, incoming: Date | null | undefined): boolean {
  return stored !== null && incoming != null && incoming.getTime() < stored.getTime();
}

export class MemStorage implements IStorage {
  shops: Shop[] = [];
  oauthAttempts: OAuthAttempt[] = [];
  products: SyncedProduct[] = [];
  variants: ProductVariant[] = [];
  orders: SyncedOrder[] = [];
  lineItems: OrderLineItem[] = [];
  inventoryLevels: InventoryLevel[] = [];
  webhookReceipts: WebhookReceipt[] = [];
  syncLeases: SyncLease[] = [];
  jobs: BackgroundJob[] = [];
  dataRequests: DataRequest[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  // Shops
  async getShop(shopDomain: string): Promise<Shop | undefined> {
    return this.shops.find((s) => s.shopDomain === shopDomain);
  }

  async upsertShop(shop: InsertShop, now: Date): Promise<Shop> {
    const existing = this.shops.find((s) => s.shopDomain === shop.shopDomain);
    if (existing) {
      existing.accessTokenEncrypted = shop.accessTokenEncrypted;
      existing.scope = shop.scope ?? null;
      existing.tokenRefreshedAt = now;
      existing.updatedAt = now;
      return existing;
    }
    const created: Shop = {
      id: crypto.randomUUID(),
      shopDomain: shop.shopDomain,
      accessTokenEncrypted: shop.accessTokenEncrypted,
      scope: shop.scope ?? null,
      installedAt: now,
      tokenRefreshedAt: now,
      updatedAt: now,
    };
    this.shops.push(created);
    return created;
  }

  async deleteShop(shopDomain: string): Promise<number> {
    return removeWhere(this.shops, (s) => s.shopDomain === shopDomain);
  }

  // OAuth attempts
  async createOAuthAttempt(attempt: InsertOAuthAttempt): Promise<OAuthAttempt> {
    const created: OAuthAttempt = {
      nonce: attempt.nonce,
      shopDomain: attempt.shopDomain,
      createdAt: attempt.createdAt ?? this.clock(),
      expiresAt: attempt.expiresAt,
    };
    this.oauthAttempts.push(created);
    return created;
  }

  async consumeOAuthAttempt(nonce: string): Promise<OAuthAttempt | undefined> {
    const index = this.oauthAttempts.findIndex((a) => a.nonce === nonce);
    if (index === -1) return undefined;
    const [consumed] = this.oauthAttempts.splice(index, 1);
    return consumed;
  }

  async deleteExpiredOAuthAttempts(now: Date): Promise<number> {
    return removeWhere(this.oauthAttempts, (a) => a.expiresAt.getTime() <= now.getTime());
  }

  // Products
  async upsertProductWithVariants(
    product: InsertSyncedProduct,
    variants: InsertProductVariant[] | null,
    now: Date
  ): Promise<ReconciledUpsert> {
    const existing = this.products.find((p) => p.shopDomain === product.shopDomain && p.remoteId === product.remoteId);
    if (existing) {
      existing.lastSyncedAt = now;
      if (isStale(existing.remoteUpdatedAt, product.remoteUpdatedAt)) {
        return { outcome: "stale", childrenUpserted: 0, childrenRemoved: 0 };
      }
      existing.title = product.title ?? null;
      existing.handle = product.handle ?? null;
      existing.status = product.status ?? null;
      existing.payloadJson = product.payloadJson;
      existing.remoteUpdatedAt = product.remoteUpdatedAt ?? null;
    } else {
      this.products.push({
        id: crypto.randomUUID(),
        shopDomain: product.shopDomain,
        remoteId: product.remoteId,
        title: product.title ?? null,
        handle: product.handle ?? null,
        status: product.status ?? null,
        payloadJson: product.payloadJson,
        remoteUpdatedAt: product.remoteUpdatedAt ?? null,
        lastSyncedAt: now,
      });
    }
    if (variants === null) return { outcome: "written", childrenUpserted: 0, childrenRemoved: 0 };

    for (const variant of variants) {
      const row: ProductVariant = {
        id: crypto.randomUUID(),
        shopDomain: variant.shopDomain,
        productRemoteId: variant.productRemoteId,
        variantRemoteId: variant.variantRemoteId,
        title: variant.title ?? null,
        sku: variant.sku ?? null,
        barcode: variant.barcode ?? null,
        price: variant.price ?? null,
        inventoryItemId: variant.inventoryItemId ?? null,
        inventoryQuantity: variant.inventoryQuantity ?? null,
        payloadJson: variant.payloadJson,
        lastSyncedAt: variant.lastSyncedAt ?? now,
      };
      const stored = this.variants.find((v) =>
        v.shopDomain === variant.shopDomain &&
        v.productRemoteId === variant.productRemoteId &&
        v.variantRemoteId === variant.variantRemoteId
      );
      if (stored) {
        Object.assign(stored, { ...row, id: stored.id });
      } else {
        this.variants.push(row);
      }
    }
    const keep = new Set(variants.map((variant) => variant.variantRemoteId));
    const removed = removeWhere(this.variants, (v) =>
      v.shopDomain === product.shopDomain && v.productRemoteId === product.remoteId && !keep.has(v.variantRemoteId)
    );
    return { outcome: "written", childrenUpserted: variants.length, childrenRemoved: removed };
  }

  async deleteProduct(shopDomain: string, remoteId: string): Promise<number> {
    removeWhere(this.variants, (v) => v.shopDomain === shopDomain && v.productRemoteId === remoteId);
    return removeWhere(this.products, (p) => p.shopDomain === shopDomain && p.remoteId === remoteId);
  }

  async listProducts(shopDomain: string): Promise<SyncedProduct[]> {
    return this.products.filter((p) => p.shopDomain === shopDomain).sort((a, b) => a.remoteId.localeCompare(b.remoteId));
  }

  async listVariants(shopDomain: string, productRemoteIds?: string[]): Promise<ProductVariant[]> {
    return this.variants
      .filter((v) => v.shopDomain === shopDomain && (!productRemoteIds || productRemoteIds.includes(v.productRemoteId)))
      .sort((a, b) =>
        a.productRemoteId.localeCompare(b.productRemoteId) || a.variantRemoteId.localeCompare(b.variantRemoteId)
      );
  }

  // Orders
  async upsertOrderWithLineItems(
    order: InsertSyncedOrder,
    items: InsertOrderLineItem[],
    now: Date
  ): Promise<ReconciledUpsert> {
    const fields = {
      orderNumber: order.orderNumber ?? null,
      customerRemoteId: order.customerRemoteId ?? null,
      customerEmail: order.customerEmail ?? null,
      financialStatus: order.financialStatus ?? null,
      totalPrice: order.totalPrice ?? null,
      currency: order.currency ?? null,
      payloadJson: order.payloadJson,
      remoteUpdatedAt: order.remoteUpdatedAt ?? null,
    };
    const existing = this.orders.find((o) => o.shopDomain === order.shopDomain && o.remoteId === order.remoteId);
    if (existing) {
      existing.lastSyncedAt = now;
      if (isStale(existing.remoteUpdatedAt, order.remoteUpdatedAt)) {
        return { outcome: "stale", childrenUpserted: 0, childrenRemoved: 0 };
      }
      Object.assign(existing, fields);
    } else {
      this.orders.push({
        id: crypto.randomUUID(),
        shopDomain: order.shopDomain,
        remoteId: order.remoteId,
        ...fields,
        lastSyncedAt: now,
      });
    }

    for (const item of items) {
      const row: OrderLineItem = {
        id: crypto.randomUUID(),
        shopDomain: item.shopDomain,
        orderRemoteId: item.orderRemoteId,
        lineItemRemoteId: item.lineItemRemoteId,
        productRemoteId: item.productRemoteId ?? null,
        variantRemoteId: item.variantRemoteId ?? null,
        title: item.title ?? null,
        sku: item.sku ?? null,
        quantity: item.quantity ?? 0,
        price: item.price ?? null,
        payloadJson: item.payloadJson,
        lastSyncedAt: item.lastSyncedAt ?? now,
      };
      const stored = this.lineItems.find((li) =>
        li.shopDomain === item.shopDomain &&
        li.orderRemoteId === item.orderRemoteId &&
        li.lineItemRemoteId === item.lineItemRemoteId
      );
      if (stored) {
        Object.assign(stored, { ...row, id: stored.id });
      } else {
        this.lineItems.push(row);
      }
    }
    const keep = new Set(items.map((item) => item.lineItemRemoteId));
    const removed = removeWhere(this.lineItems, (li) =>
      li.shopDomain === order.shopDomain && li.orderRemoteId === order.remoteId && !keep.has(li.lineItemRemoteId)
    );
    return { outcome: "written", childrenUpserted: items.length, childrenRemoved: removed };
  }

  async listOrders(shopDomain: string): Promise<SyncedOrder[]> {
    return this.orders.filter((o) => o.shopDomain === shopDomain).sort((a, b) => a.remoteId.localeCompare(b.remoteId));
  }

  async listLineItems(shopDomain: string, orderRemoteIds?: string[]): Promise<OrderLineItem[]> {
    return this.lineItems
      .filter((li) => li.shopDomain === shopDomain && (!orderRemoteIds || orderRemoteIds.includes(li.orderRemoteId)))
      .sort((a, b) =>
        a.orderRemoteId.localeCompare(b.orderRemoteId) || a.lineItemRemoteId.localeCompare(b.lineItemRemoteId)
      );
  }

  async findOrdersForCustomer(shopDomain: string, lookup: CustomerLookup): Promise<SyncedOrder[]> {
    const email = lookup.customerEmail?.toLowerCase() ?? null;
    return this.orders
      .filter((o) => o.shopDomain === shopDomain)
      .filter((o) =>
        (lookup.customerRemoteId !== null && o.customerRemoteId === lookup.customerRemoteId) ||
        (email !== null && o.customerEmail?.toLowerCase() === email) ||
        lookup.orderRemoteIds.includes(o.remoteId)
      )
      .sort((a, b) => a.remoteId.localeCompare(b.remoteId));
  }

  async deleteOrders(shopDomain: string, remoteIds: string[]): Promise<{ orders: number; lineItems: number }> {
    const lineItems = removeWhere(this.lineItems, (li) => li.shopDomain === shopDomain && remoteIds.includes(li.orderRemoteId));
    const orders = removeWhere(this.orders, (o) => o.shopDomain === shopDomain && remoteIds.includes(o.remoteId));
    return { orders, lineItems };
  }

  // Inventory
  async upsertInventoryLevel(level: InsertInventoryLevel, now: Date): Promise<UpsertOutcome> {
    const existing = this.inventoryLevels.find((l) =>
      l.shopDomain === level.shopDomain &&
      l.inventoryItemId === level.inventoryItemId &&
      l.locationId === level.locationId
    );
    if (existing) {
      existing.lastSyncedAt = now;
      if (isStale(existing.remoteUpdatedAt, level.remoteUpdatedAt)) return "stale";
      existing.available = level.available ?? null;
      existing.payloadJson = level.payloadJson;
      existing.remoteUpdatedAt = level.remoteUpdatedAt ?? null;
      return "written";
    }
    this.inventoryLevels.push({
      id: crypto.randomUUID(),
      shopDomain: level.shopDomain,
      inventoryItemId: level.inventoryItemId,
      locationId: level.locationId,
      available: level.available ?? null,
      payloadJson: level.payloadJson,
      remoteUpdatedAt: level.remoteUpdatedAt ?? null,
      lastSyncedAt: now,
    });
    return "written";
  }

  async deleteInventoryLevel(shopDomain: string, inventoryItemId: string, locationId: string): Promise<number> {
    return removeWhere(this.inventoryLevels, (l) =>
      l.shopDomain === shopDomain && l.inventoryItemId === inventoryItemId && l.locationId === locationId
    );
  }

  async listInventoryLevels(shopDomain: string): Promise<InventoryLevel[]> {
    return this.inventoryLevels
      .filter((l) => l.shopDomain === shopDomain)
      .sort((a, b) => a.inventoryItemId.localeCompare(b.inventoryItemId) || a.locationId.localeCompare(b.locationId));
  }

  async countShopEntities(shopDomain: string): Promise<ShopEntityCounts> {
    const forShop = (rows: { shopDomain: string }[]) => rows.filter((r) => r.shopDomain === shopDomain).length;
    return {
      products: forShop(this.products),
      variants: forShop(this.variants),
      orders: forShop(this.orders),
      lineItems: forShop(this.lineItems),
      inventoryLevels: forShop(this.inventoryLevels),
      webhookReceipts: forShop(this.webhookReceipts),
    };
  }

  async deleteAllForShop(table: ShopScopedTable, shopDomain: string): Promise<number> {
    const inShop = (row: { shopDomain: string }) => row.shopDomain === shopDomain;
    switch (table) {
      case "orderLineItems": return removeWhere(this.lineItems, inShop);
      case "orders": return removeWhere(this.orders, inShop);
      case "productVariants": return removeWhere(this.variants, inShop);
      case "products": return removeWhere(this.products, inShop);
      case "inventoryLevels": return removeWhere(this.inventoryLevels, inShop);
      case "dataRequests": return removeWhere(this.dataRequests, inShop);
      case "backgroundJobs": return removeWhere(this.jobs, inShop);
      case "syncLeases": return removeWhere(this.syncLeases, inShop);
      case "oauthAttempts": return removeWhere(this.oauthAttempts, inShop);
      case "webhookReceipts": return removeWhere(this.webhookReceipts, inShop);
    }
  }

  // Webhook receipts
  async getWebhookReceipt(shopDomain: string, deliveryKey: string): Promise<WebhookReceipt | undefined> {
    return this.webhookReceipts.find((r) => r.shopDomain === shopDomain && r.deliveryKey === deliveryKey);
  }

  async recordWebhookReceipt(receipt: InsertWebhookReceipt): Promise<WebhookReceipt> {
    const existing = this.webhookReceipts.find((r) =>
      r.shopDomain === receipt.shopDomain && r.deliveryKey === receipt.deliveryKey
    );
    if (existing) {
      existing.attempts += 1;
      return existing;
    }
    const created: WebhookReceipt = {
      id: crypto.randomUUID(),
      shopDomain: receipt.shopDomain,
      deliveryKey: receipt.deliveryKey,
      topic: receipt.topic,
      status: receipt.status ?? "received",
      errorMessage: receipt.errorMessage ?? null,
      attempts: receipt.attempts ?? 1,
      createdAt: receipt.createdAt ?? this.clock(),
      processedAt: receipt.processedAt ?? null,
    };
    this.webhookReceipts.push(created);
    return created;
  }

  async markWebhookReceipt(
    id: string,
    status: "processed" | "failed",
    errorMessage: string | null,
    now: Date
  ): Promise<void> {
    const receipt = this.webhookReceipts.find((r) => r.id === id);
    if (!receipt) return;
    receipt.status = status;
    receipt.errorMessage = errorMessage;
    receipt.processedAt = status === "processed" ? now : null;
  }

  async deleteWebhookReceiptsBefore(cutoff: Date): Promise<number> {
    return removeWhere(this.webhookReceipts, (r) => r.createdAt.getTime() < cutoff.getTime());
  }

  // Sync leases
  async acquireSyncLease(
    shopDomain: string,
    resourceKind: ResourceKind,
    holder: string,
    expiresAt: Date,
    now: Date
  ): Promise<boolean> {
    const existing = this.syncLeases.find((l) => l.shopDomain === shopDomain && l.resourceKind === resourceKind);
    if (existing) {
      if (existing.expiresAt.getTime() > now.getTime()) return false;
      existing.holder = holder;
      existing.expiresAt = expiresAt;
      existing.acquiredAt = now;
      return true;
    }
    this.syncLeases.push({ shopDomain, resourceKind, holder, expiresAt, acquiredAt: now });
    return true;
  }

  async renewSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string, expiresAt: Date): Promise<boolean> {
    const lease = this.syncLeases.find((l) =>
      l.shopDomain === shopDomain && l.resourceKind === resourceKind && l.holder === holder
    );
    if (!lease) return false;
    lease.expiresAt = expiresAt;
    return true;
  }

  async releaseSyncLease(shopDomain: string, resourceKind: ResourceKind, holder: string): Promise<void> {
    removeWhere(this.syncLeases, (l) => l.shopDomain === shopDomain && l.resourceKind === resourceKind && l.holder === holder);
  }

  async getSyncLease(shopDomain: string, resourceKind: ResourceKind): Promise<SyncLease | undefined> {
    return this.syncLeases.find((l) => l.shopDomain === shopDomain && l.resourceKind === resourceKind);
  }

  async listSyncLeases(shopDomain: string): Promise<SyncLease[]> {
    return this.syncLeases.filter((l) => l.shopDomain === shopDomain);
  }

  // Background jobs
  async enqueueJob(job: InsertBackgroundJob): Promise<{ job: BackgroundJob; created: boolean }> {
    const existing = this.jobs.find((j) => j.dedupeKey === job.dedupeKey && isActive(j.status));
    if (existing) return { job: existing, created: false };
    const now = this.clock();
    const created: BackgroundJob = {
      id: crypto.randomUUID(),
      kind: job.kind,
      shopDomain: job.shopDomain,
      dedupeKey: job.dedupeKey,
      payloadJson: job.payloadJson,
      status: job.status ?? "PENDING",
      attempts: job.attempts ?? 0,
      maxAttempts: job.maxAttempts ?? 3,
      runAt: job.runAt ?? now,
      leaseExpiresAt: job.leaseExpiresAt ?? null,
      lastErrorMessage: job.lastErrorMessage ?? null,
      resultJson: job.resultJson ?? null,
      createdAt: job.createdAt ?? now,
      updatedAt: job.updatedAt ?? now,
    };
    this.jobs.push(created);
    return { job: created, created: true };
  }

  async getJob(id: string): Promise<BackgroundJob | undefined> {
    return this.jobs.find((j) => j.id === id);
  }

  async findActiveJob(dedupeKey: string): Promise<BackgroundJob | undefined> {
    return this.jobs.find((j) => j.dedupeKey === dedupeKey && isActive(j.status));
  }

  async claimNextJob(now: Date, leaseExpiresAt: Date): Promise<BackgroundJob | undefined> {
    const due = this.jobs
      .filter((j) =>
        ((j.status === "PENDING" || j.status === "RETRY") && j.runAt.getTime() <= now.getTime()) ||
        (j.status === "RUNNING" && j.leaseExpiresAt !== null && j.leaseExpiresAt.getTime() <= now.getTime())
      )
      .sort((a, b) => a.runAt.getTime() - b.runAt.getTime());
    const job = due[0];
    if (!job) return undefined;
    job.status = "RUNNING";
    job.attempts += 1;
    job.leaseExpiresAt = leaseExpiresAt;
    job.updatedAt = now;
    return job;
  }

  async completeJob(id: string, result: unknown, now: Date): Promise<void> {
    this.updateJob(id, { status: "COMPLETED", resultJson: result, leaseExpiresAt: null, updatedAt: now });
  }

  async retryJob(id: string, runAt: Date, errorMessage: string, now: Date): Promise<void> {
    this.updateJob(id, { status: "RETRY", runAt, lastErrorMessage: errorMessage, leaseExpiresAt: null, updatedAt: now });
  }

  async failJob(id: string, errorMessage: string, now: Date): Promise<void> {
    this.updateJob(id, { status: "FAILED", lastErrorMessage: errorMessage, leaseExpiresAt: null, updatedAt: now });
  }

  async deletePendingJobs(dedupeKeys: string[]): Promise<number> {
    return removeWhere(this.jobs, (j) =>
      dedupeKeys.includes(j.dedupeKey) && (j.status === "PENDING" || j.status === "RETRY")
    );
  }

  // Data requests
  async createDataRequest(request: InsertDataRequest): Promise<{ request: DataRequest; created: boolean }> {
    const existing = this.dataRequests.find((r) =>
      r.shopDomain === request.shopDomain && r.remoteRequestId === request.remoteRequestId
    );
    if (existing) return { request: existing, created: false };
    const created: DataRequest = {
      id: crypto.randomUUID(),
      shopDomain: request.shopDomain,
      remoteRequestId: request.remoteRequestId,
      customerRemoteId: request.customerRemoteId ?? null,
      customerEmail: request.customerEmail ?? null,
      ordersRequested: request.ordersRequested ?? [],
      status: request.status ?? "pending",
      snapshotJson: request.snapshotJson ?? null,
      createdAt: request.createdAt ?? this.clock(),
      completedAt: request.completedAt ?? null,
    };
    this.dataRequests.push(created);
    return { request: created, created: true };
  }

  async getDataRequest(id: string): Promise<DataRequest | undefined> {
    return this.dataRequests.find((r) => r.id === id);
  }

  async completeDataRequest(id: string, snapshot: unknown, now: Date): Promise<void> {
    const request = this.dataRequests.find((r) => r.id === id);
    if (!request) return;
    request.status = "exported";
    request.snapshotJson = snapshot;
    request.completedAt = now;
  }

  async findDataRequestsForCustomer(
    shopDomain: string,
    customerRemoteId: string | null,
    customerEmail: string | null
  ): Promise<DataRequest[]> {
    const email = customerEmail?.toLowerCase() ?? null;
    return this.dataRequests.filter((r) =>
      r.shopDomain === shopDomain && (
        (customerRemoteId !== null && r.customerRemoteId === customerRemoteId) ||
        (email !== null && r.customerEmail?.toLowerCase() === email)
      )
    );
  }

  async deleteDataRequests(ids: string[]): Promise<number> {
    return removeWhere(this.dataRequests, (r) => ids.includes(r.id));
  }

  private updateJob(id: string, patch: Partial<BackgroundJob>): void {
    const job = this.jobs.find((j) => j.id === id);
    if (job) Object.assign(job, patch);
  }
}

