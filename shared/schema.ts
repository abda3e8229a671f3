import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  varchar,
  integer,
  decimal,
  timestamp,
  jsonb,
  pgEnum,
  primaryKey,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";

// Enums
export const webhookReceiptStatusEnum = pgEnum("webhook_receipt_status", ["received", "processed", "failed"]);
export const jobKindEnum = pgEnum("job_kind", ["sync", "data_export"]);
export const jobStatusEnum = pgEnum("job_status", ["PENDING", "RUNNING", "RETRY", "COMPLETED", "FAILED"]);
export const dataRequestStatusEnum = pgEnum("data_request_status", ["pending", "exported"]);

export const RESOURCE_KINDS = ["products", "orders", "inventory"] as const;
export type ResourceKind = typeof RESOURCE_KINDS[number];

export const ACTIVE_JOB_STATUSES = ["PENDING", "RUNNING", "RETRY"] as const;

// Installed shops (tenant credentials)
export const shops = pgTable("shops", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").notNull().unique(),
  accessTokenEncrypted: text("access_token_encrypted").notNull(),
  scope: text("scope"),
  installedAt: timestamp("installed_at").defaultNow().notNull(),
  tokenRefreshedAt: timestamp("token_refreshed_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Pending OAuth authorization attempts, keyed by the state nonce
export const oauthAttempts = pgTable("oauth_attempts", {
  nonce: varchar("nonce", { length: 64 }).primaryKey(),
  shopDomain: text("shop_domain").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  expiresAt: timestamp("expires_at").notNull(),
}, (t) => [
  index("oauth_attempts_expires_at_idx").on(t.expiresAt),
]);

// Synchronized products
export const syncedProducts = pgTable("synced_products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").references(() => shops.shopDomain).notNull(),
  remoteId: text("remote_id").notNull(),
  title: text("title"),
  handle: text("handle"),
  status: text("status"),
  payloadJson: jsonb("payload_json").notNull(),
  remoteUpdatedAt: timestamp("remote_updated_at"),
  lastSyncedAt: timestamp("last_synced_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("synced_products_shop_remote_idx").on(t.shopDomain, t.remoteId),
]);

// Product variants (children of synced products)
export const productVariants = pgTable("product_variants", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").references(() => shops.shopDomain).notNull(),
  productRemoteId: text("product_remote_id").notNull(),
  variantRemoteId: text("variant_remote_id").notNull(),
  title: text("title"),
  sku: text("sku"),
  barcode: text("barcode"),
  price: decimal("price", { precision: 12, scale: 2 }),
  inventoryItemId: text("inventory_item_id"),
  inventoryQuantity: integer("inventory_quantity"),
  payloadJson: jsonb("payload_json").notNull(),
  lastSyncedAt: timestamp("last_synced_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("product_variants_shop_product_variant_idx").on(t.shopDomain, t.productRemoteId, t.variantRemoteId),
]);

// Synchronized orders
export const syncedOrders = pgTable("synced_orders", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").references(() => shops.shopDomain).notNull(),
  remoteId: text("remote_id").notNull(),
  orderNumber: text("order_number"),
  customerRemoteId: text("customer_remote_id"),
  customerEmail: text("customer_email"),
  financialStatus: text("financial_status"),
  totalPrice: decimal("total_price", { precision: 12, scale: 2 }),
  currency: text("currency"),
  payloadJson: jsonb("payload_json").notNull(),
  remoteUpdatedAt: timestamp("remote_updated_at"),
  lastSyncedAt: timestamp("last_synced_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("synced_orders_shop_remote_idx").on(t.shopDomain, t.remoteId),
  index("synced_orders_customer_idx").on(t.shopDomain, t.customerRemoteId),
]);

// Order line items (children of synced orders)
export const orderLineItems = pgTable("order_line_items", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").references(() => shops.shopDomain).notNull(),
  orderRemoteId: text("order_remote_id").notNull(),
  lineItemRemoteId: text("line_item_remote_id").notNull(),
  productRemoteId: text("product_remote_id"),
  variantRemoteId: text("variant_remote_id"),
  title: text("title"),
  sku: text("sku"),
  quantity: integer("quantity").notNull().default(0),
  price: decimal("price", { precision: 12, scale: 2 }),
  payloadJson: jsonb("payload_json").notNull(),
  lastSyncedAt: timestamp("last_synced_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("order_line_items_shop_order_line_idx").on(t.shopDomain, t.orderRemoteId, t.lineItemRemoteId),
]);

// Synchronized inventory levels (one per inventory item and location)
export const inventoryLevels = pgTable("inventory_levels", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").references(() => shops.shopDomain).notNull(),
  inventoryItemId: text("inventory_item_id").notNull(),
  locationId: text("location_id").notNull(),
  available: integer("available"),
  payloadJson: jsonb("payload_json").notNull(),
  remoteUpdatedAt: timestamp("remote_updated_at"),
  lastSyncedAt: timestamp("last_synced_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("inventory_levels_shop_item_location_idx").on(t.shopDomain, t.inventoryItemId, t.locationId),
]);

// Webhook receipt log (deduplication + audit)
export const webhookReceipts = pgTable("webhook_receipts", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").notNull(),
  deliveryKey: text("delivery_key").notNull(),
  topic: text("topic").notNull(),
  status: webhookReceiptStatusEnum("status").notNull().default("received"),
  errorMessage: text("error_message"),
  attempts: integer("attempts").notNull().default(1),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  processedAt: timestamp("processed_at"),
}, (t) => [
  uniqueIndex("webhook_receipts_shop_delivery_idx").on(t.shopDomain, t.deliveryKey),
  index("webhook_receipts_created_at_idx").on(t.createdAt),
]);

// Per (shop, resource kind) sync leases
export const syncLeases = pgTable("sync_leases", {
  shopDomain: text("shop_domain").notNull(),
  resourceKind: text("resource_kind").notNull(),
  holder: varchar("holder").notNull(),
  expiresAt: timestamp("expires_at").notNull(),
  acquiredAt: timestamp("acquired_at").defaultNow().notNull(),
}, (t) => [
  primaryKey({ columns: [t.shopDomain, t.resourceKind] }),
]);

// Durable background job queue
export const backgroundJobs = pgTable("background_jobs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  kind: jobKindEnum("kind").notNull(),
  shopDomain: text("shop_domain").notNull(),
  dedupeKey: text("dedupe_key").notNull(),
  payloadJson: jsonb("payload_json").notNull(),
  status: jobStatusEnum("status").notNull().default("PENDING"),
  attempts: integer("attempts").notNull().default(0),
  maxAttempts: integer("max_attempts").notNull().default(3),
  runAt: timestamp("run_at").defaultNow().notNull(),
  leaseExpiresAt: timestamp("lease_expires_at"),
  lastErrorMessage: text("last_error_message"),
  resultJson: jsonb("result_json"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => [
  uniqueIndex("background_jobs_active_dedupe_idx")
    .on(t.dedupeKey)
    .where(sql`status in ('PENDING', 'RUNNING', 'RETRY')`),
  index("background_jobs_due_idx").on(t.status, t.runAt),
]);

// Customer data-access requests
export const dataRequests = pgTable("data_requests", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  shopDomain: text("shop_domain").notNull(),
  remoteRequestId: text("remote_request_id").notNull(),
  customerRemoteId: text("customer_remote_id"),
  customerEmail: text("customer_email"),
  ordersRequested: jsonb("orders_requested").$type<string[]>().notNull().default([]),
  status: dataRequestStatusEnum("status").notNull().default("pending"),
  snapshotJson: jsonb("snapshot_json"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  completedAt: timestamp("completed_at"),
}, (t) => [
  uniqueIndex("data_requests_shop_request_idx").on(t.shopDomain, t.remoteRequestId),
]);

// Types
export type Shop = typeof shops.$inferSelect;
export type InsertShop = typeof shops.$inferInsert;
export type OAuthAttempt = typeof oauthAttempts.$inferSelect;
export type InsertOAuthAttempt = typeof oauthAttempts.$inferInsert;
export type SyncedProduct = typeof syncedProducts.$inferSelect;
export type InsertSyncedProduct = typeof syncedProducts.$inferInsert;
export type ProductVariant = typeof productVariants.$inferSelect;
export type InsertProductVariant = typeof productVariants.$inferInsert;
export type SyncedOrder = typeof syncedOrders.$inferSelect;
export type InsertSyncedOrder = typeof syncedOrders.$inferInsert;
export type OrderLineItem = typeof orderLineItems.$inferSelect;
export type InsertOrderLineItem = typeof orderLineItems.$inferInsert;
export type InventoryLevel = typeof inventoryLevels.$inferSelect;
export type InsertInventoryLevel = typeof inventoryLevels.$inferInsert;
export type WebhookReceipt = typeof webhookReceipts.$inferSelect;
export type InsertWebhookReceipt = typeof webhookReceipts.$inferInsert;
export type SyncLease = typeof syncLeases.$inferSelect;
export type BackgroundJob = typeof backgroundJobs.$inferSelect;
export type InsertBackgroundJob = typeof backgroundJobs.$inferInsert;
export type JobKind = BackgroundJob["kind"];
export type JobStatus = BackgroundJob["status"];
export type DataRequest = typeof dataRequests.$inferSelect;
export type InsertDataRequest = typeof dataRequests.$inferInsert;
