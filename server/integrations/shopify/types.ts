// Shopify Admin API payloads used by shop-sync.
//
// Payloads are validated with zod at the boundary. Unknown keys pass through so
// the stored snapshot keeps the whole upstream object.

import { z } from "zod";

// Shopify ids arrive as JSON numbers; they are kept as strings locally
const remoteId = z.union([z.number().int(), z.string().min(1)]).transform(String);
const optionalRemoteId = z
  .union([z.number().int(), z.string()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === "" ? null : String(value)));
const money = z.union([z.string(), z.number()]).nullish().transform((value) => (value === null || value === undefined ? null : String(value)));

// Shopify Variant (only what the local store reads)
export const shopifyVariantSchema = z.object({
  id: remoteId,
  title: z.string().nullish(),
  sku: z.string().nullish(),
  barcode: z.string().nullish(),
  price: money,
  inventory_item_id: optionalRemoteId,
  inventory_quantity: z.number().int().nullish(),
}).passthrough();

// Shopify Product
export const shopifyProductSchema = z.object({
  id: remoteId,
  title: z.string().nullish(),
  handle: z.string().nullish(),
  status: z.string().nullish(),
  updated_at: z.string().nullish(),
  variants: z.array(shopifyVariantSchema).optional(),
}).passthrough();

// Shopify Customer (as embedded in orders)
export const shopifyCustomerSchema = z.object({
  id: remoteId,
  email: z.string().nullish(),
}).passthrough();

// Shopify Line Item
export const shopifyLineItemSchema = z.object({
  id: remoteId,
  product_id: optionalRemoteId,
  variant_id: optionalRemoteId,
  title: z.string().nullish(),
  sku: z.string().nullish(),
  quantity: z.number().int().default(0),
  price: money,
}).passthrough();

// Shopify Order
export const shopifyOrderSchema = z.object({
  id: remoteId,
  name: z.string().nullish(),
  order_number: z.union([z.number(), z.string()]).nullish(),
  email: z.string().nullish(),
  customer: shopifyCustomerSchema.nullish(),
  financial_status: z.string().nullish(),
  total_price: money,
  currency: z.string().nullish(),
  updated_at: z.string().nullish(),
  line_items: z.array(shopifyLineItemSchema).default([]),
}).passthrough();

// Shopify Location
export const shopifyLocationSchema = z.object({
  id: remoteId,
  name: z.string().nullish(),
  active: z.boolean().default(true),
}).passthrough();

// Shopify Inventory Level
export const shopifyInventoryLevelSchema = z.object({
  inventory_item_id: remoteId,
  location_id: remoteId,
  available: z.number().int().nullish(),
  updated_at: z.string().nullish(),
}).passthrough();

// Shopify Webhook subscription
export const shopifyWebhookSchema = z.object({
  id: remoteId,
  topic: z.string(),
  address: z.string(),
}).passthrough();

// List responses
export const shopifyProductsResponseSchema = z.object({ products: z.array(shopifyProductSchema) });
export const shopifyOrdersResponseSchema = z.object({ orders: z.array(shopifyOrderSchema) });
export const shopifyLocationsResponseSchema = z.object({ locations: z.array(shopifyLocationSchema) });
export const shopifyInventoryLevelsResponseSchema = z.object({
  inventory_levels: z.array(shopifyInventoryLevelSchema),
});
export const shopifyWebhooksResponseSchema = z.object({ webhooks: z.array(shopifyWebhookSchema) });
export const shopifyWebhookResponseSchema = z.object({ webhook: shopifyWebhookSchema });

// OAuth token exchange response
export const accessTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  scope: z.string().default(""),
});

// Deletion webhooks only carry the id
export const shopifyDeletedEntitySchema = z.object({ id: remoteId }).passthrough();

export const shopifyInventoryDisconnectSchema = z.object({
  inventory_item_id: remoteId,
  location_id: remoteId,
}).passthrough();

// Compliance webhook payloads
export const customersDataRequestSchema = z.object({
  shop_id: optionalRemoteId,
  shop_domain: z.string().optional(),
  customer: z.object({
    id: optionalRemoteId,
    email: z.string().nullish(),
    phone: z.string().nullish(),
  }).passthrough().nullish(),
  orders_requested: z.array(remoteId).default([]),
  data_request: z.object({ id: remoteId }).passthrough(),
}).passthrough();

export const customersRedactSchema = z.object({
  shop_id: optionalRemoteId,
  shop_domain: z.string().optional(),
  customer: z.object({
    id: optionalRemoteId,
    email: z.string().nullish(),
    phone: z.string().nullish(),
  }).passthrough().nullish(),
  orders_to_redact: z.array(remoteId).default([]),
}).passthrough();

export const shopRedactSchema = z.object({
  shop_id: optionalRemoteId,
  shop_domain: z.string().optional(),
}).passthrough();

export type ShopifyVariant = z.infer<typeof shopifyVariantSchema>;
export type ShopifyProduct = z.infer<typeof shopifyProductSchema>;
export type ShopifyCustomer = z.infer<typeof shopifyCustomerSchema>;
export type ShopifyLineItem = z.infer<typeof shopifyLineItemSchema>;
export type ShopifyOrder = z.infer<typeof shopifyOrderSchema>;
export type ShopifyLocation = z.infer<typeof shopifyLocationSchema>;
export type ShopifyInventoryLevel = z.infer<typeof shopifyInventoryLevelSchema>;
export type ShopifyWebhook = z.infer<typeof shopifyWebhookSchema>;
export type CustomersDataRequestPayload = z.infer<typeof customersDataRequestSchema>;
export type CustomersRedactPayload = z.infer<typeof customersRedactSchema>;
export type ShopRedactPayload = z.infer<typeof shopRedactSchema>;
