import type { DataRequest } from "@shared/schema";
import type { IStorage, ShopScopedTable } from "../../storage";
import { SHOP_SCOPED_TABLES } from "../../storage";
import type { JobQueue } from "../../jobs";
import type { ExportTransport } from "../../email";
import type { CustomersDataRequestPayload, CustomersRedactPayload } from "./types";

// Mandatory privacy webhooks: customers/data_request, customers/redact and
// shop/redact. Every step is idempotent; errors propagate to the webhook route.

export interface ComplianceDeps {
  storage: IStorage;
  queue: JobQueue;
  exportTransport: ExportTransport;
  now?: () => Date;
}

export interface DataRequestAcknowledgement {
  dataRequestId: string;
  jobId: string | null;
  duplicate: boolean;
}

export interface CustomerRedactionSummary {
  shopDomain: string;
  orders: number;
  lineItems: number;
  dataRequests: number;
  exportJobs: number;
}

export interface TenantErasureSummary {
  shopDomain: string;
  deleted: Record<ShopScopedTable | "shops", number>;
}

export interface CustomerSnapshot {
  shopDomain: string;
  dataRequestId: string;
  customer: { id: string | null; email: string | null };
  generatedAt: string;
  orders: Array<{
    remoteId: string;
    orderNumber: string | null;
    financialStatus: string | null;
    totalPrice: string | null;
    currency: string | null;
    payload: unknown;
    lineItems: Array<{
      remoteId: string;
      title: string | null;
      sku: string | null;
      quantity: number;
      price: string | null;
    }>;
  }>;
}

export function dataExportDedupeKey(shopDomain: string, remoteRequestId: string): string {
  return `data_export:${shopDomain}:${remoteRequestId}`;
}

/**
 * Records the request and queues the export. Returns once the request is
 * durably stored; a redelivery of the same request id is acknowledged without
 * queuing a second export.
 */
export async function handleCustomersDataRequest(
  deps: ComplianceDeps,
  shopDomain: string,
  payload: CustomersDataRequestPayload
): Promise<DataRequestAcknowledgement> {
  const remoteRequestId = payload.data_request.id;
  const { request, created } = await deps.storage.createDataRequest({
    shopDomain,
    remoteRequestId,
    customerRemoteId: payload.customer?.id ?? null,
    customerEmail: payload.customer?.email ?? null,
    ordersRequested: payload.orders_requested,
    status: "pending",
    createdAt: deps.now?.() ?? new Date(),
  });

  if (!created && request.status === "exported") {
    console.log(`[Compliance] Data request ${remoteRequestId} for ${shopDomain} already exported`);
    return { dataRequestId: request.id, jobId: null, duplicate: true };
  }

  const { job } = await deps.queue.enqueue(
    "data_export",
    shopDomain,
    dataExportDedupeKey(shopDomain, remoteRequestId),
    { shopDomain, dataRequestId: request.id }
  );

  console.log(`[Compliance] Data request ${remoteRequestId} for ${shopDomain} recorded (export job ${job.id})`);
  return { dataRequestId: request.id, jobId: job.id, duplicate: !created };
}

export async function buildCustomerSnapshot(
  storage: IStorage,
  request: DataRequest,
  now: Date
): Promise<CustomerSnapshot> {
  const orders = await storage.findOrdersForCustomer(request.shopDomain, {
    customerRemoteId: request.customerRemoteId,
    customerEmail: request.customerEmail,
    orderRemoteIds: request.ordersRequested,
  });
  const lineItems = await storage.listLineItems(request.shopDomain, orders.map((o) => o.remoteId));

  return {
    shopDomain: request.shopDomain,
    dataRequestId: request.remoteRequestId,
    customer: { id: request.customerRemoteId, email: request.customerEmail },
    generatedAt: now.toISOString(),
    orders: orders.map((order) => ({
      remoteId: order.remoteId,
      orderNumber: order.orderNumber,
      financialStatus: order.financialStatus,
      totalPrice: order.totalPrice,
      currency: order.currency,
      payload: order.payloadJson,
      lineItems: lineItems
        .filter((item) => item.orderRemoteId === order.remoteId)
        .map((item) => ({
          remoteId: item.lineItemRemoteId,
          title: item.title,
          sku: item.sku,
          quantity: item.quantity,
          price: item.price,
        })),
    })),
  };
}

/** Background half of a data request: snapshot, store, deliver. */
export async function runDataExport(
  deps: ComplianceDeps,
  dataRequestId: string
): Promise<{ orders: number; delivered: boolean }> {
  const request = await deps.storage.getDataRequest(dataRequestId);
  if (!request) {
    // Erased by customers/redact or shop/redact after it was queued
    console.log(`[Compliance] Data request ${dataRequestId} no longer exists, nothing to export`);
    return { orders: 0, delivered: false };
  }

  const now = deps.now?.() ?? new Date();
  const snapshot = await buildCustomerSnapshot(deps.storage, request, now);
  await deps.storage.completeDataRequest(request.id, snapshot, now);
  const delivery = await deps.exportTransport.deliverDataExport({
    shopDomain: request.shopDomain,
    remoteRequestId: request.remoteRequestId,
    customerRemoteId: request.customerRemoteId,
    snapshot,
  });

  console.log(
    `[Compliance] Exported ${snapshot.orders.length} order(s) for data request ${request.remoteRequestId} ` +
    `(${request.shopDomain}), delivered: ${delivery.delivered}`
  );
  return { orders: snapshot.orders.length, delivered: delivery.delivered };
}

/**
 * Deletes the customer's orders (tied to the customer id or email, or named in
 * `orders_to_redact`) with their line items, then the customer's data requests
 * and any export still waiting to run.
 */
export async function handleCustomersRedact(
  deps: ComplianceDeps,
  shopDomain: string,
  payload: CustomersRedactPayload
): Promise<CustomerRedactionSummary> {
  const customerRemoteId = payload.customer?.id ?? null;
  const customerEmail = payload.customer?.email ?? null;

  const orders = await deps.storage.findOrdersForCustomer(shopDomain, {
    customerRemoteId,
    customerEmail,
    orderRemoteIds: payload.orders_to_redact,
  });
  const deleted = await deps.storage.deleteOrders(shopDomain, orders.map((o) => o.remoteId));

  const requests = await deps.storage.findDataRequestsForCustomer(shopDomain, customerRemoteId, customerEmail);
  const exportJobs = await deps.storage.deletePendingJobs(
    requests.map((r) => dataExportDedupeKey(shopDomain, r.remoteRequestId))
  );
  const dataRequests = await deps.storage.deleteDataRequests(requests.map((r) => r.id));

  const summary: CustomerRedactionSummary = {
    shopDomain,
    orders: deleted.orders,
    lineItems: deleted.lineItems,
    dataRequests,
    exportJobs,
  };
  console.log(
    `[Compliance] Customer redact for ${shopDomain}: ${summary.orders} order(s), ` +
    `${summary.lineItems} line item(s), ${summary.dataRequests} data request(s) removed`
  );
  return summary;
}

/**
 * Erases everything held for a shop: synchronized entities, requests, jobs,
 * leases, attempts and receipts, and the credential last. Running it on an
 * erased shop deletes nothing and succeeds.
 */
export async function handleShopRedact(
  deps: ComplianceDeps,
  shopDomain: string
): Promise<TenantErasureSummary> {
  const deleted: Record<ShopScopedTable | "shops", number> = {
    orderLineItems: 0,
    orders: 0,
    productVariants: 0,
    products: 0,
    inventoryLevels: 0,
    dataRequests: 0,
    backgroundJobs: 0,
    syncLeases: 0,
    oauthAttempts: 0,
    webhookReceipts: 0,
    shops: 0,
  };

  for (const table of SHOP_SCOPED_TABLES) {
    deleted[table] = await deps.storage.deleteAllForShop(table, shopDomain);
  }
  deleted.shops = await deps.storage.deleteShop(shopDomain);

  console.log(
    `[Compliance] Shop redact for ${shopDomain}: ` +
    Object.entries(deleted).map(([table, count]) => `${table}=${count}`).join(", ")
  );
  return { shopDomain, deleted };
}
