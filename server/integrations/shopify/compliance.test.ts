import { beforeEach, describe, expect, it } from "vitest";
import { MemStorage } from "../../test-utils/memStorage";
import { fixedClock, installShop, testConfig, TEST_SHOP } from "../../test-utils/fixtures";
import { JobQueue } from "../../jobs";
import type { DataExportDelivery, ExportTransport } from "../../email";
import {
  dataExportDedupeKey,
  handleCustomersDataRequest,
  handleCustomersRedact,
  handleShopRedact,
  runDataExport,
  type ComplianceDeps,
} from "./compliance";
import { storeOrder, storeProduct } from "./syncStore";
import { customersDataRequestSchema, customersRedactSchema, shopifyOrderSchema, shopifyProductSchema } from "./types";

const OTHER_SHOP = "shop2.example";

class CapturingTransport implements ExportTransport {
  readonly deliveries: DataExportDelivery[] = [];

  async deliverDataExport(delivery: DataExportDelivery) {
    this.deliveries.push(delivery);
    return { delivered: true, messageId: `msg-${this.deliveries.length}` };
  }
}

function orderPayload(id: number, customerId: number | null, email: string | null, lineItemIds: number[]) {
  return shopifyOrderSchema.parse({
    id,
    name: `#${id}`,
    email,
    customer: customerId === null ? null : { id: customerId, email },
    total_price: "20.00",
    currency: "USD",
    line_items: lineItemIds.map((li) => ({ id: li, title: `Item ${li}`, quantity: 2, price: "10.00" })),
  });
}

describe("compliance", () => {
  const config = testConfig();
  let storage: MemStorage;
  let transport: CapturingTransport;
  let deps: ComplianceDeps;
  const now = new Date("2024-05-01T12:00:00.000Z");

  beforeEach(async () => {
    const clock = fixedClock();
    storage = new MemStorage(clock.now);
    transport = new CapturingTransport();
    const queue = new JobQueue(storage, {
      maxAttempts: 3,
      deadlineMs: 60_000,
      backoffBaseMs: 100,
      backoffMaxMs: 1_000,
      now: clock.now,
    });
    deps = { storage, queue, exportTransport: transport, now: clock.now };

    await installShop(storage, config);
    await installShop(storage, config, OTHER_SHOP);
    for (const id of [1, 2, 3]) {
      await storeProduct(storage, TEST_SHOP, shopifyProductSchema.parse({ id, title: `Product ${id}`, variants: [{ id: id * 10 }] }), now);
    }
    await storeProduct(storage, OTHER_SHOP, shopifyProductSchema.parse({ id: 1, title: "Elsewhere", variants: [{ id: 10 }] }), now);
    await storeOrder(storage, TEST_SHOP, orderPayload(101, 42, "ana@example.com", [1, 2]), now);
    await storeOrder(storage, TEST_SHOP, orderPayload(102, 43, "bo@example.com", [3]), now);
    await storeOrder(storage, OTHER_SHOP, orderPayload(101, 42, "ana@example.com", [1]), now);
  });

  describe("customers/data_request", () => {
    const payload = customersDataRequestSchema.parse({
      shop_domain: TEST_SHOP,
      customer: { id: 42, email: "ana@example.com" },
      orders_requested: [101],
      data_request: { id: 9001 },
    });

    it("records the request and queues an export", async () => {
      const ack = await handleCustomersDataRequest(deps, TEST_SHOP, payload);

      expect(ack.duplicate).toBe(false);
      expect(storage.dataRequests).toHaveLength(1);
      expect(storage.dataRequests[0]).toMatchObject({
        remoteRequestId: "9001",
        customerRemoteId: "42",
        customerEmail: "ana@example.com",
        ordersRequested: ["101"],
        status: "pending",
      });
      expect(storage.jobs).toHaveLength(1);
      expect(storage.jobs[0]).toMatchObject({
        id: ack.jobId,
        kind: "data_export",
        dedupeKey: dataExportDedupeKey(TEST_SHOP, "9001"),
        payloadJson: { shopDomain: TEST_SHOP, dataRequestId: ack.dataRequestId },
      });
    });

    it("acknowledges a redelivery without a second export", async () => {
      const first = await handleCustomersDataRequest(deps, TEST_SHOP, payload);
      const second = await handleCustomersDataRequest(deps, TEST_SHOP, payload);

      expect(second).toEqual({ dataRequestId: first.dataRequestId, jobId: first.jobId, duplicate: true });
      expect(storage.dataRequests).toHaveLength(1);
      expect(storage.jobs).toHaveLength(1);
    });

    it("does not queue again once exported", async () => {
      const first = await handleCustomersDataRequest(deps, TEST_SHOP, payload);
      await runDataExport(deps, first.dataRequestId);

      const again = await handleCustomersDataRequest(deps, TEST_SHOP, payload);
      expect(again).toEqual({ dataRequestId: first.dataRequestId, jobId: null, duplicate: true });
    });

    it("exports the customer's orders with their line items", async () => {
      const ack = await handleCustomersDataRequest(deps, TEST_SHOP, payload);
      const result = await runDataExport(deps, ack.dataRequestId);

      expect(result).toEqual({ orders: 1, delivered: true });
      expect(transport.deliveries).toHaveLength(1);
      const delivery = transport.deliveries[0];
      expect(delivery).toMatchObject({ shopDomain: TEST_SHOP, remoteRequestId: "9001", customerRemoteId: "42" });

      expect(storage.dataRequests[0].snapshotJson).toBe(delivery.snapshot);
      expect(delivery.snapshot).toMatchObject({
        shopDomain: TEST_SHOP,
        dataRequestId: "9001",
        customer: { id: "42", email: "ana@example.com" },
        generatedAt: "2024-05-01T12:00:00.000Z",
        orders: [{ remoteId: "101", orderNumber: "#101", lineItems: [{ remoteId: "1", quantity: 2 }, { remoteId: "2", quantity: 2 }] }],
      });
      expect(storage.dataRequests[0].status).toBe("exported");
    });

    it("does nothing for a request erased before its export ran", async () => {
      expect(await runDataExport(deps, "missing")).toEqual({ orders: 0, delivered: false });
      expect(transport.deliveries).toHaveLength(0);
    });
  });

  describe("customers/redact", () => {
    it("removes the customer's orders, line items and requests only", async () => {
      await handleCustomersDataRequest(deps, TEST_SHOP, customersDataRequestSchema.parse({
        customer: { id: 42 },
        data_request: { id: 9001 },
      }));

      const summary = await handleCustomersRedact(deps, TEST_SHOP, customersRedactSchema.parse({
        shop_domain: TEST_SHOP,
        customer: { id: 42, email: "ana@example.com" },
        orders_to_redact: [101],
      }));

      expect(summary).toEqual({ shopDomain: TEST_SHOP, orders: 1, lineItems: 2, dataRequests: 1, exportJobs: 1 });
      expect((await storage.listOrders(TEST_SHOP)).map((o) => o.remoteId)).toEqual(["102"]);
      expect((await storage.listLineItems(TEST_SHOP)).map((li) => li.orderRemoteId)).toEqual(["102"]);
      expect(await storage.listOrders(OTHER_SHOP)).toHaveLength(1);
      expect(storage.jobs).toHaveLength(0);
    });

    it("matches orders by email when the customer id is unknown", async () => {
      const summary = await handleCustomersRedact(deps, TEST_SHOP, customersRedactSchema.parse({
        customer: { email: "BO@example.com" },
      }));
      expect(summary.orders).toBe(1);
      expect((await storage.listOrders(TEST_SHOP)).map((o) => o.remoteId)).toEqual(["101"]);
    });

    it("succeeds when nothing is held for the customer", async () => {
      const summary = await handleCustomersRedact(deps, TEST_SHOP, customersRedactSchema.parse({ customer: { id: 77 } }));
      expect(summary).toEqual({ shopDomain: TEST_SHOP, orders: 0, lineItems: 0, dataRequests: 0, exportJobs: 0 });
    });
  });

  describe("shop/redact", () => {
    it("erases every row of the shop and its credential", async () => {
      expect(await storage.countShopEntities(TEST_SHOP)).toMatchObject({ products: 3, variants: 3, orders: 2, lineItems: 3 });

      const summary = await handleShopRedact(deps, TEST_SHOP);

      expect(summary.deleted).toMatchObject({ products: 3, productVariants: 3, orders: 2, orderLineItems: 3, shops: 1 });
      expect(await storage.countShopEntities(TEST_SHOP)).toEqual({
        products: 0,
        variants: 0,
        orders: 0,
        lineItems: 0,
        inventoryLevels: 0,
        webhookReceipts: 0,
      });
      expect(await storage.getShop(TEST_SHOP)).toBeUndefined();
      expect(await storage.getShop(OTHER_SHOP)).toBeDefined();
      expect(await storage.countShopEntities(OTHER_SHOP)).toMatchObject({ products: 1, variants: 1, orders: 1, lineItems: 1 });
    });

    it("succeeds again on an erased shop", async () => {
      await handleShopRedact(deps, TEST_SHOP);
      const again = await handleShopRedact(deps, TEST_SHOP);
      expect(Object.values(again.deleted).every((count) => count === 0)).toBe(true);
    });
  });
});
