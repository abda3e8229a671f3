import crypto from "crypto";
import { RESOURCE_KINDS, type BackgroundJob, type ResourceKind } from "@shared/schema";
import type { IStorage } from "../../storage";
import type { JobQueue } from "../../jobs";
import {
  ConcurrentSyncRejected, InvalidPayload, SyncFailed, TenantNotFound,
} from "./errors";
import type { z } from "zod";
import type { PageOptions, ShopifyClient, ShopifyClientFactory, ShopifyPage } from "./shopifyClient";
import { storeInventoryLevel, storeOrder, storeProduct } from "./syncStore";
import {
  shopifyInventoryLevelsResponseSchema,
  shopifyOrdersResponseSchema,
  shopifyProductsResponseSchema,
} from "./types";

const PAGE_LIMIT = 250;
// Admin API accepts at most 50 location ids per inventory_levels request
const LOCATIONS_PER_REQUEST = 50;

export interface SyncEngineOptions {
  leaseMs: number;
  now?: () => Date;
  newHolderId?: () => string;
}

export interface SyncEngineDeps {
  storage: IStorage;
  clientFactory: ShopifyClientFactory;
  queue: JobQueue;
  options: SyncEngineOptions;
}

export interface SyncSummary {
  shopDomain: string;
  resourceKind: ResourceKind;
  pages: number;
  itemsUpserted: number;
  itemsStale: number;
  lineItemsRemoved: number;
  variantsRemoved: number;
  startedAt: string;
  finishedAt: string;
}

interface PageTally {
  upserted: number;
  stale: number;
  lineItemsRemoved: number;
  variantsRemoved: number;
}

const emptyTally = (): PageTally => ({ upserted: 0, stale: 0, lineItemsRemoved: 0, variantsRemoved: 0 });

/** Hooks a collection walk calls around each page. */
interface PageRun {
  /** Passed to every page fetch; renews the lease ahead of retry waits. */
  fetch: PageOptions;
  /** Renews the lease before a fetched page is written. */
  beforeWrite: () => Promise<void>;
  /** Records a written page and renews the lease. */
  committed: (tally: PageTally) => Promise<void>;
}

export function isResourceKind(value: unknown): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}

export function syncDedupeKey(shopDomain: string, kind: ResourceKind): string {
  return `sync:${shopDomain}:${kind}`;
}

export class SyncEngine {
  private readonly storage: IStorage;
  private readonly clientFactory: ShopifyClientFactory;
  private readonly queue: JobQueue;
  private readonly options: SyncEngineOptions;

  constructor(deps: SyncEngineDeps) {
    this.storage = deps.storage;
    this.clientFactory = deps.clientFactory;
    this.queue = deps.queue;
    this.options = deps.options;
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  private leaseExpiry(extraMs = 0): Date {
    return new Date(this.now().getTime() + extraMs + this.options.leaseMs);
  }

  /**
   * API entry point: validates the shop and queues a sync job. A live lease or
   * an active job for the same (shop, kind) rejects the request.
   */
  async requestSyncResource(shopDomain: string, kind: unknown): Promise<BackgroundJob> {
    if (!isResourceKind(kind)) {
      throw new InvalidPayload(`Unknown resource kind: ${String(kind)}`);
    }
    const shop = await this.storage.getShop(shopDomain);
    if (!shop) {
      throw new TenantNotFound(shopDomain);
    }

    const lease = await this.storage.getSyncLease(shopDomain, kind);
    if (lease && lease.expiresAt.getTime() > this.now().getTime()) {
      throw new ConcurrentSyncRejected(shopDomain, kind);
    }

    const { job, created } = await this.queue.enqueue("sync", shopDomain, syncDedupeKey(shopDomain, kind), {
      shopDomain,
      resourceKind: kind,
    });
    if (!created) {
      throw new ConcurrentSyncRejected(shopDomain, kind);
    }
    return job;
  }

  /**
   * Pages through one collection and upserts every item. Holds the
   * (shop, kind) lease for the whole run: it is renewed before and after each
   * page write and extended past every retry wait, and a failed renewal stops
   * the run before anything more is written.
   */
  async syncResource(
    shopDomain: string,
    kind: unknown,
    opts: { signal?: AbortSignal } = {}
  ): Promise<SyncSummary> {
    if (!isResourceKind(kind)) {
      throw new InvalidPayload(`Unknown resource kind: ${String(kind)}`);
    }
    const shop = await this.storage.getShop(shopDomain);
    if (!shop) {
      throw new TenantNotFound(shopDomain);
    }

    const holder = this.options.newHolderId?.() ?? crypto.randomUUID();
    const startedAt = this.now();
    const acquired = await this.storage.acquireSyncLease(shopDomain, kind, holder, this.leaseExpiry(), startedAt);
    if (!acquired) {
      console.log(`[Sync] ${kind} sync for ${shopDomain} rejected: lease held`);
      throw new ConcurrentSyncRejected(shopDomain, kind);
    }

    const summary: SyncSummary = {
      shopDomain,
      resourceKind: kind,
      pages: 0,
      itemsUpserted: 0,
      itemsStale: 0,
      lineItemsRemoved: 0,
      variantsRemoved: 0,
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
    };

    console.log(`[Sync] Starting ${kind} sync for ${shopDomain}`);
    try {
      const client = this.clientFactory(shop);
      const renew = async (extraMs = 0) => {
        const renewed = await this.storage.renewSyncLease(shopDomain, kind, holder, this.leaseExpiry(extraMs));
        if (!renewed) {
          throw new SyncFailed(`Lost the ${kind} lease for ${shopDomain}`);
        }
      };
      const run: PageRun = {
        fetch: { signal: opts.signal, beforeRetryWait: (waitMs) => renew(waitMs) },
        beforeWrite: () => renew(),
        committed: async (tally) => {
          summary.pages += 1;
          summary.itemsUpserted += tally.upserted;
          summary.itemsStale += tally.stale;
          summary.lineItemsRemoved += tally.lineItemsRemoved;
          summary.variantsRemoved += tally.variantsRemoved;
          await renew();
        },
      };

      switch (kind) {
        case "products":
          await this.syncProducts(client, shopDomain, run);
          break;
        case "orders":
          await this.syncOrders(client, shopDomain, run);
          break;
        case "inventory":
          await this.syncInventory(client, shopDomain, run);
          break;
      }
    } catch (error) {
      console.error(
        `[Sync] ${kind} sync for ${shopDomain} stopped after ${summary.pages} committed page(s):`,
        error instanceof Error ? error.message : error
      );
      throw error;
    } finally {
      await this.storage.releaseSyncLease(shopDomain, kind, holder);
    }

    summary.finishedAt = this.now().toISOString();
    console.log(
      `[Sync] ${kind} sync for ${shopDomain} done: ${summary.pages} page(s), ` +
      `${summary.itemsUpserted} upserted, ${summary.itemsStale} stale, ` +
      `${summary.lineItemsRemoved} line items and ${summary.variantsRemoved} variants removed`
    );
    return summary;
  }

  private async syncProducts(client: ShopifyClient, shopDomain: string, run: PageRun): Promise<void> {
    let path: string | null = `/products.json?limit=${PAGE_LIMIT}`;
    while (path) {
      run.fetch.signal?.throwIfAborted();
      const page: ShopifyPage<z.infer<typeof shopifyProductsResponseSchema>> = await client.getPage(path, shopifyProductsResponseSchema, run.fetch);
      await run.beforeWrite();
      const tally = emptyTally();
      for (const product of page.data.products) {
        const stored = await storeProduct(this.storage, shopDomain, product, this.now());
        if (stored.outcome === "written") tally.upserted++;
        else tally.stale++;
        tally.variantsRemoved += stored.variantsRemoved;
      }
      await run.committed(tally);
      path = page.nextPath;
    }
  }

  private async syncOrders(client: ShopifyClient, shopDomain: string, run: PageRun): Promise<void> {
    let path: string | null = `/orders.json?limit=${PAGE_LIMIT}&status=any`;
    while (path) {
      run.fetch.signal?.throwIfAborted();
      const page: ShopifyPage<z.infer<typeof shopifyOrdersResponseSchema>> = await client.getPage(path, shopifyOrdersResponseSchema, run.fetch);
      await run.beforeWrite();
      const tally = emptyTally();
      for (const order of page.data.orders) {
        const stored = await storeOrder(this.storage, shopDomain, order, this.now());
        if (stored.outcome === "written") tally.upserted++;
        else tally.stale++;
        tally.lineItemsRemoved += stored.lineItemsRemoved;
      }
      await run.committed(tally);
      path = page.nextPath;
    }
  }

  private async syncInventory(client: ShopifyClient, shopDomain: string, run: PageRun): Promise<void> {
    const locations = await client.getLocations(run.fetch);
    const locationIds = locations.map((location) => location.id);

    for (let i = 0; i < locationIds.length; i += LOCATIONS_PER_REQUEST) {
      const batch = locationIds.slice(i, i + LOCATIONS_PER_REQUEST).join(",");
      let path: string | null = `/inventory_levels.json?location_ids=${batch}&limit=${PAGE_LIMIT}`;
      while (path) {
        run.fetch.signal?.throwIfAborted();
        const page: ShopifyPage<z.infer<typeof shopifyInventoryLevelsResponseSchema>> = await client.getPage(path, shopifyInventoryLevelsResponseSchema, run.fetch);
        await run.beforeWrite();
        const tally = emptyTally();
        for (const level of page.data.inventory_levels) {
          const outcome = await storeInventoryLevel(this.storage, shopDomain, level, this.now());
          if (outcome === "written") tally.upserted++;
          else tally.stale++;
        }
        await run.committed(tally);
        path = page.nextPath;
      }
    }
  }
}
