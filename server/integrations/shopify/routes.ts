import { Router, type Request, type Response } from "express";
import type { AppConfig } from "../../config";
import type { IStorage } from "../../storage";
import type { JobQueue } from "../../jobs";
import { escapeHtml } from "../../html";
import { InvalidPayload, InvalidState, IntegrationError, TenantNotFound } from "./errors";
import { handleOAuthCallback, initiateOAuth, normalizeShopDomain, verifyOAuthQuery, type OAuthDeps } from "./oauth";
import { isResourceKind, syncDedupeKey, type SyncEngine } from "./syncEngine";
import { handleShopifyWebhook, type WebhookDeps } from "./webhookHandler";
import { RESOURCE_KINDS } from "@shared/schema";

export interface ShopifyRouteDeps {
  storage: IStorage;
  config: Pick<AppConfig, "shopify">;
  oauth: OAuthDeps;
  webhooks: WebhookDeps;
  engine: SyncEngine;
  queue: JobQueue;
}

function queryValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function page(title: string, body: string): string {
  return `<!doctype html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>` +
    `<body><h1>${escapeHtml(title)}</h1>${body}</body></html>`;
}

function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof IntegrationError) {
    return res.status(error.status).json({ error: error.message, code: error.code });
  }
  console.error(`${context}:`, error);
  return res.status(500).json({ error: "Internal server error" });
}

function wantsJson(req: Request): boolean {
  return req.accepts(["html", "json"]) === "json";
}

export function createShopifyRouter(deps: ShopifyRouteDeps): Router {
  const router = Router();
  const suffix = deps.config.shopify.shopDomainSuffix;

  // ==========================================
  // OAuth
  // ==========================================

  router.get("/auth", async (req: Request, res: Response) => {
    try {
      const shopInput = req.query.tenant ?? req.query.shop;
      const { redirectUrl } = await initiateOAuth(deps.oauth, shopInput);
      return res.redirect(302, redirectUrl);
    } catch (error) {
      return sendError(res, error, "[Shopify OAuth] Authorize error");
    }
  });

  router.get("/auth/callback", async (req: Request, res: Response) => {
    const oauthError = queryValue(req.query.error);
    if (oauthError) {
      console.error(`[Shopify OAuth] Error from Shopify: ${oauthError} - ${queryValue(req.query.error_description) ?? ""}`);
      return res.redirect(`/auth/error?reason=${encodeURIComponent(oauthError)}`);
    }

    try {
      if (!verifyOAuthQuery(req.query, deps.config.shopify.apiSecret)) {
        console.error("[Shopify OAuth] HMAC verification failed");
        throw new InvalidState("Invalid callback signature");
      }
      const { shop } = await handleOAuthCallback(
        deps.oauth,
        req.query.tenant ?? req.query.shop,
        req.query.state,
        req.query.code
      );
      if (wantsJson(req)) {
        return res.json({ success: true, shop: shop.shopDomain, scope: shop.scope });
      }
      return res.redirect(`/auth/success?shop=${encodeURIComponent(shop.shopDomain)}`);
    } catch (error) {
      if (!(error instanceof IntegrationError)) {
        console.error("[Shopify OAuth] Callback error:", error);
      }
      const code = error instanceof IntegrationError ? error.code : "INTERNAL_ERROR";
      if (wantsJson(req)) {
        const message = error instanceof IntegrationError ? error.message : "Internal server error";
        return res.status(error instanceof IntegrationError ? 400 : 500).json({ error: message, code });
      }
      return res.redirect(`/auth/error?reason=${encodeURIComponent(code)}`);
    }
  });

  router.get("/auth/error", (req: Request, res: Response) => {
    const reason = queryValue(req.query.reason) ?? "unknown";
    res.status(400).type("html").send(
      page("Installation failed", `<p>The app could not be installed (${escapeHtml(reason)}). Please start the installation again.</p>`)
    );
  });

  router.get("/auth/success", (req: Request, res: Response) => {
    const shop = queryValue(req.query.shop) ?? "";
    res.type("html").send(
      page("App installed", `<p>The app is now connected to <strong>${escapeHtml(shop)}</strong>.</p>`)
    );
  });

  // ==========================================
  // Webhooks (raw body, verified before parsing)
  // ==========================================

  router.post("/webhooks/:resource/:event", async (req: Request, res: Response) => {
    const topic = `${req.params.resource}/${req.params.event}`;
    try {
      const result = await handleShopifyWebhook(deps.webhooks, {
        topic,
        rawBody: Buffer.isBuffer(req.body) ? req.body : undefined,
        hmac: req.get("X-Shopify-Hmac-Sha256"),
        shopDomain: req.get("X-Shopify-Shop-Domain"),
        webhookId: req.get("X-Shopify-Webhook-Id"),
      });
      return res.status(200).json({ success: true, duplicate: result.duplicate, ignored: result.ignored });
    } catch (error) {
      return sendError(res, error, `[Shopify Webhook] Error handling ${topic}`);
    }
  });

  // ==========================================
  // Sync API
  // ==========================================

  router.post("/api/sync/:resource", async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const tenant = typeof body === "object" && body !== null && "tenant" in body ? body.tenant : undefined;
      const shopDomain = normalizeShopDomain(tenant, suffix);
      const job = await deps.engine.requestSyncResource(shopDomain, req.params.resource);
      return res.status(202).json({ jobId: job.id, status: job.status });
    } catch (error) {
      return sendError(res, error, "[Sync] Request error");
    }
  });

  router.get("/api/shops/:shop/status", async (req: Request, res: Response) => {
    try {
      const shopDomain = normalizeShopDomain(req.params.shop, suffix);
      const shop = await deps.storage.getShop(shopDomain);
      if (!shop) {
        throw new TenantNotFound(shopDomain);
      }
      const counts = await deps.storage.countShopEntities(shopDomain);
      const leases = await deps.storage.listSyncLeases(shopDomain);
      const activeJobs: Array<{ id: string; resourceKind: string; status: string }> = [];
      for (const kind of RESOURCE_KINDS) {
        const job = await deps.queue.findActive(syncDedupeKey(shopDomain, kind));
        if (job) activeJobs.push({ id: job.id, resourceKind: kind, status: job.status });
      }

      return res.json({
        shopDomain,
        scope: shop.scope,
        installedAt: shop.installedAt,
        tokenRefreshedAt: shop.tokenRefreshedAt,
        counts,
        leases: leases.map((l) => ({ resourceKind: l.resourceKind, expiresAt: l.expiresAt })),
        activeJobs,
      });
    } catch (error) {
      return sendError(res, error, "[Sync] Status error");
    }
  });

  router.get("/api/jobs/:id", async (req: Request, res: Response) => {
    try {
      const job = await deps.queue.get(req.params.id);
      if (!job) {
        return res.status(404).json({ error: "Job not found" });
      }
      return res.json({
        id: job.id,
        kind: job.kind,
        shopDomain: job.shopDomain,
        status: job.status,
        attempts: job.attempts,
        maxAttempts: job.maxAttempts,
        runAt: job.runAt,
        lastError: job.lastErrorMessage,
        result: job.resultJson,
      });
    } catch (error) {
      return sendError(res, error, "[Jobs] Lookup error");
    }
  });

  router.get("/api/:resource", async (req: Request, res: Response) => {
    try {
      const kind = req.params.resource;
      if (!isResourceKind(kind)) {
        throw new InvalidPayload(`Unknown resource: ${kind}`);
      }
      const shopDomain = normalizeShopDomain(req.query.tenant ?? req.query.shop, suffix);
      const shop = await deps.storage.getShop(shopDomain);
      if (!shop) {
        throw new TenantNotFound(shopDomain);
      }

      switch (kind) {
        case "products": {
          const products = await deps.storage.listProducts(shopDomain);
          const variants = await deps.storage.listVariants(shopDomain);
          return res.json({
            products: products.map((product) => ({
              ...product,
              variants: variants.filter((variant) => variant.productRemoteId === product.remoteId),
            })),
          });
        }
        case "orders": {
          const orders = await deps.storage.listOrders(shopDomain);
          const lineItems = await deps.storage.listLineItems(shopDomain);
          return res.json({
            orders: orders.map((order) => ({
              ...order,
              lineItems: lineItems.filter((item) => item.orderRemoteId === order.remoteId),
            })),
          });
        }
        case "inventory": {
          const inventoryLevels = await deps.storage.listInventoryLevels(shopDomain);
          return res.json({ inventoryLevels });
        }
      }
    } catch (error) {
      return sendError(res, error, "[Sync] List error");
    }
  });

  return router;
}
