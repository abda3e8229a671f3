import type { Express, Request, Response } from "express";
import { createShopifyRouter, type ShopifyRouteDeps } from "./integrations/shopify/routes";

export function registerRoutes(app: Express, deps: ShopifyRouteDeps): void {
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use(createShopifyRouter(deps));

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });
}
