import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { registerRoutes } from "./routes";
import type { ShopifyRouteDeps } from "./integrations/shopify/routes";

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function createApp(deps: ShopifyRouteDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  // Webhook signatures cover the exact bytes, so those bodies stay raw
  app.use("/webhooks", express.raw({ type: () => true, limit: "2mb" }));
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api") || req.path.startsWith("/webhooks") || req.path.startsWith("/auth")) {
        console.log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  registerRoutes(app, deps);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    if (status >= 500) {
      console.error("Unhandled error:", err);
    }
    res.status(status).json({ error: status >= 500 ? "Internal server error" : "Bad request" });
  });

  return app;
}
