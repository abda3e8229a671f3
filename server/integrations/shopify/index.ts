// Shopify integration
// OAuth install, signed webhooks with compliance handling, and lease-locked resource sync

export * from "./errors";
export { encrypt, decrypt } from "./credentials";
export {
  ShopifyClient,
  createShopifyClientFactory,
  parseNextLink,
  parseRetryAfter,
  type ShopifyClientFactory,
} from "./shopifyClient";
export {
  initiateOAuth,
  handleOAuthCallback,
  verifyOAuthQuery,
  normalizeShopDomain,
  registerComplianceWebhooks,
  type OAuthDeps,
} from "./oauth";
export { signWebhookBody, verifyWebhookSignature } from "./webhookVerifier";
export { handleShopifyWebhook, WEBHOOK_TOPICS, type WebhookDeps } from "./webhookHandler";
export {
  handleCustomersDataRequest,
  handleCustomersRedact,
  handleShopRedact,
  runDataExport,
  type ComplianceDeps,
} from "./compliance";
export { SyncEngine, type SyncSummary } from "./syncEngine";
export { createJobHandlers, createMaintenanceTask, isRetryableJobError } from "./jobHandlers";
export { createShopifyRouter, type ShopifyRouteDeps } from "./routes";
