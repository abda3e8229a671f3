/**
 * Error taxonomy of the Shopify integration.
 *
 * Every error carries a stable `code` (returned to API clients) and the HTTP
 * status the request path answers with.
 */

export type IntegrationErrorCode =
  | "INVALID_TENANT"
  | "INVALID_STATE"
  | "TOKEN_EXCHANGE_FAILED"
  | "SIGNATURE_ERROR"
  | "TENANT_NOT_FOUND"
  | "SYNC_FAILED"
  | "CONCURRENT_SYNC_REJECTED"
  | "UNKNOWN_TOPIC"
  | "INVALID_PAYLOAD"
  | "SHOPIFY_API_ERROR";

export class IntegrationError extends Error {
  constructor(
    message: string,
    public readonly code: IntegrationErrorCode,
    public readonly status: number
  ) {
    super(message);
    this.name = "IntegrationError";
  }
}

export class InvalidTenant extends IntegrationError {
  constructor(message = "Invalid shop domain") {
    super(message, "INVALID_TENANT", 400);
    this.name = "InvalidTenant";
  }
}

export class InvalidState extends IntegrationError {
  constructor(message = "Invalid or expired OAuth state") {
    super(message, "INVALID_STATE", 400);
    this.name = "InvalidState";
  }
}

export class TokenExchangeFailed extends IntegrationError {
  constructor(message = "Failed to exchange authorization code") {
    super(message, "TOKEN_EXCHANGE_FAILED", 502);
    this.name = "TokenExchangeFailed";
  }
}

export class SignatureError extends IntegrationError {
  constructor(public readonly reason: string) {
    super("Invalid signature", "SIGNATURE_ERROR", 401);
    this.name = "SignatureError";
  }
}

export class TenantNotFound extends IntegrationError {
  constructor(public readonly shopDomain: string) {
    super("Shop not found", "TENANT_NOT_FOUND", 404);
    this.name = "TenantNotFound";
  }
}

export class SyncFailed extends IntegrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SYNC_FAILED", 502);
    this.name = "SyncFailed";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConcurrentSyncRejected extends IntegrationError {
  constructor(shopDomain: string, resourceKind: string) {
    super(`A ${resourceKind} sync is already in flight for ${shopDomain}`, "CONCURRENT_SYNC_REJECTED", 409);
    this.name = "ConcurrentSyncRejected";
  }
}

export class UnknownTopic extends IntegrationError {
  constructor(public readonly topic: string) {
    super(`Unknown webhook topic: ${topic}`, "UNKNOWN_TOPIC", 404);
    this.name = "UnknownTopic";
  }
}

export class InvalidPayload extends IntegrationError {
  constructor(message = "Invalid payload") {
    super(message, "INVALID_PAYLOAD", 400);
    this.name = "InvalidPayload";
  }
}

/** Transport-level failure of a call to the Admin API. */
export class ShopifyApiError extends IntegrationError {
  constructor(
    message: string,
    public readonly upstreamStatus: number | null,
    public readonly retryAfterMs: number | null = null,
    public readonly transient: boolean = false
  ) {
    super(message, "SHOPIFY_API_ERROR", 502);
    this.name = "ShopifyApiError";
  }
}

export function isIntegrationError(error: unknown): error is IntegrationError {
  return error instanceof IntegrationError;
}
