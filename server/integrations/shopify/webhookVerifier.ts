import crypto from "crypto";

export type WebhookRejectionReason =
  | "missing_signature"
  | "empty_body"
  | "malformed_signature"
  | "mismatch";

export type WebhookVerification =
  | { accepted: true }
  | { accepted: false; reason: WebhookRejectionReason };

const SHA256_BYTES = 32;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export function signWebhookBody(secret: string, body: Buffer | string): string {
  return crypto.createHmac("sha256", secret).update(body).digest("base64");
}

/**
 * Verifies the `X-Shopify-Hmac-Sha256` header against the exact request bytes.
 *
 * The header must be the canonical base64 encoding of a SHA-256 digest; any
 * other encoding is rejected before the constant-time comparison.
 */
export function verifyWebhookSignature(
  secret: string,
  rawBody: Buffer | undefined,
  providedSignature: string | undefined
): WebhookVerification {
  if (!providedSignature) {
    return { accepted: false, reason: "missing_signature" };
  }
  if (!rawBody || rawBody.length === 0) {
    return { accepted: false, reason: "empty_body" };
  }

  const signature = providedSignature.trim();
  if (!BASE64_PATTERN.test(signature)) {
    return { accepted: false, reason: "malformed_signature" };
  }
  const provided = Buffer.from(signature, "base64");
  if (provided.length !== SHA256_BYTES || provided.toString("base64") !== signature) {
    return { accepted: false, reason: "malformed_signature" };
  }

  const expected = crypto.createHmac("sha256", secret).update(rawBody).digest();
  if (!crypto.timingSafeEqual(expected, provided)) {
    return { accepted: false, reason: "mismatch" };
  }
  return { accepted: true };
}
