import { createHmac, timingSafeEqual } from 'node:crypto';

const SIGNATURE_PREFIX = 'sha256=';
const HEX_RE = /^[0-9a-f]+$/i;

/** Computes the `sha256=<hex>` signature GitHub sends for `body`. */
export function signPayload(body: Buffer | string, secret: string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Verifies an `X-Hub-Signature-256` header against the raw request body.
 *
 * The digest comparison is constant-time. Malformed headers (missing
 * prefix, non-hex digest, wrong length) yield `false`; this never throws.
 */
export function verifySignature(
  body: Buffer,
  header: string | undefined,
  secret: string,
): boolean {
  if (header === undefined || !header.startsWith(SIGNATURE_PREFIX)) return false;

  const hex = header.slice(SIGNATURE_PREFIX.length);
  if (hex.length === 0 || hex.length % 2 !== 0 || !HEX_RE.test(hex)) return false;

  const received = Buffer.from(hex, 'hex');
  const expected = createHmac('sha256', secret).update(body).digest();

  // timingSafeEqual throws on length mismatch
  if (received.length !== expected.length) return false;

  return timingSafeEqual(received, expected);
}
