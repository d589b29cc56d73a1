import { createHmac, timingSafeEqual } from 'crypto';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

function sortKeys(value: unknown): Canonical {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry);
      }
    }
    return sorted;
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Canonical byte encoding used for signing: JSON with object keys sorted
 * at every depth, no whitespace, undefined members omitted.
 */
export function canonicalize(payload: unknown): string {
  return JSON.stringify(sortKeys(payload));
}

/**
 * HMAC-SHA256 over the canonical encoding, hex-encoded.
 */
export function computeSignature(payload: unknown, secret: string): string {
  return createHmac('sha256', secret).update(canonicalize(payload)).digest('hex');
}

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/i;

/**
 * Accepts only a 64-character hex HMAC-SHA256 that matches the payload.
 */
export function verifySignature(payload: unknown, signature: string, secret: string): boolean {
  if (!SIGNATURE_PATTERN.test(signature)) {
    return false;
  }
  const expected = Buffer.from(computeSignature(payload, secret), 'hex');
  return timingSafeEqual(expected, Buffer.from(signature, 'hex'));
}

/**
 * Length-independent constant-time string comparison for secrets and tokens.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  const left = createHmac('sha256', 'constant-time-compare').update(a).digest();
  const right = createHmac('sha256', 'constant-time-compare').update(b).digest();
  return timingSafeEqual(left, right);
}
