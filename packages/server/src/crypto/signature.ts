import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * JSON value accepted by the canonical serializer
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue | undefined };

/**
 * HMAC-SHA256 over the UTF-8 bytes of `message`, base64-encoded
 */
export function signMessage(secret: string, message: string): string {
  return createHmac('sha256', secret).update(message, 'utf8').digest('base64');
}

/**
 * Serialize with recursively sorted object keys and no whitespace
 * Array order is preserved; undefined object members are dropped
 */
export function canonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const members = Object.keys(value)
    .sort()
    .flatMap((key) => {
      const member = value[key];
      return member === undefined ? [] : [`${JSON.stringify(key)}:${canonicalJson(member)}`];
    });

  return `{${members.join(',')}}`;
}

/**
 * Serialize a payload once and sign exactly those bytes
 * The returned `body` is what must be transmitted
 */
export function signJson(secret: string, payload: JsonValue): { body: string; signature: string } {
  const body = canonicalJson(payload);
  return { body, signature: signMessage(secret, body) };
}

/**
 * Identity-timestamp message: `{appId}_{timestampMillis}`
 */
export function identityTimestampMessage(appId: string, timestamp: number | string): string {
  return `${appId}_${timestamp}`;
}

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  return timingSafeEqual(bufA, bufB);
}

/**
 * Verify a base64 HMAC-SHA256 signature over `message`
 */
export function verifySignature(secret: string, message: string, signature: string): boolean {
  return constantTimeCompare(signMessage(secret, message), signature);
}
