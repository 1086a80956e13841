import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';

/**
 * AES-256-GCM sealing of the credentials file contents
 *
 * Sealed format: `v1.` + base64(salt | iv | authTag | ciphertext). The key is
 * derived from the configured ENCRYPTION_KEY with scrypt and a per-write salt.
 */

const SEALED_PREFIX = 'v1.';
const SALT_BYTES = 16;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const HEADER_BYTES = SALT_BYTES + IV_BYTES + TAG_BYTES;

export interface SealOptions {
  // Bound into the auth tag; unsealing with different data fails
  associatedData?: string;
}

export function seal(plaintext: string, key: string, options: SealOptions = {}): string {
  const salt = randomBytes(SALT_BYTES);
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv('aes-256-gcm', scryptSync(key, salt, 32), iv);
  if (options.associatedData) {
    cipher.setAAD(Buffer.from(options.associatedData, 'utf8'));
  }

  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const packed = Buffer.concat([salt, iv, cipher.getAuthTag(), ciphertext]);
  return `${SEALED_PREFIX}${packed.toString('base64')}`;
}

/**
 * Throws on a wrong key, other associated data or tampered input
 */
export function unseal(sealed: string, key: string, options: SealOptions = {}): string {
  if (!sealed.startsWith(SEALED_PREFIX)) {
    throw new Error('Unsupported sealed format');
  }

  const packed = Buffer.from(sealed.slice(SEALED_PREFIX.length), 'base64');
  if (packed.length < HEADER_BYTES) {
    throw new Error('Sealed payload is too short');
  }

  const salt = packed.subarray(0, SALT_BYTES);
  const iv = packed.subarray(SALT_BYTES, SALT_BYTES + IV_BYTES);
  const tag = packed.subarray(SALT_BYTES + IV_BYTES, HEADER_BYTES);

  const decipher = createDecipheriv('aes-256-gcm', scryptSync(key, salt, 32), iv);
  decipher.setAuthTag(tag);
  if (options.associatedData) {
    decipher.setAAD(Buffer.from(options.associatedData, 'utf8'));
  }

  return Buffer.concat([decipher.update(packed.subarray(HEADER_BYTES)), decipher.final()]).toString('utf8');
}
