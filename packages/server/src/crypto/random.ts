import { randomBytes } from 'node:crypto';
import { NONCE_CHARSET, NONCE_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '');
}

/**
 * Generate an alphanumeric nonce for the X-CK-Nonce header
 */
export function generateNonce(length: number = NONCE_LENGTH): string {
  const bytes = randomBytes(length);
  let nonce = '';

  for (let i = 0; i < length; i++) {
    const index = (bytes[i] ?? 0) % NONCE_CHARSET.length;
    nonce += NONCE_CHARSET[index];
  }

  return nonce;
}
