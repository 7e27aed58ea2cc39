/**
 * Opaque access token helpers for external reviewers
 *
 * @module utils/token
 */

import crypto from 'crypto';

/**
 * Generate a URL-safe random token
 */
export function randomToken(bytes = 32): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Compare two tokens without leaking where they differ
 */
export function constantTimeEqual(a: string, b: string): boolean {
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return crypto.timingSafeEqual(aBuf, bBuf);
}

/**
 * Shorten a token for log output
 */
export function maskToken(token: string): string {
  return token.length <= 8 ? '***' : `${token.slice(0, 4)}...${token.slice(-2)}`;
}
