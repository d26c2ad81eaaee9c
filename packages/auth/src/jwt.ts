import { z } from 'zod';
import type { IdTokenClaims } from './types.js';

const claimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().min(1),
  aud: z.union([z.string().min(1), z.array(z.string().min(1))]),
  exp: z.number().int().positive(),
  iat: z.number().int().positive().optional(),
  email: z.string().optional()
});

function fromBase64Url(input: string): Buffer {
  return Buffer.from(input, 'base64url');
}

/**
 * Read the claims of an id_token without verifying its signature.
 * The database verifies the token; this is only used for diagnostics.
 * Returns null when the token is not a well-formed JWT.
 */
export function decodeIdTokenClaims(token: string): IdTokenClaims | null {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return null;
  }

  const [, payloadPart] = parts;
  if (!payloadPart) {
    return null;
  }

  let rawPayload: unknown;
  try {
    rawPayload = JSON.parse(fromBase64Url(payloadPart).toString('utf8'));
  } catch {
    return null;
  }

  const claims = claimsSchema.safeParse(rawPayload);
  return claims.success ? claims.data : null;
}

export function isExpired(claims: IdTokenClaims, now: Date = new Date()): boolean {
  return claims.exp <= Math.floor(now.getTime() / 1000);
}
