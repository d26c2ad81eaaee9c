import { describe, expect, it } from 'vitest';
import { decodeIdTokenClaims, isExpired } from '../src/jwt.js';

function unsignedJwt(payload: Record<string, unknown>): string {
  const header = Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT' })).toString('base64url');
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  return `${header}.${body}.c2lnbmF0dXJl`;
}

describe('decodeIdTokenClaims', () => {
  it('reads subject, issuer, audience and expiry', () => {
    const token = unsignedJwt({
      sub: 'user-1',
      iss: 'https://idp.example.test',
      aud: 'test-client',
      exp: 1_900_000_000,
      iat: 1_899_996_400
    });

    expect(decodeIdTokenClaims(token)).toEqual({
      sub: 'user-1',
      iss: 'https://idp.example.test',
      aud: 'test-client',
      exp: 1_900_000_000,
      iat: 1_899_996_400
    });
  });

  it('returns null for a token that is not a JWT', () => {
    expect(decodeIdTokenClaims('bogus')).toBeNull();
    expect(decodeIdTokenClaims('a.%%%.c')).toBeNull();
  });

  it('returns null when required claims are missing', () => {
    expect(decodeIdTokenClaims(unsignedJwt({ sub: 'user-1' }))).toBeNull();
  });
});

describe('isExpired', () => {
  const claims = { sub: 'u', iss: 'i', aud: 'a', exp: 1_800_000_000 };

  it('is false before exp', () => {
    expect(isExpired(claims, new Date(1_799_999_999_000))).toBe(false);
  });

  it('is true at or after exp', () => {
    expect(isExpired(claims, new Date(1_800_000_000_000))).toBe(true);
  });
});
