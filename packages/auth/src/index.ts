export { IdentityProviderError } from './errors.js';
export { decodeIdTokenClaims, isExpired } from './jwt.js';
export { encodeGrant, requestIdToken } from './token.js';
export {
  DEFAULT_SCOPE,
  type ClientCredentials,
  type FetchLike,
  type IdTokenClaims,
  type IdTokenResponse,
  type TokenGrant
} from './types.js';
