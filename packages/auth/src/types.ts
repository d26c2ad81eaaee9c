export const DEFAULT_SCOPE = 'openid offline_access';

export type TokenGrant =
  | { grantType: 'password'; username: string; password: string; scope?: string }
  | { grantType: 'refresh_token'; refreshToken: string; scope?: string };

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface IdTokenResponse {
  idToken: string;
  refreshToken?: string | undefined;
  accessToken?: string | undefined;
  expiresIn?: number | undefined;
}

export interface IdTokenClaims {
  sub: string;
  iss: string;
  aud: string | string[];
  exp: number;
  iat?: number | undefined;
  email?: string | undefined;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
