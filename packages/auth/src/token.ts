import { z } from 'zod';
import { IdentityProviderError } from './errors.js';
import { DEFAULT_SCOPE, type ClientCredentials, type FetchLike, type IdTokenResponse, type TokenGrant } from './types.js';

const tokenResponseSchema = z.object({
  id_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  access_token: z.string().min(1).optional(),
  expires_in: z.number().int().positive().optional()
});

export function encodeGrant(grant: TokenGrant): string {
  const body = new URLSearchParams();
  body.set('grant_type', grant.grantType);

  if (grant.grantType === 'password') {
    body.set('username', grant.username);
    body.set('password', grant.password);
  } else {
    body.set('refresh_token', grant.refreshToken);
  }

  body.set('scope', grant.scope ?? DEFAULT_SCOPE);
  return body.toString();
}

function basicAuthorization(credentials: ClientCredentials): string {
  const raw = `${credentials.clientId}:${credentials.clientSecret}`;
  return `Basic ${Buffer.from(raw, 'utf8').toString('base64')}`;
}

/**
 * Exchange a grant for an OpenID Connect id_token at the provider's token
 * endpoint, authenticating the client with HTTP basic credentials.
 */
export async function requestIdToken(params: {
  tokenUrl: string;
  credentials: ClientCredentials;
  grant: TokenGrant;
  fetchImpl?: FetchLike;
}): Promise<IdTokenResponse> {
  const fetchImpl = params.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(params.tokenUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json',
        authorization: basicAuthorization(params.credentials)
      },
      body: encodeGrant(params.grant)
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IdentityProviderError(`Token request failed: ${reason}`, { cause: error });
  }

  const text = await response.text();
  let parsed: unknown;

  try {
    parsed = text.length > 0 ? JSON.parse(text) : {};
  } catch {
    parsed = {
      raw: text
    };
  }

  if (!response.ok) {
    const message = typeof parsed === 'object' && parsed !== null ? JSON.stringify(parsed) : String(parsed);
    throw new IdentityProviderError(`HTTP ${response.status}: ${message}`, { status: response.status });
  }

  const body = tokenResponseSchema.safeParse(parsed);
  if (!body.success) {
    throw new IdentityProviderError('Token response is missing id_token.', {
      status: response.status,
      cause: body.error
    });
  }

  return {
    idToken: body.data.id_token,
    refreshToken: body.data.refresh_token,
    accessToken: body.data.access_token,
    expiresIn: body.data.expires_in
  };
}
