import {
  IdentityProviderError,
  decodeIdTokenClaims,
  isExpired,
  requestIdToken,
  type FetchLike,
  type IdTokenResponse,
  type TokenGrant
} from '@fundsflow/auth';
import type { ParsedArgs, PhaseResult } from './types.js';
import { executeWorkload, type WorkloadDeps } from './workload.js';

export const BOGUS_ID_TOKEN = 'bogus';

export interface AppDeps extends WorkloadDeps {
  fetchImpl?: FetchLike;
}

export interface AppResult {
  exitCode: number;
  phases: PhaseResult[];
}

type RunArgs = Extract<ParsedArgs, { kind: 'run' }>;

async function fetchToken(args: RunArgs, grant: TokenGrant, deps: AppDeps): Promise<IdTokenResponse> {
  const token = await requestIdToken({
    tokenUrl: args.tokenUrl,
    credentials: { clientId: args.clientId, clientSecret: args.clientSecret },
    grant,
    ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {})
  });

  const claims = decodeIdTokenClaims(token.idToken);
  if (claims) {
    deps.logger.debug('id_token received', {
      grant: grant.grantType,
      subject: claims.sub,
      expiresAt: new Date(claims.exp * 1000).toISOString()
    });
    if (isExpired(claims, deps.now?.())) {
      deps.logger.warn('id_token is already expired', { grant: grant.grantType, subject: claims.sub });
    }
  }

  return token;
}

async function runPhase(
  label: string,
  idToken: string,
  expectRejection: boolean,
  deps: AppDeps
): Promise<PhaseResult> {
  deps.print('');
  deps.print(label);

  try {
    const report = await executeWorkload(idToken, deps);
    return { label, status: 'completed', report };
  } catch (error) {
    if (!expectRejection) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    deps.logger.info('connection rejected as expected', { error: message });
    return { label, status: 'rejected', error: message };
  }
}

/**
 * Run the workload with a fresh id_token, a refreshed one and a bogus one.
 * A failure in the first two phases aborts the run; the bogus phase must fail.
 */
export async function runApp(args: RunArgs, deps: AppDeps): Promise<AppResult> {
  const phases: PhaseResult[] = [];

  const initial = await fetchToken(args, { grantType: 'password', username: args.username, password: args.password }, deps);
  phases.push(await runPhase('Initiate authentication with a new id_token:', initial.idToken, false, deps));

  if (!initial.refreshToken) {
    throw new IdentityProviderError('Token response did not include refresh_token; request the offline_access scope.');
  }

  const refreshed = await fetchToken(args, { grantType: 'refresh_token', refreshToken: initial.refreshToken }, deps);
  phases.push(await runPhase('Initiate authentication with a refreshed id_token:', refreshed.idToken, false, deps));

  const bogus = await runPhase('Initiate authentication with a bogus id_token:', BOGUS_ID_TOKEN, true, deps);
  phases.push(bogus);

  let exitCode = 0;

  if (bogus.status === 'completed') {
    deps.logger.error('bogus id_token was accepted by the cluster');
    exitCode = 1;
  }

  for (const phase of phases) {
    if (phase.status === 'completed' && phase.report.outcome !== 'committed') {
      deps.logger.warn('transfer did not commit', { phase: phase.label, outcome: phase.report.outcome });
      exitCode = 1;
    }
  }

  return { exitCode, phases };
}
