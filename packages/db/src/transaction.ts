import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  RetryExhaustedError,
  assertValidRetryBound,
  calculateBackoff,
  canTransition,
  type RandomSource,
  type TransactionState
} from '@fundsflow/domain';
import type { ServiceLogger } from '@fundsflow/observability';
import { isConflictError } from './errors.js';
import type { QuerySession, TransactionalSession } from './session.js';

export type TransactionOperation = (session: QuerySession) => Promise<void>;

export interface RunTransactionOptions {
  /** Maximum number of attempts, at least 1 (default: 3). */
  maxRetries?: number;
  /** Backoff base unit in ms (default: 100). */
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: RandomSource;
  logger?: ServiceLogger;
  onStateChange?: (state: TransactionState, attempt: number) => void;
}

export interface RunTransactionResult {
  attempts: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation` inside a transaction, retrying serialization conflicts.
 *
 * Each attempt begins a transaction, runs the operation and commits. A
 * conflict raised by the operation or by the commit rolls back, waits
 * `2^attempt * baseDelayMs * (random + 0.5)` ms and tries again. Any other
 * failure rolls back and is rethrown unchanged.
 *
 * @throws RetryExhaustedError after `maxRetries` conflicts in a row.
 */
export async function runTransaction(
  session: TransactionalSession,
  operation: TransactionOperation,
  options: RunTransactionOptions = {}
): Promise<RunTransactionResult> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    random = Math.random,
    logger,
    onStateChange
  } = options;
  const wait = options.sleep ?? sleep;

  assertValidRetryBound(maxRetries);

  let state: TransactionState | undefined;
  const enter = (next: TransactionState, attempt: number): void => {
    if (state !== undefined && !canTransition(state, next)) {
      throw new Error(`Invalid transaction state transition ${state} -> ${next}.`);
    }
    state = next;
    logger?.debug('transaction state changed', { state: next, attempt });
    onStateChange?.(next, attempt);
  };

  let lastConflict: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
    enter('ATTEMPTING', attempt);

    try {
      await session.begin();
      await operation(session);
      await session.commit();
    } catch (error) {
      try {
        await session.rollback();
      } catch (rollbackError) {
        logger?.warn('transaction rollback failed', { attempt, error: rollbackError });
        if (isConflictError(error)) {
          // A conflict cannot be retried on a session that failed to roll back.
          enter('FAILED_FATAL', attempt);
          throw rollbackError;
        }
      }

      if (!isConflictError(error)) {
        logger?.debug('non-retryable transaction failure', { attempt, error });
        enter('FAILED_FATAL', attempt);
        throw error;
      }

      lastConflict = error;
      enter('ROLLED_BACK_RETRYING', attempt);

      const delayMs = calculateBackoff(attempt, baseDelayMs, random);
      logger?.debug('serialization conflict, backing off', { attempt, maxRetries, delayMs, error });
      await wait(delayMs);
      continue;
    }

    enter('COMMITTED', attempt);
    return { attempts: attempt };
  }

  enter('EXHAUSTED', maxRetries);
  throw new RetryExhaustedError(maxRetries, { cause: lastConflict });
}
