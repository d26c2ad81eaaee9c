export { AccountNotFoundError, InsufficientFundsError, RetryExhaustedError } from './errors.js';
export { assertValidTransferAmount, type Account, type TransferIntent } from './ledger.js';
export {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  assertValidRetryBound,
  calculateBackoff,
  minimumBackoff,
  type RandomSource
} from './retry.js';
export {
  TRANSACTION_STATES,
  canTransition,
  isTerminalState,
  type TransactionState
} from './transaction.js';
