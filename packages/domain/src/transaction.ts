export const TRANSACTION_STATES = [
  'ATTEMPTING',
  'COMMITTED',
  'ROLLED_BACK_RETRYING',
  'FAILED_FATAL',
  'EXHAUSTED'
] as const;

export type TransactionState = (typeof TRANSACTION_STATES)[number];

const TERMINAL_STATES = new Set<TransactionState>(['COMMITTED', 'FAILED_FATAL', 'EXHAUSTED']);

const ALLOWED_TRANSITIONS: Record<TransactionState, readonly TransactionState[]> = {
  ATTEMPTING: ['COMMITTED', 'ROLLED_BACK_RETRYING', 'FAILED_FATAL'],
  ROLLED_BACK_RETRYING: ['ATTEMPTING', 'EXHAUSTED'],
  COMMITTED: [],
  FAILED_FATAL: [],
  EXHAUSTED: []
};

export function canTransition(from: TransactionState, to: TransactionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: TransactionState): boolean {
  return TERMINAL_STATES.has(state);
}
