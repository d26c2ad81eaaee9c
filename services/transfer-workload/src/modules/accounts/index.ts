export { ACCOUNT_STATEMENTS, AccountRepository, toBalance } from './repository.js';
export { AccountService, transferFunds } from './service.js';
export { DEFAULT_OPENING_BALANCES, type AccountRepositoryPort } from './types.js';
