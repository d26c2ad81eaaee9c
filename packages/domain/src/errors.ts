export class InsufficientFundsError extends Error {
  readonly accountId: string;
  readonly required: number;
  readonly available: number;

  constructor(params: { accountId: string; required: number; available: number }) {
    super(`insufficient funds in ${params.accountId}: have ${params.available}, need ${params.required}`);
    this.name = 'InsufficientFundsError';
    this.accountId = params.accountId;
    this.required = params.required;
    this.available = params.available;
  }
}

export class AccountNotFoundError extends Error {
  readonly accountId: string;

  constructor(accountId: string) {
    super(`Account ${accountId} not found.`);
    this.name = 'AccountNotFoundError';
    this.accountId = accountId;
  }
}

export class RetryExhaustedError extends Error {
  readonly maxRetries: number;

  constructor(maxRetries: number, options?: { cause?: unknown }) {
    super(`transaction did not succeed after ${maxRetries} retries`, options);
    this.name = 'RetryExhaustedError';
    this.maxRetries = maxRetries;
  }
}
