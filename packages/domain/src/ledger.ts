export interface Account {
  id: string;
  balance: number;
}

export interface TransferIntent {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
}

export function assertValidTransferAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new Error('Transfer amount must be a positive integer.');
  }
}
