import type { Account } from '@fundsflow/domain';

export const DEFAULT_OPENING_BALANCES = [1000, 250] as const;

export interface AccountRepositoryPort {
  ensureTable(): Promise<void>;
  upsert(account: Account): Promise<void>;
  deleteAll(): Promise<number>;
  list(): Promise<Account[]>;
  findBalance(accountId: string): Promise<number | null>;
  adjustBalance(accountId: string, delta: number): Promise<number>;
}
