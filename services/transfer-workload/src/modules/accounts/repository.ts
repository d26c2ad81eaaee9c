import type { QuerySession } from '@fundsflow/db';
import type { Account } from '@fundsflow/domain';
import type { AccountRepositoryPort } from './types.js';

export const ACCOUNT_STATEMENTS = {
  createTable: 'CREATE TABLE IF NOT EXISTS accounts (id UUID PRIMARY KEY, balance INT)',
  upsert: 'UPSERT INTO accounts (id, balance) VALUES ($1, $2)',
  deleteAll: 'DELETE FROM accounts',
  list: 'SELECT id, balance FROM accounts',
  selectBalance: 'SELECT balance FROM accounts WHERE id = $1',
  debit: 'UPDATE accounts SET balance = balance - $1 WHERE id = $2',
  credit: 'UPDATE accounts SET balance = balance + $1 WHERE id = $2'
} as const;

/** INT columns are INT8 and come back from the driver as strings. */
export function toBalance(value: unknown): number {
  const balance = typeof value === 'string' || typeof value === 'bigint' ? Number(value) : value;
  if (typeof balance !== 'number' || !Number.isSafeInteger(balance)) {
    throw new Error(`Unexpected balance value: ${String(value)}.`);
  }
  return balance;
}

function toAccount(row: Record<string, unknown>): Account {
  return {
    id: String(row.id),
    balance: toBalance(row.balance)
  };
}

export class AccountRepository implements AccountRepositoryPort {
  constructor(private readonly session: QuerySession) {}

  async ensureTable(): Promise<void> {
    await this.session.query(ACCOUNT_STATEMENTS.createTable);
  }

  async upsert(account: Account): Promise<void> {
    await this.session.query(ACCOUNT_STATEMENTS.upsert, [account.id, account.balance]);
  }

  async deleteAll(): Promise<number> {
    const result = await this.session.query(ACCOUNT_STATEMENTS.deleteAll);
    return result.rowCount;
  }

  async list(): Promise<Account[]> {
    const result = await this.session.query(ACCOUNT_STATEMENTS.list);
    return result.rows.map((row) => toAccount(row));
  }

  async findBalance(accountId: string): Promise<number | null> {
    const result = await this.session.query<{ balance: unknown }>(ACCOUNT_STATEMENTS.selectBalance, [accountId]);
    const row = result.rows[0];

    if (!row) {
      return null;
    }

    return toBalance(row.balance);
  }

  /** Applies `delta` and returns the number of rows touched. */
  async adjustBalance(accountId: string, delta: number): Promise<number> {
    const statement = delta < 0 ? ACCOUNT_STATEMENTS.debit : ACCOUNT_STATEMENTS.credit;
    const result = await this.session.query(statement, [Math.abs(delta), accountId]);
    return result.rowCount;
  }
}
