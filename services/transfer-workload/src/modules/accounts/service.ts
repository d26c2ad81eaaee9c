import { randomUUID } from 'node:crypto';
import type { QuerySession } from '@fundsflow/db';
import {
  AccountNotFoundError,
  InsufficientFundsError,
  assertValidTransferAmount,
  type Account,
  type TransferIntent
} from '@fundsflow/domain';
import type { ServiceLogger } from '@fundsflow/observability';
import { AccountRepository } from './repository.js';
import { DEFAULT_OPENING_BALANCES, type AccountRepositoryPort } from './types.js';

/**
 * Move `amount` from one account to another using only the given session.
 *
 * The balance check and the two writes are separate statements; the caller's
 * transaction makes them atomic. Never retries.
 */
export async function transferFunds(
  session: QuerySession,
  intent: TransferIntent,
  options: { logger?: ServiceLogger } = {}
): Promise<void> {
  assertValidTransferAmount(intent.amount);

  const accounts = new AccountRepository(session);

  const available = await accounts.findBalance(intent.fromAccountId);
  if (available === null) {
    throw new AccountNotFoundError(intent.fromAccountId);
  }

  if (available < intent.amount) {
    throw new InsufficientFundsError({
      accountId: intent.fromAccountId,
      required: intent.amount,
      available
    });
  }

  await accounts.adjustBalance(intent.fromAccountId, -intent.amount);
  const credited = await accounts.adjustBalance(intent.toAccountId, intent.amount);
  if (credited === 0) {
    throw new AccountNotFoundError(intent.toAccountId);
  }

  options.logger?.debug('transferFunds(): rows updated', { rowCount: credited });
}

export class AccountService {
  private readonly accounts: AccountRepositoryPort;

  constructor(
    session: QuerySession,
    private readonly options: { logger?: ServiceLogger; idFactory?: () => string } = {}
  ) {
    this.accounts = new AccountRepository(session);
  }

  /** Creates the table if needed and upserts one account per opening balance. */
  async createAccounts(balances: readonly number[] = DEFAULT_OPENING_BALANCES): Promise<string[]> {
    const idFactory = this.options.idFactory ?? randomUUID;
    await this.accounts.ensureTable();

    const ids: string[] = [];
    for (const balance of balances) {
      const account: Account = { id: idFactory(), balance };
      await this.accounts.upsert(account);
      ids.push(account.id);
    }

    this.options.logger?.debug('createAccounts(): accounts upserted', { count: ids.length });
    return ids;
  }

  async deleteAccounts(): Promise<void> {
    const deleted = await this.accounts.deleteAll();
    this.options.logger?.debug('deleteAccounts(): accounts deleted', { rowCount: deleted });
  }

  async listBalances(): Promise<Account[]> {
    return this.accounts.list();
  }
}
