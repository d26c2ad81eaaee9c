import { runTransaction, type DbConnection, type RunTransactionOptions, type TransactionalSession } from '@fundsflow/db';
import { InsufficientFundsError, RetryExhaustedError, type TransferIntent } from '@fundsflow/domain';
import type { ServiceLogger } from '@fundsflow/observability';
import { AccountService, transferFunds } from './modules/accounts/index.js';
import type { TransferOutcome, WorkloadReport } from './types.js';

export interface WorkloadDeps {
  connect: (idToken: string) => Promise<DbConnection>;
  logger: ServiceLogger;
  print: (line: string) => void;
  amount: number;
  maxRetries: number;
  now?: () => Date;
  idFactory?: () => string;
  transaction?: Pick<RunTransactionOptions, 'sleep' | 'random' | 'baseDelayMs'>;
}

async function printBalances(accounts: AccountService, deps: WorkloadDeps): Promise<void> {
  const now = deps.now ?? (() => new Date());
  const balances = await accounts.listBalances();

  deps.print(`Balances at ${now().toISOString()}:`);
  for (const account of balances) {
    deps.print(`account id: ${account.id}  balance: $${String(account.balance).padStart(2)}`);
  }
}

async function transfer(
  session: TransactionalSession,
  intent: TransferIntent,
  deps: WorkloadDeps
): Promise<{ outcome: TransferOutcome; attempts: number | null }> {
  const { logger } = deps;

  try {
    const { attempts } = await runTransaction(session, (tx) => transferFunds(tx, intent, { logger }), {
      ...deps.transaction,
      maxRetries: deps.maxRetries,
      logger: logger.child('transaction')
    });
    return { outcome: 'committed', attempts };
  } catch (error) {
    if (error instanceof RetryExhaustedError) {
      logger.warn('runTransaction(session, op) failed', { error, maxRetries: error.maxRetries });
      return { outcome: 'retry-exhausted', attempts: error.maxRetries };
    }

    if (error instanceof InsufficientFundsError) {
      logger.warn('transfer rejected', {
        accountId: error.accountId,
        required: error.required,
        available: error.available
      });
      return { outcome: 'insufficient-funds', attempts: null };
    }

    throw error;
  }
}

/**
 * Connect with the id_token and run one round of the workload: create two
 * accounts, print balances, transfer between them, print again and clean up.
 */
export async function executeWorkload(idToken: string, deps: WorkloadDeps): Promise<WorkloadReport> {
  const connection = await deps.connect(idToken);

  try {
    const session = await connection.reserve();

    try {
      const accounts = new AccountService(session, {
        logger: deps.logger,
        ...(deps.idFactory ? { idFactory: deps.idFactory } : {})
      });

      const accountIds = await accounts.createAccounts();
      await printBalances(accounts, deps);

      const [fromAccountId, toAccountId] = accountIds;
      if (!fromAccountId || !toAccountId) {
        throw new Error('Expected two accounts to transfer between.');
      }

      const { outcome, attempts } = await transfer(session, { fromAccountId, toAccountId, amount: deps.amount }, deps);

      await printBalances(accounts, deps);
      await accounts.deleteAccounts();

      return { accountIds, outcome, attempts };
    } finally {
      session.release();
    }
  } finally {
    await connection.close();
  }
}
