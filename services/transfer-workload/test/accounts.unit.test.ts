import { runTransaction, StoreError } from '@fundsflow/db';
import { AccountNotFoundError, InsufficientFundsError, RetryExhaustedError } from '@fundsflow/domain';
import { describe, expect, it } from 'vitest';
import { ACCOUNT_STATEMENTS, AccountService, toBalance, transferFunds } from '../src/modules/accounts/index.js';
import { InMemoryAccountsStore, serializationFailure } from './support/in-memory-session.js';

const noSleep = async (): Promise<void> => undefined;

function seededStore(): InMemoryAccountsStore {
  const store = new InMemoryAccountsStore();
  store.seed({ 'acc-a': 1000, 'acc-b': 250 });
  return store;
}

describe('transferFunds', () => {
  it('moves the amount and keeps the total', async () => {
    const store = seededStore();
    const session = store.session();

    await runTransaction(session, (tx) => transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount: 100 }));

    expect(store.balances()).toEqual({ 'acc-a': 900, 'acc-b': 350 });
    expect(store.statements).toEqual([
      'BEGIN',
      ACCOUNT_STATEMENTS.selectBalance,
      ACCOUNT_STATEMENTS.debit,
      ACCOUNT_STATEMENTS.credit,
      'COMMIT'
    ]);
  });

  it('allows draining an account to exactly zero', async () => {
    const store = seededStore();

    await runTransaction(store.session(), (tx) =>
      transferFunds(tx, { fromAccountId: 'acc-b', toAccountId: 'acc-a', amount: 250 })
    );

    expect(store.balances()).toEqual({ 'acc-a': 1250, 'acc-b': 0 });
  });

  it('fails with insufficient funds and leaves balances unchanged', async () => {
    const store = seededStore();

    const failure = await runTransaction(store.session(), (tx) =>
      transferFunds(tx, { fromAccountId: 'acc-b', toAccountId: 'acc-a', amount: 2000 })
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(InsufficientFundsError);
    expect(failure).toMatchObject({ accountId: 'acc-b', required: 2000, available: 250 });
    expect(store.balances()).toEqual({ 'acc-a': 1000, 'acc-b': 250 });
    expect(store.statements).toEqual(['BEGIN', ACCOUNT_STATEMENTS.selectBalance, 'ROLLBACK']);
  });

  it('rolls back the debit when the destination does not exist', async () => {
    const store = seededStore();

    await expect(
      runTransaction(store.session(), (tx) =>
        transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-missing', amount: 100 })
      )
    ).rejects.toBeInstanceOf(AccountNotFoundError);

    expect(store.balances()).toEqual({ 'acc-a': 1000, 'acc-b': 250 });
    expect(store.inTransaction).toBe(false);
  });

  it('fails when the source account does not exist', async () => {
    const store = seededStore();

    await expect(
      transferFunds(store.session(), { fromAccountId: 'acc-missing', toAccountId: 'acc-a', amount: 1 })
    ).rejects.toThrow('Account acc-missing not found.');
  });

  it('rejects a non-positive amount before touching the store', async () => {
    const store = seededStore();

    await expect(
      transferFunds(store.session(), { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount: 0 })
    ).rejects.toThrow('Transfer amount must be a positive integer.');
    expect(store.statements).toEqual([]);
  });

  it('commits on the attempt after transient conflicts', async () => {
    const store = seededStore();
    store.failOn(ACCOUNT_STATEMENTS.credit, serializationFailure, 2);

    const result = await runTransaction(
      store.session(),
      (tx) => transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount: 100 }),
      { sleep: noSleep }
    );

    expect(result).toEqual({ attempts: 3 });
    expect(store.balances()).toEqual({ 'acc-a': 900, 'acc-b': 350 });
  });

  it('never applies a partial transfer when conflicts exhaust the retries', async () => {
    const store = seededStore();
    store.failOn(ACCOUNT_STATEMENTS.credit, serializationFailure, 3);

    await expect(
      runTransaction(
        store.session(),
        (tx) => transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount: 100 }),
        { sleep: noSleep }
      )
    ).rejects.toBeInstanceOf(RetryExhaustedError);

    expect(store.balances()).toEqual({ 'acc-a': 1000, 'acc-b': 250 });
  });

  it('leaves balances untouched across repeated non-conflict failures', async () => {
    const store = seededStore();
    const session = store.session();
    store.failOn(ACCOUNT_STATEMENTS.credit, () => Object.assign(new Error('disk full'), { code: '53100' }), 5);

    for (let i = 0; i < 5; i += 1) {
      const failure = await runTransaction(session, (tx) =>
        transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount: 100 })
      ).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(StoreError);
      expect(failure).toMatchObject({ kind: 'other', code: '53100' });
    }

    expect(store.balances()).toEqual({ 'acc-a': 1000, 'acc-b': 250 });
  });

  it('keeps the sum invariant across a sequence of transfers', async () => {
    const store = seededStore();
    const session = store.session();
    const amounts = [100, 250, 1, 649];

    for (const amount of amounts) {
      await runTransaction(session, (tx) =>
        transferFunds(tx, { fromAccountId: 'acc-a', toAccountId: 'acc-b', amount })
      );
    }

    const balances = store.balances();
    expect(balances).toEqual({ 'acc-a': 0, 'acc-b': 1250 });
    expect((balances['acc-a'] ?? 0) + (balances['acc-b'] ?? 0)).toBe(1250);
  });
});

describe('AccountService', () => {
  it('creates the table and upserts the opening balances', async () => {
    const store = new InMemoryAccountsStore();
    const ids = ['id-1', 'id-2'];
    const service = new AccountService(store.session(), { idFactory: () => ids.shift() ?? 'id-extra' });

    const created = await service.createAccounts();

    expect(created).toEqual(['id-1', 'id-2']);
    expect(store.balances()).toEqual({ 'id-1': 1000, 'id-2': 250 });
    expect(store.statements).toEqual([
      ACCOUNT_STATEMENTS.createTable,
      ACCOUNT_STATEMENTS.upsert,
      ACCOUNT_STATEMENTS.upsert
    ]);
  });

  it('generates uuid identifiers by default', async () => {
    const store = new InMemoryAccountsStore();
    const [first] = await new AccountService(store.session()).createAccounts([5]);

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('lists balances as integers and deletes every account', async () => {
    const store = seededStore();
    const service = new AccountService(store.session());

    expect(await service.listBalances()).toEqual([
      { id: 'acc-a', balance: 1000 },
      { id: 'acc-b', balance: 250 }
    ]);

    await service.deleteAccounts();
    expect(store.balances()).toEqual({});
  });
});

describe('toBalance', () => {
  it('accepts numbers, numeric strings and bigints', () => {
    expect(toBalance(42)).toBe(42);
    expect(toBalance('1000')).toBe(1000);
    expect(toBalance(BigInt(-7))).toBe(-7);
  });

  it('rejects non-integer values', () => {
    expect(() => toBalance('12.5')).toThrow('Unexpected balance value: 12.5.');
    expect(() => toBalance(null)).toThrow('Unexpected balance value: null.');
  });
});
