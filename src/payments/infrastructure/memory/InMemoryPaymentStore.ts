import { Account } from "../../domain/entities/Account";
import { LedgerRecord } from "../../domain/entities/LedgerRecord";
import { AccountNotFoundError, DuplicateTransactionError } from "../../domain/errors";
import { AccountRepository } from "../../domain/repositories/AccountRepository";
import {
  LedgerRepository,
  RecordLedgerInput,
  Reservation
} from "../../domain/repositories/LedgerRepository";
import {
  PaymentUnitOfWork,
  TransactionScope,
  TransactionWork
} from "../../domain/repositories/PaymentUnitOfWork";
import { moneyFromScaled, moneyToScaled, normalizeMoney } from "../../../shared/money";

export type AccountSeed = {
  id: number;
  ownerUserId: number;
  balance: string;
};

export type InMemoryOperation = "findById" | "creditAtomically" | "tryReserve" | "record";

type StoredAccount = {
  ownerUserId: number;
  balance: bigint;
};

type StoreState = {
  accounts: Map<number, StoredAccount>;
  records: Map<string, LedgerRecord>;
  // Keys inserted by any open transaction, like entries in a unique index.
  claimedKeys: Set<string>;
  failures: Map<InMemoryOperation, Error>;
  now: () => Date;
};

const takeFailure = (state: StoreState, operation: InMemoryOperation): void => {
  const failure = state.failures.get(operation);
  if (failure) {
    state.failures.delete(operation);
    throw failure;
  }
};

class PendingTransaction {
  readonly credits = new Map<number, bigint>();
  readonly records: LedgerRecord[] = [];

  constructor(private readonly state: StoreState) {}

  commit(): void {
    this.credits.forEach((delta, accountId) => {
      const account = this.state.accounts.get(accountId);
      if (account) {
        account.balance += delta;
      }
    });
    this.records.forEach((record) => {
      this.state.records.set(record.transactionId, record);
      this.state.claimedKeys.delete(record.transactionId);
    });
  }

  rollback(): void {
    this.records.forEach((record) => this.state.claimedKeys.delete(record.transactionId));
  }
}

class InMemoryAccountRepository implements AccountRepository {
  constructor(
    private readonly state: StoreState,
    private readonly pending: PendingTransaction
  ) {}

  async findById(accountId: number): Promise<Account | null> {
    takeFailure(this.state, "findById");
    const account = this.state.accounts.get(accountId);
    if (!account) {
      return null;
    }
    return new Account(accountId, account.ownerUserId, moneyFromScaled(account.balance));
  }

  async creditAtomically(accountId: number, ownerUserId: number, amount: string): Promise<string> {
    takeFailure(this.state, "creditAtomically");
    const account = this.state.accounts.get(accountId);
    if (!account || account.ownerUserId !== ownerUserId) {
      throw new AccountNotFoundError(accountId);
    }
    const delta = (this.pending.credits.get(accountId) ?? 0n) + moneyToScaled(amount);
    this.pending.credits.set(accountId, delta);
    return moneyFromScaled(account.balance + delta);
  }
}

class InMemoryLedgerRepository implements LedgerRepository {
  constructor(
    private readonly state: StoreState,
    private readonly pending: PendingTransaction
  ) {}

  async tryReserve(transactionId: string): Promise<Reservation> {
    takeFailure(this.state, "tryReserve");
    const record = this.state.records.get(transactionId);
    return record ? { kind: "already_applied", record } : { kind: "fresh" };
  }

  async record(input: RecordLedgerInput): Promise<LedgerRecord> {
    takeFailure(this.state, "record");
    if (
      this.state.records.has(input.transactionId) ||
      this.state.claimedKeys.has(input.transactionId)
    ) {
      throw new DuplicateTransactionError(input.transactionId);
    }
    this.state.claimedKeys.add(input.transactionId);
    const record = new LedgerRecord(
      input.transactionId,
      input.accountId,
      normalizeMoney(input.amount),
      input.status,
      this.state.now()
    );
    this.pending.records.push(record);
    return record;
  }

  async findByTransactionId(transactionId: string): Promise<LedgerRecord | null> {
    return this.state.records.get(transactionId) ?? null;
  }

  async listByAccount(accountId: number): Promise<LedgerRecord[]> {
    return [...this.state.records.values()]
      .filter((record) => record.accountId === accountId)
      .reverse();
  }
}

/**
 * Process-local PaymentUnitOfWork with read-committed visibility: ledger rows
 * and credits become visible on commit, while a transaction id is claimed as
 * soon as it is inserted.
 */
export class InMemoryPaymentStore implements PaymentUnitOfWork {
  private readonly state: StoreState;

  constructor(seeds: AccountSeed[] = [], now: () => Date = () => new Date()) {
    this.state = {
      accounts: new Map(),
      records: new Map(),
      claimedKeys: new Set(),
      failures: new Map(),
      now
    };
    seeds.forEach((seed) => this.addAccount(seed));
  }

  addAccount(seed: AccountSeed): void {
    this.state.accounts.set(seed.id, {
      ownerUserId: seed.ownerUserId,
      balance: moneyToScaled(seed.balance)
    });
  }

  balanceOf(accountId: number): string | undefined {
    const account = this.state.accounts.get(accountId);
    return account ? moneyFromScaled(account.balance) : undefined;
  }

  ledgerRecords(): LedgerRecord[] {
    return [...this.state.records.values()];
  }

  /** Makes the next call to `operation` reject with `error`. */
  failNext(operation: InMemoryOperation, error: Error): void {
    this.state.failures.set(operation, error);
  }

  async runInTransaction<T>(work: TransactionWork<T>): Promise<T> {
    const pending = new PendingTransaction(this.state);
    const scope: TransactionScope = {
      ledger: new InMemoryLedgerRepository(this.state, pending),
      accounts: new InMemoryAccountRepository(this.state, pending)
    };
    try {
      const result = await work(scope);
      pending.commit();
      return result;
    } catch (error) {
      pending.rollback();
      throw error;
    }
  }
}
