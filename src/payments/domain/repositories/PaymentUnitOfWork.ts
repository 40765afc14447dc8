import { AccountRepository } from "./AccountRepository";
import { LedgerRepository } from "./LedgerRepository";

export type TransactionScope = {
  ledger: LedgerRepository;
  accounts: AccountRepository;
};

export type TransactionWork<T> = (scope: TransactionScope) => Promise<T>;

/**
 * Everything done through the scope commits together or not at all. The work
 * promise rejecting rolls the whole unit back.
 */
export interface PaymentUnitOfWork {
  runInTransaction<T>(work: TransactionWork<T>): Promise<T>;
}
