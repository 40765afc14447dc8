import { LedgerRecord, LedgerStatus } from "../entities/LedgerRecord";

export type Reservation =
  | { kind: "fresh" }
  | { kind: "already_applied"; record: LedgerRecord };

export type RecordLedgerInput = {
  transactionId: string;
  accountId: number;
  amount: string;
  status: LedgerStatus;
};

export interface LedgerRepository {
  tryReserve(transactionId: string): Promise<Reservation>;
  /** Throws DuplicateTransactionError when the transaction id is already taken. */
  record(input: RecordLedgerInput): Promise<LedgerRecord>;
  findByTransactionId(transactionId: string): Promise<LedgerRecord | null>;
  listByAccount(accountId: number): Promise<LedgerRecord[]>;
}
