import { PoolClient } from "pg";
import { LedgerRecord, LedgerStatus } from "../../domain/entities/LedgerRecord";
import { DuplicateTransactionError } from "../../domain/errors";
import {
  LedgerRepository,
  RecordLedgerInput,
  Reservation
} from "../../domain/repositories/LedgerRepository";
import { Metrics } from "../../../shared/observability/metrics";
import { normalizeMoney } from "../../../shared/money";
import { LEDGER_PRIMARY_KEY } from "./postgres";
import { timedQuery } from "./timedQuery";

type LedgerRow = {
  transaction_id: string;
  account_id: number;
  amount: string;
  status: LedgerStatus;
  applied_at: Date;
};

const LEDGER_COLUMNS = "transaction_id, account_id, amount, status, applied_at";

export class PostgresLedgerRepository implements LedgerRepository {
  private readonly duplicateKeyErrorCode = "23505";

  constructor(
    private readonly client: PoolClient,
    private readonly metrics: Pick<
      Metrics,
      "recordDbQuery" | "recordIdempotencyHit" | "recordIdempotencyMiss"
    >
  ) {}

  async tryReserve(transactionId: string): Promise<Reservation> {
    const record = await this.findByTransactionId(transactionId);
    if (record) {
      this.metrics.recordIdempotencyHit();
      return { kind: "already_applied", record };
    }
    this.metrics.recordIdempotencyMiss();
    return { kind: "fresh" };
  }

  async record(input: RecordLedgerInput): Promise<LedgerRecord> {
    try {
      const result = await timedQuery<LedgerRow>(
        this.client,
        this.metrics,
        `INSERT INTO ledger_records (transaction_id, account_id, amount, status) VALUES ($1, $2, $3, $4) RETURNING ${LEDGER_COLUMNS}`,
        [input.transactionId, input.accountId, normalizeMoney(input.amount), input.status],
        "insert_ledger_record"
      );
      return this.toRecord(result.rows[0]);
    } catch (error: unknown) {
      if (this.isDuplicateKeyError(error)) {
        throw new DuplicateTransactionError(input.transactionId);
      }
      throw error;
    }
  }

  async findByTransactionId(transactionId: string): Promise<LedgerRecord | null> {
    const result = await timedQuery<LedgerRow>(
      this.client,
      this.metrics,
      `SELECT ${LEDGER_COLUMNS} FROM ledger_records WHERE transaction_id = $1`,
      [transactionId],
      "find_ledger_record"
    );
    return result.rows.length === 0 ? null : this.toRecord(result.rows[0]);
  }

  async listByAccount(accountId: number): Promise<LedgerRecord[]> {
    const result = await timedQuery<LedgerRow>(
      this.client,
      this.metrics,
      `SELECT ${LEDGER_COLUMNS} FROM ledger_records WHERE account_id = $1 ORDER BY applied_at DESC, transaction_id`,
      [accountId],
      "list_ledger_records"
    );
    return result.rows.map((row) => this.toRecord(row));
  }

  private toRecord(row: LedgerRow): LedgerRecord {
    return new LedgerRecord(
      row.transaction_id,
      row.account_id,
      normalizeMoney(row.amount),
      row.status,
      new Date(row.applied_at)
    );
  }

  private isDuplicateKeyError(error: unknown): boolean {
    if (!error || typeof error !== "object" || !("code" in error)) {
      return false;
    }
    const constraint = "constraint" in error ? error.constraint : undefined;
    return (
      error.code === this.duplicateKeyErrorCode &&
      (constraint === undefined || constraint === LEDGER_PRIMARY_KEY)
    );
  }
}
