import { Pool } from "pg";
import { PaymentUnitOfWork, TransactionWork } from "../../domain/repositories/PaymentUnitOfWork";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";
import { PostgresAccountRepository } from "./PostgresAccountRepository";
import { PostgresLedgerRepository } from "./PostgresLedgerRepository";

export class PostgresPaymentUnitOfWork implements PaymentUnitOfWork {
  constructor(
    private readonly pool: Pool,
    private readonly metrics: Pick<
      Metrics,
      "recordDbQuery" | "recordIdempotencyHit" | "recordIdempotencyMiss"
    >,
    private readonly logger: Logger
  ) {}

  // The transaction is not tied to the HTTP request: a client that hangs up
  // mid-way still gets a COMMIT or a ROLLBACK, never half of the work.
  async runInTransaction<T>(work: TransactionWork<T>): Promise<T> {
    const client = await this.pool.connect();
    let brokenConnection: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await work({
        ledger: new PostgresLedgerRepository(client, this.metrics),
        accounts: new PostgresAccountRepository(client, this.metrics)
      });
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        brokenConnection =
          rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        this.logger.error("Rollback failed, discarding connection", {
          error: brokenConnection.message
        });
      }
      throw error;
    } finally {
      client.release(brokenConnection);
    }
  }
}
