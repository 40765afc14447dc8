import { Pool } from "pg";
import { AccountNotFoundError, DuplicateTransactionError } from "../../../src/payments/domain/errors";
import { PostgresPaymentUnitOfWork } from "../../../src/payments/infrastructure/db/PostgresPaymentUnitOfWork";
import { makeLogger } from "../../support/webhook";

type Rows = Record<string, unknown>[];
type Responder = (text: string, params: unknown[]) => Rows | Error;

describe("PostgresPaymentUnitOfWork", () => {
  const makePool = (respond: Responder) => {
    const statements: string[] = [];
    const client = {
      query: jest.fn(async (text: string, params: unknown[] = []) => {
        statements.push(text);
        const outcome = respond(text, params);
        if (outcome instanceof Error) {
          throw outcome;
        }
        return { rows: outcome, rowCount: outcome.length };
      }),
      release: jest.fn()
    };
    const pool = { connect: jest.fn().mockResolvedValue(client) };
    return { pool: pool as unknown as Pool, client, statements };
  };

  const makeMetrics = () => ({
    recordDbQuery: jest.fn(),
    recordIdempotencyHit: jest.fn(),
    recordIdempotencyMiss: jest.fn()
  });

  const duplicateKeyError = (constraint: string) =>
    Object.assign(new Error("duplicate key value violates unique constraint"), {
      code: "23505",
      constraint
    });

  const happyPath: Responder = (text) => {
    if (text.startsWith("SELECT id, owner_user_id")) {
      return [{ id: 1, owner_user_id: 1, balance: "1000.00" }];
    }
    if (text.startsWith("UPDATE accounts")) {
      return [{ balance: "1100.00" }];
    }
    if (text.startsWith("INSERT INTO ledger_records")) {
      return [
        {
          transaction_id: "tx-1",
          account_id: 1,
          amount: "100.00",
          status: "APPLIED",
          applied_at: new Date("2024-01-01T00:00:00.000Z")
        }
      ];
    }
    return [];
  };

  it("executa reserva, crédito e registro dentro de BEGIN/COMMIT", async () => {
    const { pool, client, statements } = makePool(happyPath);
    const metrics = makeMetrics();
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, metrics, makeLogger());

    const balance = await unitOfWork.runInTransaction(async ({ ledger, accounts }) => {
      const account = await accounts.findById(1);
      expect(account?.isOwnedBy(1)).toBe(true);
      expect(await ledger.tryReserve("tx-1")).toEqual({ kind: "fresh" });
      const newBalance = await accounts.creditAtomically(1, 1, "100");
      const record = await ledger.record({
        transactionId: "tx-1",
        accountId: 1,
        amount: "100",
        status: "APPLIED"
      });
      expect(record.amount).toBe("100.00");
      return newBalance;
    });

    expect(balance).toBe("1100.00");
    expect(statements).toEqual([
      "BEGIN",
      "SELECT id, owner_user_id, balance FROM accounts WHERE id = $1",
      "SELECT transaction_id, account_id, amount, status, applied_at FROM ledger_records WHERE transaction_id = $1",
      "UPDATE accounts SET balance = balance + $3 WHERE id = $1 AND owner_user_id = $2 RETURNING balance",
      "INSERT INTO ledger_records (transaction_id, account_id, amount, status) VALUES ($1, $2, $3, $4) RETURNING transaction_id, account_id, amount, status, applied_at",
      "COMMIT"
    ]);
    expect(client.query).toHaveBeenCalledWith(
      "UPDATE accounts SET balance = balance + $3 WHERE id = $1 AND owner_user_id = $2 RETURNING balance",
      [1, 1, "100.00"]
    );
    expect(metrics.recordIdempotencyMiss).toHaveBeenCalledTimes(1);
    expect(metrics.recordDbQuery).toHaveBeenCalledWith("postgres", "credit_balance", expect.any(Number));
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it("retorna registro existente na reserva", async () => {
    const { pool } = makePool((text) =>
      text.startsWith("SELECT transaction_id")
        ? [
            {
              transaction_id: "tx-1",
              account_id: 1,
              amount: "100.00",
              status: "APPLIED",
              applied_at: new Date("2024-01-01T00:00:00.000Z")
            }
          ]
        : []
    );
    const metrics = makeMetrics();
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, metrics, makeLogger());

    const reservation = await unitOfWork.runInTransaction(({ ledger }) => ledger.tryReserve("tx-1"));

    expect(reservation).toEqual({
      kind: "already_applied",
      record: expect.objectContaining({ transactionId: "tx-1", amount: "100.00" })
    });
    expect(metrics.recordIdempotencyHit).toHaveBeenCalledTimes(1);
  });

  it("faz ROLLBACK e propaga o erro quando o trabalho falha", async () => {
    const { pool, client, statements } = makePool(happyPath);
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), makeLogger());

    await expect(
      unitOfWork.runInTransaction(async ({ accounts }) => {
        await accounts.creditAtomically(1, 1, "100.00");
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(statements[statements.length - 1]).toBe("ROLLBACK");
    expect(statements).not.toContain("COMMIT");
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it("converte violação da chave do ledger em DuplicateTransactionError", async () => {
    const { pool, statements } = makePool((text) =>
      text.startsWith("INSERT") ? duplicateKeyError("ledger_records_pkey") : []
    );
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), makeLogger());

    await expect(
      unitOfWork.runInTransaction(({ ledger }) =>
        ledger.record({ transactionId: "tx-1", accountId: 1, amount: "1.00", status: "APPLIED" })
      )
    ).rejects.toBeInstanceOf(DuplicateTransactionError);
    expect(statements).toEqual([
      "BEGIN",
      "INSERT INTO ledger_records (transaction_id, account_id, amount, status) VALUES ($1, $2, $3, $4) RETURNING transaction_id, account_id, amount, status, applied_at",
      "ROLLBACK"
    ]);
  });

  it("propaga violações de outras restrições", async () => {
    const { pool } = makePool((text) =>
      text.startsWith("INSERT") ? duplicateKeyError("some_other_key") : []
    );
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), makeLogger());

    await expect(
      unitOfWork.runInTransaction(({ ledger }) =>
        ledger.record({ transactionId: "tx-1", accountId: 1, amount: "1.00", status: "APPLIED" })
      )
    ).rejects.toThrow("duplicate key value violates unique constraint");
  });

  it("lança AccountNotFoundError quando o UPDATE não encontra a conta do usuário", async () => {
    const { pool } = makePool(() => []);
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), makeLogger());

    await expect(
      unitOfWork.runInTransaction(({ accounts }) => accounts.creditAtomically(1, 2, "1.00"))
    ).rejects.toBeInstanceOf(AccountNotFoundError);
  });

  it("descarta a conexão quando o ROLLBACK falha", async () => {
    const rollbackError = new Error("connection terminated");
    const { pool, client } = makePool((text) => (text === "ROLLBACK" ? rollbackError : []));
    const logger = makeLogger();
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), logger);

    await expect(
      unitOfWork.runInTransaction(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(client.release).toHaveBeenCalledWith(rollbackError);
    expect(logger.error).toHaveBeenCalledWith("Rollback failed, discarding connection", {
      error: "connection terminated"
    });
  });

  it("lista registros da conta", async () => {
    const { pool, client } = makePool((text) =>
      text.includes("WHERE account_id")
        ? [
            {
              transaction_id: "tx-2",
              account_id: 1,
              amount: "5.5",
              status: "APPLIED",
              applied_at: new Date("2024-01-02T00:00:00.000Z")
            }
          ]
        : []
    );
    const unitOfWork = new PostgresPaymentUnitOfWork(pool, makeMetrics(), makeLogger());

    const records = await unitOfWork.runInTransaction(({ ledger }) => ledger.listByAccount(1));

    expect(records).toEqual([
      expect.objectContaining({ transactionId: "tx-2", accountId: 1, amount: "5.50" })
    ]);
    expect(client.query).toHaveBeenCalledWith(
      "SELECT transaction_id, account_id, amount, status, applied_at FROM ledger_records WHERE account_id = $1 ORDER BY applied_at DESC, transaction_id",
      [1]
    );
  });
});
