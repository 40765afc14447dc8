import path from "path";
import { AccountNotFoundError, DuplicateTransactionError } from "../../../src/payments/domain/errors";
import { InMemoryPaymentStore } from "../../../src/payments/infrastructure/memory/InMemoryPaymentStore";
import {
  loadAccountSeeds,
  parseAccountSeeds
} from "../../../src/payments/infrastructure/memory/loadAccountSeeds";

describe("InMemoryPaymentStore", () => {
  const appliedAt = new Date("2024-01-01T00:00:00.000Z");
  const makeStore = () =>
    new InMemoryPaymentStore([{ id: 1, ownerUserId: 1, balance: "1000.00" }], () => appliedAt);

  it("aplica crédito e registro no commit", async () => {
    const store = makeStore();

    const balance = await store.runInTransaction(async ({ ledger, accounts }) => {
      const newBalance = await accounts.creditAtomically(1, 1, "100.00");
      await ledger.record({
        transactionId: "tx-1",
        accountId: 1,
        amount: "100",
        status: "APPLIED"
      });
      return newBalance;
    });

    expect(balance).toBe("1100.00");
    expect(store.balanceOf(1)).toBe("1100.00");
    expect(store.ledgerRecords()).toHaveLength(1);
    expect(store.ledgerRecords()[0]).toMatchObject({
      transactionId: "tx-1",
      accountId: 1,
      amount: "100.00",
      status: "APPLIED",
      appliedAt
    });
  });

  it("descarta crédito e libera a chave no rollback", async () => {
    const store = makeStore();

    await expect(
      store.runInTransaction(async ({ ledger, accounts }) => {
        await accounts.creditAtomically(1, 1, "100.00");
        await ledger.record({
          transactionId: "tx-1",
          accountId: 1,
          amount: "100.00",
          status: "APPLIED"
        });
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(store.balanceOf(1)).toBe("1000.00");
    expect(store.ledgerRecords()).toHaveLength(0);
    await expect(
      store.runInTransaction(({ ledger }) =>
        ledger.record({ transactionId: "tx-1", accountId: 1, amount: "1.00", status: "APPLIED" })
      )
    ).resolves.toMatchObject({ transactionId: "tx-1" });
  });

  it("não expõe registros antes do commit", async () => {
    const store = makeStore();

    await store.runInTransaction(async ({ ledger }) => {
      await ledger.record({ transactionId: "tx-1", accountId: 1, amount: "1.00", status: "APPLIED" });
      expect(await ledger.tryReserve("tx-1")).toEqual({ kind: "fresh" });
      expect(await ledger.findByTransactionId("tx-1")).toBeNull();
    });

    const reservation = await store.runInTransaction(({ ledger }) => ledger.tryReserve("tx-1"));
    expect(reservation.kind).toBe("already_applied");
  });

  it("rejeita inserção concorrente da mesma transação", async () => {
    const store = makeStore();
    const record = { transactionId: "tx-1", accountId: 1, amount: "1.00", status: "APPLIED" as const };

    await store.runInTransaction(async (first) => {
      await first.ledger.record(record);
      await expect(
        store.runInTransaction(({ ledger }) => ledger.record(record))
      ).rejects.toBeInstanceOf(DuplicateTransactionError);
    });

    await expect(
      store.runInTransaction(({ ledger }) => ledger.record(record))
    ).rejects.toBeInstanceOf(DuplicateTransactionError);
  });

  it("recusa crédito em conta inexistente ou de outro usuário", async () => {
    const store = makeStore();

    await expect(
      store.runInTransaction(({ accounts }) => accounts.creditAtomically(9, 1, "1.00"))
    ).rejects.toBeInstanceOf(AccountNotFoundError);
    await expect(
      store.runInTransaction(({ accounts }) => accounts.creditAtomically(1, 2, "1.00"))
    ).rejects.toBeInstanceOf(AccountNotFoundError);
    expect(store.balanceOf(1)).toBe("1000.00");
  });

  it("lista registros da conta do mais recente para o mais antigo", async () => {
    const store = makeStore();
    store.addAccount({ id: 2, ownerUserId: 2, balance: "0.00" });
    for (const [transactionId, accountId] of [
      ["tx-1", 1],
      ["tx-2", 2],
      ["tx-3", 1]
    ] as const) {
      await store.runInTransaction(({ ledger }) =>
        ledger.record({ transactionId, accountId, amount: "1.00", status: "APPLIED" })
      );
    }

    const records = await store.runInTransaction(({ ledger }) => ledger.listByAccount(1));

    expect(records.map((record) => record.transactionId)).toEqual(["tx-3", "tx-1"]);
  });

  it("simula falha pontual de armazenamento", async () => {
    const store = makeStore();
    store.failNext("creditAtomically", new Error("connection reset"));

    await expect(
      store.runInTransaction(({ accounts }) => accounts.creditAtomically(1, 1, "1.00"))
    ).rejects.toThrow("connection reset");
    await expect(
      store.runInTransaction(({ accounts }) => accounts.creditAtomically(1, 1, "1.00"))
    ).resolves.toBe("1001.00");
  });

  it("carrega contas do arquivo de seed", async () => {
    const seeds = await loadAccountSeeds(
      path.join(__dirname, "..", "..", "..", "fixtures", "accounts.seed.json")
    );

    expect(seeds).toEqual([
      { id: 1, ownerUserId: 1, balance: "1000.00" },
      { id: 2, ownerUserId: 2, balance: "0.00" }
    ]);
  });

  it("normaliza saldo e valida seeds", () => {
    expect(parseAccountSeeds('[{"id":3,"ownerUserId":4,"balance":"5"}]')).toEqual([
      { id: 3, ownerUserId: 4, balance: "5.00" }
    ]);
    expect(() => parseAccountSeeds('[{"id":0,"ownerUserId":4,"balance":"5"}]')).toThrow();
  });

  it("rejeita semente com saldo negativo", () => {
    expect(() => parseAccountSeeds('[{"id":1,"ownerUserId":1,"balance":"-50.00"}]')).toThrow(
      "must not be negative"
    );
    expect(parseAccountSeeds('[{"id":1,"ownerUserId":1,"balance":"0"}]')).toEqual([
      { id: 1, ownerUserId: 1, balance: "0.00" }
    ]);
  });
});
