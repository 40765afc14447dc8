import { PoolClient } from "pg";
import { Account } from "../../domain/entities/Account";
import { AccountNotFoundError } from "../../domain/errors";
import { AccountRepository } from "../../domain/repositories/AccountRepository";
import { normalizeMoney } from "../../../shared/money";
import { DbMetrics, timedQuery } from "./timedQuery";

type AccountRow = {
  id: number;
  owner_user_id: number;
  balance: string;
};

type BalanceRow = {
  balance: string;
};

export class PostgresAccountRepository implements AccountRepository {
  constructor(
    private readonly client: PoolClient,
    private readonly metrics: DbMetrics
  ) {}

  async findById(accountId: number): Promise<Account | null> {
    const result = await timedQuery<AccountRow>(
      this.client,
      this.metrics,
      "SELECT id, owner_user_id, balance FROM accounts WHERE id = $1",
      [accountId],
      "find_account"
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return new Account(row.id, row.owner_user_id, normalizeMoney(row.balance));
  }

  // Increment happens in the UPDATE itself; the row lock it takes serializes
  // concurrent credits to the same account until the surrounding transaction ends.
  async creditAtomically(accountId: number, ownerUserId: number, amount: string): Promise<string> {
    const result = await timedQuery<BalanceRow>(
      this.client,
      this.metrics,
      "UPDATE accounts SET balance = balance + $3 WHERE id = $1 AND owner_user_id = $2 RETURNING balance",
      [accountId, ownerUserId, normalizeMoney(amount)],
      "credit_balance"
    );
    if (result.rows.length === 0) {
      throw new AccountNotFoundError(accountId);
    }
    return normalizeMoney(result.rows[0].balance);
  }
}
