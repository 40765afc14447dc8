import { Account } from "../entities/Account";

export interface AccountRepository {
  findById(accountId: number): Promise<Account | null>;
  /**
   * Adds `amount` to the balance in the storage layer and returns the new
   * balance. Throws AccountNotFoundError when no account with that id belongs
   * to `ownerUserId`.
   */
  creditAtomically(accountId: number, ownerUserId: number, amount: string): Promise<string>;
}
