export class AccountNotFoundError extends Error {
  constructor(public readonly accountId: number) {
    super(`Account ${accountId} not found for the given user`);
    this.name = "AccountNotFoundError";
  }
}

export class DuplicateTransactionError extends Error {
  constructor(public readonly transactionId: string) {
    super(`Transaction ${transactionId} is already recorded`);
    this.name = "DuplicateTransactionError";
  }
}
