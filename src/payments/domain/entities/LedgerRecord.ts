export type LedgerStatus = "APPLIED" | "REJECTED";

export class LedgerRecord {
  constructor(
    public readonly transactionId: string,
    public readonly accountId: number,
    public readonly amount: string,
    public readonly status: LedgerStatus,
    public readonly appliedAt: Date
  ) {}

  matches(accountId: number, amount: string): boolean {
    return this.accountId === accountId && this.amount === amount;
  }
}
