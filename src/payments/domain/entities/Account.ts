export type AccountId = number;

export class Account {
  constructor(
    public readonly id: AccountId,
    public readonly ownerUserId: number,
    public readonly balance: string
  ) {}

  isOwnedBy(userId: number): boolean {
    return this.ownerUserId === userId;
  }
}
