export const SIGNED_FIELDS = ["account_id", "amount", "transaction_id", "user_id"] as const;

export type SignedField = (typeof SIGNED_FIELDS)[number];

// Literal text of each signed field exactly as it appeared in the request body.
export type SignedFields = Partial<Record<SignedField, string>>;

export type WebhookDelivery = {
  signedFields: SignedFields;
  signature: unknown;
  body: unknown;
};

export type PaymentEvent = {
  transactionId: string;
  userId: number;
  accountId: number;
  amount: string;
};
