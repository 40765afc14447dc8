import { z } from "zod";
import { PaymentEvent, WebhookDelivery } from "../../domain/entities/PaymentEvent";
import {
  fitsMoneyPrecision,
  isPositiveMoney,
  MONEY_MAX_INTEGER_DIGITS,
  MoneyValidationError,
  normalizeMoney
} from "../../../shared/money";

const MAX_TRANSACTION_ID_LENGTH = 100;
const MAX_INTEGER_ID = 2_147_483_647;

const paymentEventSchema = z.object({
  transaction_id: z
    .string()
    .min(1)
    // VARCHAR length counts code points, not UTF-16 units.
    .refine(
      (value) => [...value].length <= MAX_TRANSACTION_ID_LENGTH,
      `must contain at most ${MAX_TRANSACTION_ID_LENGTH} characters`
    )
    .refine((value) => !value.includes("\u0000"), "must not contain NUL characters"),
  user_id: z.number().int().positive().max(MAX_INTEGER_ID),
  account_id: z.number().int().positive().max(MAX_INTEGER_ID),
  amount: z.union([z.number(), z.string()])
});

export type PaymentEventParseResult =
  | { success: true; event: PaymentEvent }
  | { success: false; reason: string };

/**
 * The amount is taken from the signed literal rather than the parsed body so
 * that `100.50` is credited as written and never passes through a float.
 */
export const parsePaymentEvent = (delivery: WebhookDelivery): PaymentEventParseResult => {
  const parsed = paymentEventSchema.safeParse(delivery.body);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue.path.length > 0 ? issue.path.join(".") : "body";
    return { success: false, reason: `${field}: ${issue.message}` };
  }

  let amount: string;
  try {
    amount = normalizeMoney(delivery.signedFields.amount ?? String(parsed.data.amount));
  } catch (error) {
    if (error instanceof MoneyValidationError) {
      return { success: false, reason: `amount: ${error.message}` };
    }
    throw error;
  }
  if (!isPositiveMoney(amount)) {
    return { success: false, reason: "amount: must be greater than zero" };
  }
  if (!fitsMoneyPrecision(amount)) {
    return {
      success: false,
      reason: `amount: must have at most ${MONEY_MAX_INTEGER_DIGITS} integer digits`
    };
  }

  return {
    success: true,
    event: {
      transactionId: parsed.data.transaction_id,
      userId: parsed.data.user_id,
      accountId: parsed.data.account_id,
      amount
    }
  };
};
