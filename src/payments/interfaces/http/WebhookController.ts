import { Request, Response } from "express";
import { ProcessPaymentWebhookUseCase } from "../../application/use-cases/ProcessPaymentWebhookUseCase";
import { SIGNED_FIELDS, SignedFields, WebhookDelivery } from "../../domain/entities/PaymentEvent";
import { AppError } from "../../../shared/http/AppError";
import { readTopLevelLiterals } from "./rawJson";

const parseJsonObject = (rawBody: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new AppError("INVALID_INPUT", 400, "body: malformed JSON");
    }
    throw error;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new AppError("INVALID_INPUT", 400, "body: expected a JSON object");
  }
  return { ...parsed };
};

export const toWebhookDelivery = (rawBody: unknown): WebhookDelivery => {
  if (typeof rawBody !== "string") {
    throw new AppError("INVALID_INPUT", 400, "body: expected application/json");
  }
  const body = parseJsonObject(rawBody);
  const literals = readTopLevelLiterals(rawBody);
  const signedFields: SignedFields = {};
  for (const field of SIGNED_FIELDS) {
    const literal = literals.get(field);
    if (literal) {
      signedFields[field] = literal.text;
    }
  }
  return { signedFields, signature: body.signature, body };
};

export class WebhookController {
  constructor(private readonly processPaymentWebhookUseCase: ProcessPaymentWebhookUseCase) {}

  handlePayment = async (req: Request, res: Response): Promise<void> => {
    const delivery = toWebhookDelivery(req.body);
    const result = await this.processPaymentWebhookUseCase.execute(delivery);
    res.status(200).json({
      status: result.status,
      transaction_id: result.transactionId
    });
  };
}
