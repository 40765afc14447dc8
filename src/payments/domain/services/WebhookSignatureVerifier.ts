import { createHash, timingSafeEqual } from "crypto";
import { SIGNED_FIELDS, SignedField, SignedFields } from "../entities/PaymentEvent";

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Signed string: `{account_id}{amount}{transaction_id}{user_id}{secret}`, with
 * no delimiter between fields. Kept bit-compatible with the processor even
 * though `1` + `23` and `12` + `3` produce the same prefix.
 */
const buildSignatureBase = (fields: SignedFields, sharedSecret: string): string | null => {
  const values: string[] = [];
  for (const field of SIGNED_FIELDS) {
    const value = fields[field];
    if (value === undefined) {
      return null;
    }
    values.push(value);
  }
  return `${values.join("")}${sharedSecret}`;
};

const digest = (base: string): Buffer => createHash("sha256").update(base, "utf8").digest();

export const computeWebhookSignature = (
  fields: Record<SignedField, string>,
  sharedSecret: string
): string => {
  const base = buildSignatureBase(fields, sharedSecret);
  if (base === null) {
    throw new Error("All signed fields are required");
  }
  return digest(base).toString("hex");
};

export const verifyWebhookSignature = (
  fields: SignedFields,
  signature: unknown,
  sharedSecret: string
): boolean => {
  if (typeof signature !== "string" || !SIGNATURE_PATTERN.test(signature)) {
    return false;
  }
  const base = buildSignatureBase(fields, sharedSecret);
  if (base === null) {
    return false;
  }
  return timingSafeEqual(digest(base), Buffer.from(signature, "hex"));
};

export class WebhookSignatureVerifier {
  constructor(private readonly sharedSecret: string) {
    if (sharedSecret.length === 0) {
      throw new Error("Webhook secret must not be empty");
    }
  }

  verify(fields: SignedFields, signature: unknown): boolean {
    return verifyWebhookSignature(fields, signature, this.sharedSecret);
  }
}
