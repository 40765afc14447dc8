import { PaymentEvent, WebhookDelivery } from "../../domain/entities/PaymentEvent";
import { LedgerRecord } from "../../domain/entities/LedgerRecord";
import { AccountNotFoundError, DuplicateTransactionError } from "../../domain/errors";
import { PaymentUnitOfWork, TransactionScope } from "../../domain/repositories/PaymentUnitOfWork";
import { WebhookSignatureVerifier } from "../../domain/services/WebhookSignatureVerifier";
import {
  IllegalTransitionError,
  WebhookProgress,
  WebhookStage
} from "../../domain/services/WebhookProgress";
import { parsePaymentEvent } from "../validation/paymentEvent";
import { AppError } from "../../../shared/http/AppError";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";
import { setTraceField } from "../../../shared/observability/trace";

export type WebhookStatus = "processed" | "already_processed";

export type ProcessPaymentWebhookOutput = {
  status: WebhookStatus;
  transactionId: string;
  /** Only set when this delivery applied the credit. */
  balance?: string;
  trail: WebhookStage[];
};

type TransactionOutcome =
  | { kind: "applied"; balance: string }
  | { kind: "duplicate"; record: LedgerRecord };

const STORAGE_FAILURE_OUTCOME = "STORAGE_FAILURE";
const STORAGE_RETRY_AFTER_SECONDS = 5;

export class ProcessPaymentWebhookUseCase {
  constructor(
    private readonly verifier: WebhookSignatureVerifier,
    private readonly unitOfWork: PaymentUnitOfWork,
    private readonly metrics: Pick<Metrics, "recordWebhookOutcome">,
    private readonly logger: Logger
  ) {}

  async execute(delivery: WebhookDelivery): Promise<ProcessPaymentWebhookOutput> {
    const progress = new WebhookProgress();
    try {
      return await this.process(delivery, progress);
    } finally {
      this.metrics.recordWebhookOutcome(
        progress.isTerminal ? progress.stage : STORAGE_FAILURE_OUTCOME
      );
    }
  }

  private async process(
    delivery: WebhookDelivery,
    progress: WebhookProgress
  ): Promise<ProcessPaymentWebhookOutput> {
    this.logger.info("Payment webhook received", {
      transactionId: delivery.signedFields.transaction_id
    });

    if (!this.verifier.verify(delivery.signedFields, delivery.signature)) {
      progress.advance("SIGNATURE_INVALID");
      this.logger.warn("Payment webhook signature rejected", {
        transactionId: delivery.signedFields.transaction_id
      });
      throw new AppError("INVALID_SIGNATURE", 401, "invalid signature");
    }
    progress.advance("SIGNATURE_CHECKED");

    const parsed = parsePaymentEvent(delivery);
    if (!parsed.success) {
      progress.advance("VALIDATION_FAILED");
      this.logger.warn("Payment webhook validation failed", { reason: parsed.reason });
      throw new AppError("INVALID_INPUT", 400, parsed.reason);
    }
    const event = parsed.event;
    setTraceField("transactionId", event.transactionId);

    let outcome: TransactionOutcome;
    try {
      outcome = await this.unitOfWork.runInTransaction((scope) =>
        this.apply(event, scope, progress)
      );
    } catch (error) {
      return this.resolveFailure(error, event, progress);
    }

    if (outcome.kind === "duplicate") {
      progress.advance("ALREADY_PROCESSED");
      if (!outcome.record.matches(event.accountId, event.amount)) {
        this.logger.warn("Payment webhook replay differs from ledger record", {
          recordedAccountId: outcome.record.accountId,
          recordedAmount: outcome.record.amount,
          accountId: event.accountId,
          amount: event.amount
        });
      }
      return this.acknowledge("already_processed", event, progress);
    }

    progress.advance("RECORDED");
    this.logger.info("Payment webhook processed", {
      accountId: event.accountId,
      amount: event.amount
    });
    return { ...this.acknowledge("processed", event, progress), balance: outcome.balance };
  }

  private async apply(
    event: PaymentEvent,
    { ledger, accounts }: TransactionScope,
    progress: WebhookProgress
  ): Promise<TransactionOutcome> {
    const account = await accounts.findById(event.accountId);
    if (!account || !account.isOwnedBy(event.userId)) {
      throw new AccountNotFoundError(event.accountId);
    }
    progress.advance("ACCOUNT_VALIDATED");

    const reservation = await ledger.tryReserve(event.transactionId);
    if (reservation.kind === "already_applied") {
      return { kind: "duplicate", record: reservation.record };
    }
    progress.advance("LEDGER_RESERVED");

    const balance = await accounts.creditAtomically(event.accountId, event.userId, event.amount);
    progress.advance("BALANCE_CREDITED");

    await ledger.record({
      transactionId: event.transactionId,
      accountId: event.accountId,
      amount: event.amount,
      status: "APPLIED"
    });
    return { kind: "applied", balance };
  }

  private resolveFailure(
    error: unknown,
    event: PaymentEvent,
    progress: WebhookProgress
  ): ProcessPaymentWebhookOutput {
    if (error instanceof DuplicateTransactionError) {
      progress.advance("ALREADY_PROCESSED");
      this.logger.info("Payment webhook lost ledger insert to a concurrent delivery");
      return this.acknowledge("already_processed", event, progress);
    }
    if (error instanceof AccountNotFoundError) {
      progress.advance("ACCOUNT_MISMATCH");
      this.logger.warn("Payment webhook account rejected", {
        accountId: event.accountId,
        userId: event.userId
      });
      throw new AppError("ACCOUNT_NOT_FOUND", 404, "account not found");
    }
    if (error instanceof IllegalTransitionError) {
      throw error;
    }
    this.logger.error("Payment webhook rolled back", {
      stage: progress.stage,
      error: String(error)
    });
    throw new AppError(
      "STORAGE_FAILURE",
      503,
      "payment could not be recorded, retry later",
      STORAGE_RETRY_AFTER_SECONDS
    );
  }

  private acknowledge(
    status: WebhookStatus,
    event: PaymentEvent,
    progress: WebhookProgress
  ): ProcessPaymentWebhookOutput {
    return { status, transactionId: event.transactionId, trail: progress.trail };
  }
}
