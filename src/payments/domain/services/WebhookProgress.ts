export type WebhookStage =
  | "RECEIVED"
  | "SIGNATURE_CHECKED"
  | "ACCOUNT_VALIDATED"
  | "LEDGER_RESERVED"
  | "BALANCE_CREDITED"
  | "RECORDED"
  | "SIGNATURE_INVALID"
  | "VALIDATION_FAILED"
  | "ACCOUNT_MISMATCH"
  | "ALREADY_PROCESSED";

const TRANSITIONS: Record<WebhookStage, readonly WebhookStage[]> = {
  RECEIVED: ["SIGNATURE_CHECKED", "SIGNATURE_INVALID"],
  SIGNATURE_CHECKED: ["ACCOUNT_VALIDATED", "VALIDATION_FAILED", "ACCOUNT_MISMATCH"],
  ACCOUNT_VALIDATED: ["LEDGER_RESERVED", "ALREADY_PROCESSED"],
  // The credit re-checks ownership, and a racing delivery may win the ledger insert.
  LEDGER_RESERVED: ["BALANCE_CREDITED", "ACCOUNT_MISMATCH", "ALREADY_PROCESSED"],
  BALANCE_CREDITED: ["RECORDED", "ALREADY_PROCESSED"],
  RECORDED: [],
  SIGNATURE_INVALID: [],
  VALIDATION_FAILED: [],
  ACCOUNT_MISMATCH: [],
  ALREADY_PROCESSED: []
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: WebhookStage,
    public readonly to: WebhookStage
  ) {
    super(`Illegal webhook transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export const isTerminalStage = (stage: WebhookStage): boolean => TRANSITIONS[stage].length === 0;

export const canTransition = (from: WebhookStage, to: WebhookStage): boolean =>
  TRANSITIONS[from].includes(to);

/** Tracks one webhook delivery through its stages. */
export class WebhookProgress {
  private readonly stages: WebhookStage[] = ["RECEIVED"];

  get stage(): WebhookStage {
    return this.stages[this.stages.length - 1];
  }

  get trail(): WebhookStage[] {
    return [...this.stages];
  }

  get isTerminal(): boolean {
    return isTerminalStage(this.stage);
  }

  advance(to: WebhookStage): void {
    if (!canTransition(this.stage, to)) {
      throw new IllegalTransitionError(this.stage, to);
    }
    this.stages.push(to);
  }
}
