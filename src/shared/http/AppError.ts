export type ErrorCode =
  | "INVALID_SIGNATURE"
  | "INVALID_INPUT"
  | "ACCOUNT_NOT_FOUND"
  | "TOO_MANY_REQUESTS"
  | "NOT_FOUND"
  | "STORAGE_FAILURE"
  | "INTERNAL";

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(message);
    this.name = "AppError";
  }
}
