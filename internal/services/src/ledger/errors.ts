import { BaseError } from "@peerline/error"

export type LedgerErrorCode =
  | "NOT_FOUND"
  | "INVALID_EXTENSION"
  | "INVALID_CREDIT"
  | "DUPLICATE_CREDIT"
  | "NOT_YET_EXPIRED"
  | "TRIAL_ALREADY_USED"
  | "STORAGE"

export class LedgerError extends BaseError<{ userId: string; [more: string]: unknown }> {
  public readonly retry: boolean
  public readonly name = LedgerError.name
  public readonly code: LedgerErrorCode

  constructor({
    code,
    message,
    userId,
    cause,
    context,
  }: {
    code: LedgerErrorCode
    message: string
    userId: string
    cause?: BaseError
    context?: Record<string, unknown>
  }) {
    super({ message, cause, context: { ...context, userId } })
    this.code = code
    this.retry = code === "STORAGE"
  }
}
