import { BaseError } from "@peerline/error"

export type ReconciliationErrorCode = "REMOTE" | "STORAGE" | "BUSY" | "LOST"

export class ReconciliationError extends BaseError<{ userId: string; [more: string]: unknown }> {
  public readonly retry = true
  public readonly name = ReconciliationError.name
  public readonly code: ReconciliationErrorCode

  constructor({
    code,
    message,
    userId,
    cause,
  }: {
    code: ReconciliationErrorCode
    message: string
    userId: string
    cause?: BaseError
  }) {
    super({ message, cause, context: { userId } })
    this.code = code
  }
}
