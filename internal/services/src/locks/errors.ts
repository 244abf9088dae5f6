import { BaseError } from "@peerline/error"

export type LockErrorCode = "BUSY" | "LOST" | "STORE"

export class LockError extends BaseError<{ resource: string; [more: string]: unknown }> {
  public readonly retry: boolean
  public readonly name = LockError.name
  public readonly code: LockErrorCode

  constructor({
    code,
    message,
    resource,
    cause,
    context,
  }: {
    code: LockErrorCode
    message: string
    resource: string
    cause?: BaseError
    context?: Record<string, unknown>
  }) {
    super({ message, cause, context: { ...context, resource } })
    this.code = code
    this.retry = code !== "LOST"
  }
}
