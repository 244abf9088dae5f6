import { BaseError } from "@peerline/error"

export type ProvisioningErrorCode = "UNAVAILABLE" | "REJECTED"

/**
 * UNAVAILABLE: transient failures outlasted the retry budget.
 * REJECTED: the appliance refused the call, retrying will not help.
 */
export class ProvisioningError extends BaseError<{
  operation: string
  attempts: number
  [more: string]: unknown
}> {
  public readonly retry: boolean
  public readonly name = ProvisioningError.name
  public readonly code: ProvisioningErrorCode

  constructor({
    code,
    message,
    operation,
    attempts,
    cause,
  }: {
    code: ProvisioningErrorCode
    message: string
    operation: string
    attempts: number
    cause?: BaseError
  }) {
    super({ message, cause, context: { operation, attempts } })
    this.code = code
    this.retry = code === "UNAVAILABLE"
  }
}
