import { BaseError } from "@peerline/error"

export type OrchestratorErrorCode = "MACHINE" | "MISROUTED"

export class OrchestratorError extends BaseError<{ [more: string]: unknown }> {
  public readonly retry = true
  public readonly name = OrchestratorError.name
  public readonly code: OrchestratorErrorCode

  constructor({
    code,
    message,
    context,
    cause,
  }: {
    code: OrchestratorErrorCode
    message: string
    context?: Record<string, unknown>
    cause?: BaseError
  }) {
    super({ message, context, cause })
    this.code = code
  }
}
