import { BaseError } from "@peerline/error"

export type ReferralErrorCode = "SELF_REFERRAL" | "NOT_FOUND" | "STORAGE"

export class ReferralError extends BaseError<{ invitedId: string }> {
  public readonly retry: boolean
  public readonly name = ReferralError.name
  public readonly code: ReferralErrorCode

  constructor({
    code,
    message,
    invitedId,
    cause,
  }: {
    code: ReferralErrorCode
    message: string
    invitedId: string
    cause?: BaseError
  }) {
    super({ message, cause, context: { invitedId } })
    this.code = code
    this.retry = code === "STORAGE"
  }
}
