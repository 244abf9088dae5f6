import { BaseError } from "@peerline/error"

/**
 * A repository call could not reach or write the store
 */
export class StorageError extends BaseError<{ operation: string; [more: string]: unknown }> {
  public readonly retry = true
  public readonly name = StorageError.name

  constructor({
    message,
    operation,
    context,
  }: {
    message: string
    operation: string
    context?: Record<string, unknown>
  }) {
    super({
      message,
      context: { ...context, operation },
    })
  }

  static from(operation: string, error: unknown, context?: Record<string, unknown>): StorageError {
    return new StorageError({
      message: error instanceof Error ? error.message : "unknown storage error",
      operation,
      context,
    })
  }
}
