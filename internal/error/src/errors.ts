import type { ZodError } from "zod"
import { BaseError } from "./base"

/**
 * Parsing a zod schema failed
 */
export class SchemaError extends BaseError<{ raw: unknown }> {
  public readonly retry = false
  public readonly name = SchemaError.name

  constructor(opts: { message: string; context?: { raw: unknown }; cause?: BaseError }) {
    super(opts)
  }

  static fromZod<T>(e: ZodError<T>, raw: unknown): SchemaError {
    return new SchemaError({
      message: e.message,
      context: {
        raw: JSON.stringify(raw),
      },
    })
  }
}

/**
 * A remote call failed before or while reading the response
 */
export class FetchError extends BaseError<{
  url: string
  method: string
  status?: number
  [more: string]: unknown
}> {
  public readonly retry: boolean
  public readonly name = FetchError.name

  constructor(opts: {
    message: string
    retry: boolean
    cause?: BaseError
    context?: {
      url: string
      method: string
      status?: number
      [more: string]: unknown
    }
  }) {
    super(opts)
    this.retry = opts.retry
  }
}
