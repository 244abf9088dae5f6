import { sleep } from "../utils/sleep"

export type RetryPolicyOptions = {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  multiplier?: number
}

/**
 * Bounded attempts with exponential backoff between them
 */
export class RetryPolicy {
  public readonly maxAttempts: number
  private readonly baseDelayMs: number
  private readonly maxDelayMs: number
  private readonly multiplier: number

  constructor({ maxAttempts, baseDelayMs, maxDelayMs, multiplier = 2 }: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(maxAttempts))
    this.baseDelayMs = Math.max(0, baseDelayMs)
    this.maxDelayMs = Math.max(this.baseDelayMs, maxDelayMs)
    this.multiplier = multiplier
  }

  /**
   * Delay before the attempt following `attempt` (1-based)
   */
  public delayAfter(attempt: number): number {
    const delay = this.baseDelayMs * this.multiplier ** (attempt - 1)
    return Math.min(delay, this.maxDelayMs)
  }

  /**
   * Resolves false when the signal fires before the delay is over
   */
  public sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return sleep(ms, signal)
  }
}
