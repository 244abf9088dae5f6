import type { PeerHandle } from "@peerline/db/validators"
import { Err, FetchError, Ok, type Result } from "@peerline/error"
import type { Fields, Logger } from "@peerline/logging"
import type { VpnControlPlane } from "./control-plane"
import { ProvisioningError } from "./errors"
import type { RetryPolicy } from "./retry"

/**
 * Every call to the appliance goes through here: a per-attempt timeout,
 * bounded retries with backoff, and a lookup before repeating an add whose
 * outcome is unknown when the appliance does not deduplicate.
 */
export class ProvisioningGateway {
  private readonly controlPlane: VpnControlPlane
  private readonly retry: RetryPolicy
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor({
    controlPlane,
    retry,
    timeoutMs,
    logger,
  }: {
    controlPlane: VpnControlPlane
    retry: RetryPolicy
    timeoutMs: number
    logger: Logger
  }) {
    this.controlPlane = controlPlane
    this.retry = retry
    this.timeoutMs = timeoutMs
    this.logger = logger
  }

  // one call with its own deadline, a timeout counts as an unknown outcome
  private async attempt<T>(
    operation: string,
    call: (signal: AbortSignal) => Promise<Result<T, FetchError>>,
    signal?: AbortSignal
  ): Promise<Result<T, FetchError>> {
    const controller = new AbortController()
    const onAbort = () => controller.abort()
    signal?.addEventListener("abort", onAbort, { once: true })

    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<Result<T, FetchError>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort()
        resolve(
          Err(
            new FetchError({
              message: `${operation} timed out after ${this.timeoutMs}ms`,
              retry: true,
              context: { url: this.controlPlane.name, method: operation },
            })
          )
        )
      }, this.timeoutMs)
    })

    const pending = call(controller.signal).catch((error: unknown) =>
      Err(
        new FetchError({
          message: error instanceof Error ? error.message : `${operation} failed`,
          retry: true,
          context: { url: this.controlPlane.name, method: operation },
        })
      )
    )

    try {
      return await Promise.race([pending, timeout])
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener("abort", onAbort)
    }
  }

  private async run<T>({
    operation,
    signal,
    fields,
    step,
  }: {
    operation: string
    signal?: AbortSignal
    fields: Fields
    step: () => Promise<Result<T, FetchError>>
  }): Promise<Result<T, ProvisioningError>> {
    let lastError: FetchError | undefined
    let attempts = 0

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        const slept = await this.retry.sleep(this.retry.delayAfter(attempt - 1), signal)
        if (!slept) break
      }

      if (signal?.aborted) break

      attempts = attempt
      const result = await step()
      if (!result.err) return result

      lastError = result.err

      if (!result.err.retry) {
        this.logger.warn(`${operation} rejected by the appliance`, {
          ...fields,
          attempt,
          error: result.err.message,
        })
        return Err(
          new ProvisioningError({
            code: "REJECTED",
            message: `${operation} rejected`,
            operation,
            attempts,
            cause: result.err,
          })
        )
      }

      this.logger.warn(`${operation} failed, retrying`, {
        ...fields,
        attempt,
        maxAttempts: this.retry.maxAttempts,
        error: result.err.message,
      })
    }

    this.logger.error(`${operation} unavailable`, {
      ...fields,
      attempts,
      aborted: signal?.aborted ?? false,
      error: lastError?.message,
    })

    return Err(
      new ProvisioningError({
        code: "UNAVAILABLE",
        message: `${operation} unavailable`,
        operation,
        attempts,
        cause: lastError,
      })
    )
  }

  /**
   * Creates a peer. `verifyFirst` treats an earlier attempt under the same key
   * as unknown, so the first attempt looks the peer up before adding.
   */
  public async addPeer({
    userId,
    idempotencyKey,
    label,
    signal,
    verifyFirst = false,
  }: {
    userId: string
    idempotencyKey: string
    label?: string | null
    signal?: AbortSignal
    verifyFirst?: boolean
  }): Promise<Result<PeerHandle, ProvisioningError>> {
    let outcomeUnknown = verifyFirst

    return this.run({
      operation: "addPeer",
      signal,
      fields: { userId, idempotencyKey },
      step: async () => {
        if (outcomeUnknown && !this.controlPlane.deduplicates) {
          const listed = await this.attempt(
            "listPeers",
            (s) => this.controlPlane.listPeers({ userId, signal: s }),
            signal
          )
          if (listed.err) return listed

          const existing = listed.val.find((peer) => peer.idempotencyKey === idempotencyKey)
          if (existing) {
            this.logger.info("peer already created by an earlier attempt", {
              userId,
              idempotencyKey,
              remoteId: existing.remoteId,
            })
            return Ok(existing)
          }
        }

        const added = await this.attempt(
          "addPeer",
          (s) => this.controlPlane.addPeer({ userId, idempotencyKey, label, signal: s }),
          signal
        )
        if (added.err?.retry) outcomeUnknown = true
        return added
      },
    })
  }

  /**
   * Removing a peer the appliance does not know succeeds with `removed: false`
   */
  public async removePeer({
    remoteId,
    signal,
  }: {
    remoteId: string
    signal?: AbortSignal
  }): Promise<Result<{ removed: boolean }, ProvisioningError>> {
    return this.run({
      operation: "removePeer",
      signal,
      fields: { remoteId },
      step: () =>
        this.attempt("removePeer", (s) => this.controlPlane.removePeer({ remoteId, signal: s }), signal),
    })
  }

  public async listPeers({
    userId,
    signal,
  }: {
    userId: string
    signal?: AbortSignal
  }): Promise<Result<PeerHandle[], ProvisioningError>> {
    return this.run({
      operation: "listPeers",
      signal,
      fields: { userId },
      step: () =>
        this.attempt("listPeers", (s) => this.controlPlane.listPeers({ userId, signal: s }), signal),
    })
  }
}
