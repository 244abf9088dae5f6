import { randomId } from "@peerline/db/utils"
import { Err, Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import { sleep } from "../utils/sleep"
import { LockError } from "./errors"
import { Lock } from "./lock"
import type { LockStore } from "./store"

export type AcquireOptions = {
  ttlMs?: number
  // wall-clock time to keep polling a busy lock
  waitMs?: number
  signal?: AbortSignal
}

/**
 * Per-resource mutual exclusion over a shared LockStore
 */
export class LockManager {
  private readonly store: LockStore
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly ttlMs: number
  private readonly waitMs: number
  private readonly pollMs: number
  private readonly heartbeat: boolean

  constructor({
    store,
    logger,
    clock = Date.now,
    ttlMs = 30_000,
    waitMs = 5_000,
    pollMs = 25,
    heartbeat = true,
  }: {
    store: LockStore
    logger: Logger
    clock?: () => number
    ttlMs?: number
    waitMs?: number
    pollMs?: number
    heartbeat?: boolean
  }) {
    this.store = store
    this.logger = logger
    this.clock = clock
    this.ttlMs = ttlMs
    this.waitMs = waitMs
    this.pollMs = Math.max(1, pollMs)
    this.heartbeat = heartbeat
  }

  public async acquire(resource: string, opts: AcquireOptions = {}): Promise<Result<Lock, LockError>> {
    const ttlMs = opts.ttlMs ?? this.ttlMs
    const waitMs = opts.waitMs ?? this.waitMs
    const token = randomId()
    const deadline = Date.now() + waitMs
    let attempts = 0

    while (true) {
      attempts++
      let acquired: { fence: number } | null

      try {
        acquired = await this.store.acquire({ resource, token, ttlMs, now: this.clock() })
      } catch (error) {
        this.logger.error("lock store unavailable", {
          resource,
          error: error instanceof Error ? error.message : "unknown",
        })
        return Err(
          new LockError({
            code: "STORE",
            message: "lock store unavailable",
            resource,
          })
        )
      }

      if (acquired) {
        return Ok(
          new Lock({
            resource,
            token,
            fence: acquired.fence,
            ttlMs,
            store: this.store,
            clock: this.clock,
          })
        )
      }

      if (opts.signal?.aborted || Date.now() + this.pollMs > deadline) break

      const slept = await sleep(this.pollMs, opts.signal)
      if (!slept) break
    }

    this.logger.debug("lock busy", { resource, attempts, waitMs })
    return Err(
      new LockError({
        code: "BUSY",
        message: "lock held by another worker",
        resource,
        context: { attempts, waitMs },
      })
    )
  }

  /**
   * Compare-and-delete, a lock already taken over by someone else is left alone
   */
  public async release(lock: Lock): Promise<void> {
    if (lock.isReleased) return
    lock.markReleased()

    try {
      const released = await this.store.release({ resource: lock.resource, token: lock.token })
      if (!released) {
        this.logger.warn("lock was already gone on release", {
          resource: lock.resource,
          fence: lock.fence,
        })
      }
    } catch (error) {
      // the TTL frees the row
      this.logger.error("lock release failed", {
        resource: lock.resource,
        error: error instanceof Error ? error.message : "unknown",
      })
    }
  }

  // keeps the lock alive during long runs, capped so a stuck run cannot hold it forever
  private startHeartbeat(lock: Lock): () => void {
    if (!this.heartbeat) return () => {}

    let stopped = false
    const startedAt = Date.now()
    const renewEveryMs = Math.max(1_000, Math.floor(lock.ttlMs / 2))
    const maxHoldMs = Math.max(lock.ttlMs * 10, 2 * 60_000)

    const interval = setInterval(() => {
      if (stopped) return
      if (Date.now() - startedAt > maxHoldMs) {
        this.logger.warn("lock heartbeat reached maxHoldMs; stopping renew", {
          resource: lock.resource,
          maxHoldMs,
        })
        stopped = true
        clearInterval(interval)
        return
      }

      lock.extend().then(
        (ok) => {
          if (!ok) {
            this.logger.warn("lock extend returned false; lock may be lost", {
              resource: lock.resource,
              fence: lock.fence,
            })
          }
        },
        (error: unknown) => {
          this.logger.error("lock heartbeat extend failed", {
            resource: lock.resource,
            error: error instanceof Error ? error.message : "unknown",
          })
        }
      )
    }, renewEveryMs)
    interval.unref()

    return () => {
      stopped = true
      clearInterval(interval)
    }
  }

  /**
   * Runs `run` while holding the lock and releases it on every exit path
   */
  public async withLock<T>(
    resource: string,
    run: (lock: Lock) => Promise<T>,
    opts: AcquireOptions = {}
  ): Promise<Result<T, LockError>> {
    const acquired = await this.acquire(resource, opts)
    if (acquired.err) return acquired

    const lock = acquired.val
    const stopHeartbeat = this.startHeartbeat(lock)

    try {
      return Ok(await run(lock))
    } finally {
      stopHeartbeat()
      await this.release(lock)
    }
  }
}
