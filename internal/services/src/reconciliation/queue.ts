import { Ok, type Result } from "@peerline/error"
import type { Logger } from "@peerline/logging"
import type { StorageError } from "../errors"
import type { DivergenceStore } from "./store"

/**
 * Users whose local records may disagree with the appliance. Entries are
 * deduplicated, the first reason is kept. With a store every flag is also
 * written through, so other workers see it.
 */
export class DivergenceQueue {
  private readonly pending = new Map<string, { reason: string; since: number }>()
  private readonly store: DivergenceStore | null
  private readonly logger: Logger | null
  private readonly waitUntil: (promise: Promise<unknown>) => void
  private readonly clock: () => number

  constructor({
    store,
    logger,
    waitUntil = () => {},
    clock = Date.now,
  }: {
    store?: DivergenceStore
    logger?: Logger
    waitUntil?: (promise: Promise<unknown>) => void
    clock?: () => number
  } = {}) {
    this.store = store ?? null
    this.logger = logger ?? null
    this.waitUntil = waitUntil
    this.clock = clock
  }

  private persist(operation: string, userId: string, write: Promise<Result<void, StorageError>>) {
    this.waitUntil(
      write.then(({ err }) => {
        if (err) {
          this.logger?.error(`divergence ${operation} not persisted`, { userId, error: err.message })
        }
      })
    )
  }

  public enqueue(userId: string, reason: string, at = this.clock()): void {
    if (this.pending.has(userId)) return
    this.pending.set(userId, { reason, since: at })

    if (this.store) {
      this.persist("flag", userId, this.store.flag({ userId, reason, sinceM: at }))
    }
  }

  /**
   * Clears the user once reconciled, a flag raised after `before` stays
   */
  public resolve(userId: string, before: number): void {
    const entry = this.pending.get(userId)
    if (entry && entry.since <= before) this.pending.delete(userId)

    if (this.store) {
      this.persist("clear", userId, this.store.clear({ userId, before }))
    }
  }

  public has(userId: string): boolean {
    return this.pending.has(userId)
  }

  public get size(): number {
    return this.pending.size
  }

  /**
   * Removes and returns up to `limit` users, oldest first
   */
  public drain(limit = Number.POSITIVE_INFINITY): string[] {
    const users: string[] = []
    for (const userId of this.pending.keys()) {
      if (users.length >= limit) break
      users.push(userId)
    }
    for (const userId of users) this.pending.delete(userId)
    return users
  }

  /**
   * Users flagged by any worker. Without a store only this process's queue
   * is known.
   */
  public async flagged({ limit }: { limit: number }): Promise<Result<string[], StorageError>> {
    if (this.store) return this.store.list({ limit })
    return Ok([...this.pending.keys()].slice(0, limit))
  }
}
