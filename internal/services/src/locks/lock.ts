import { Err, Ok, type Result } from "@peerline/error"
import { LockError } from "./errors"
import type { LockStore } from "./store"

/**
 * A held lock. Check `assertHeld` right before every commit: the store may
 * have handed the resource to someone else after the TTL ran out.
 */
export class Lock {
  public readonly resource: string
  public readonly token: string
  public readonly fence: number
  public readonly ttlMs: number
  private readonly store: LockStore
  private readonly clock: () => number
  private released = false

  constructor({
    resource,
    token,
    fence,
    ttlMs,
    store,
    clock,
  }: {
    resource: string
    token: string
    fence: number
    ttlMs: number
    store: LockStore
    clock: () => number
  }) {
    this.resource = resource
    this.token = token
    this.fence = fence
    this.ttlMs = ttlMs
    this.store = store
    this.clock = clock
  }

  public get isReleased(): boolean {
    return this.released
  }

  public markReleased(): void {
    this.released = true
  }

  public async isHeld(): Promise<boolean> {
    if (this.released) return false
    return this.store.validate({
      resource: this.resource,
      token: this.token,
      fence: this.fence,
      now: this.clock(),
    })
  }

  public async assertHeld(): Promise<Result<void, LockError>> {
    let held: boolean
    try {
      held = await this.isHeld()
    } catch (error) {
      return Err(
        new LockError({
          code: "LOST",
          message: `could not confirm lock: ${error instanceof Error ? error.message : "unknown"}`,
          resource: this.resource,
          context: { fence: this.fence },
        })
      )
    }

    if (!held) {
      return Err(
        new LockError({
          code: "LOST",
          message: "lock no longer held",
          resource: this.resource,
          context: { fence: this.fence },
        })
      )
    }

    return Ok(undefined)
  }

  public async extend(): Promise<boolean> {
    if (this.released) return false
    return this.store.extend({
      resource: this.resource,
      token: this.token,
      ttlMs: this.ttlMs,
      now: this.clock(),
    })
  }
}
