/**
 * Shared store behind the lock manager. `acquire` is set-if-absent with a
 * TTL that may take over an expired holder, `release` is compare-and-delete.
 * Every successful acquire yields a fence larger than any earlier one for the
 * same resource.
 */
export interface LockStore {
  readonly name: string

  acquire(params: {
    resource: string
    token: string
    ttlMs: number
    now: number
  }): Promise<{ fence: number } | null>

  extend(params: { resource: string; token: string; ttlMs: number; now: number }): Promise<boolean>

  release(params: { resource: string; token: string }): Promise<boolean>

  /**
   * Whether token and fence still name the current, unexpired holder
   */
  validate(params: { resource: string; token: string; fence: number; now: number }): Promise<boolean>
}
