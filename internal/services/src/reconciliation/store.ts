import type { DivergenceFlag } from "@peerline/db/validators"
import type { Result } from "@peerline/error"
import type { StorageError } from "../errors"

/**
 * Durable divergence flags, so a user flagged by one worker is reconciled
 * by the next sweep wherever it runs
 */
export interface DivergenceStore {
  readonly name: string

  /**
   * Keeps the existing flag when the user is already flagged
   */
  flag(flag: DivergenceFlag): Promise<Result<void, StorageError>>

  /**
   * Flagged users, oldest first
   */
  list(params: { limit: number }): Promise<Result<string[], StorageError>>

  /**
   * Clears the flag unless it was raised after `before`
   */
  clear(params: { userId: string; before: number }): Promise<Result<void, StorageError>>
}
