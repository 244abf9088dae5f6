import type { IntentRecord } from "@peerline/db/validators"
import type { Result } from "@peerline/error"
import type { StorageError } from "../errors"

/**
 * Terminal outcomes by idempotency key. Only committed and rejected outcomes
 * are written, a failed intent stays retryable under its key.
 */
export interface IntentStore {
  readonly name: string

  find(idempotencyKey: string): Promise<Result<IntentRecord | null, StorageError>>

  /**
   * First write for a key wins
   */
  record(record: IntentRecord): Promise<Result<void, StorageError>>
}
