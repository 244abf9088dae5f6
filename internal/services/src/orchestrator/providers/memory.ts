import type { IntentRecord } from "@peerline/db/validators"
import { Ok, type Result } from "@peerline/error"
import type { StorageError } from "../../errors"
import type { IntentStore } from "../store"

export class MemoryIntentStore implements IntentStore {
  readonly name = "memory"
  private readonly memory: Map<string, IntentRecord>

  constructor(opts: { memory?: Map<string, IntentRecord> } = {}) {
    this.memory = opts.memory ?? new Map()
  }

  async find(idempotencyKey: string): Promise<Result<IntentRecord | null, StorageError>> {
    const record = this.memory.get(idempotencyKey)
    return Ok(record ? { ...record } : null)
  }

  async record(record: IntentRecord): Promise<Result<void, StorageError>> {
    if (!this.memory.has(record.idempotencyKey)) {
      this.memory.set(record.idempotencyKey, { ...record })
    }
    return Ok(undefined)
  }
}
