import type { DivergenceFlag } from "@peerline/db/validators"
import { Ok, type Result } from "@peerline/error"
import type { StorageError } from "../../errors"
import type { DivergenceStore } from "../store"

export class MemoryDivergenceStore implements DivergenceStore {
  readonly name = "memory"
  readonly flags = new Map<string, DivergenceFlag>()

  async flag(flag: DivergenceFlag): Promise<Result<void, StorageError>> {
    if (!this.flags.has(flag.userId)) this.flags.set(flag.userId, { ...flag })
    return Ok(undefined)
  }

  async list({ limit }: { limit: number }): Promise<Result<string[], StorageError>> {
    const users = [...this.flags.values()]
      .sort((a, b) => a.sinceM - b.sinceM)
      .slice(0, limit)
      .map((flag) => flag.userId)
    return Ok(users)
  }

  async clear({ userId, before }: { userId: string; before: number }): Promise<Result<void, StorageError>> {
    const flag = this.flags.get(userId)
    if (flag && flag.sinceM <= before) this.flags.delete(userId)
    return Ok(undefined)
  }
}
