import { describe, expect, it } from "vitest"

import type { Database } from "@peerline/db"
import type { DivergenceFlag } from "@peerline/db/validators"
import { NoopLogger } from "@peerline/logging"
import { StorageError } from "../../errors"
import { DrizzleDivergenceStore } from "./drizzle"

// flag rows in insertion order, where clauses are not evaluated
function createFakeDb() {
  const rows = new Map<string, DivergenceFlag>()
  let deletes = 0

  const db = {
    insert: (_table: unknown) => ({
      values: (v: DivergenceFlag) => ({
        onConflictDoNothing: async (_opts?: unknown) => {
          if (!rows.has(v.userId)) rows.set(v.userId, v)
        },
      }),
    }),
    select: (_fields: unknown) => ({
      from: (_table: unknown) => ({
        orderBy: (_o: unknown) => ({
          limit: async (n: number) =>
            [...rows.values()].slice(0, n).map((row) => ({ userId: row.userId })),
        }),
      }),
    }),
    delete: (_table: unknown) => ({
      where: async (_w: unknown) => {
        deletes++
        throw new Error("connection reset")
      },
    }),
    __debug: { rows, deletes: () => deletes },
  }

  return db
}

describe("DrizzleDivergenceStore", () => {
  it("keeps the first flag per user and lists them", async () => {
    const fake = createFakeDb()
    const store = new DrizzleDivergenceStore({ db: fake as unknown as Database, logger: new NoopLogger() })

    await store.flag({ userId: "usr_1", reason: "lock lost before expiry", sinceM: 1 })
    await store.flag({ userId: "usr_1", reason: "peer add failed: rejected", sinceM: 2 })
    await store.flag({ userId: "usr_2", reason: "intent abandoned on timeout", sinceM: 3 })

    const { val } = await store.list({ limit: 10 })

    expect(val).toEqual(["usr_1", "usr_2"])
    expect(fake.__debug.rows.get("usr_1")?.reason).toBe("lock lost before expiry")
  })

  it("turns a failed clear into a storage error", async () => {
    const fake = createFakeDb()
    const store = new DrizzleDivergenceStore({ db: fake as unknown as Database, logger: new NoopLogger() })

    const { err } = await store.clear({ userId: "usr_1", before: 5 })

    expect(err).toBeInstanceOf(StorageError)
    expect(fake.__debug.deletes()).toBe(1)
  })
})
