import { describe, expect, it } from "vitest"

import type { Database } from "@peerline/db"
import type { IntentRecord } from "@peerline/db/validators"
import { NoopLogger } from "@peerline/logging"
import { StorageError } from "../../errors"
import { DrizzleIntentStore } from "./drizzle"

const record: IntentRecord = {
  idempotencyKey: "issue-1",
  intentId: "int_1",
  userId: "usr_1",
  kind: "issue",
  status: "committed",
  reason: null,
  peerId: "peer_1",
  createdAtM: 1_800_000_000_000,
}

// keyed rows on the primary, first insert per key wins; where clauses are not evaluated
function createFakeDb() {
  const rows = new Map<string, IntentRecord>()
  const conflictTargets: unknown[] = []

  const db = {
    $primary: {
      query: {
        provisioningIntents: {
          findFirst: async (_opts?: unknown) => rows.get("issue-1"),
        },
      },
    },
    query: {
      provisioningIntents: {
        findFirst: () => {
          throw new Error("read went to a replica")
        },
      },
    },
    insert: (_table: unknown) => ({
      values: (v: IntentRecord) => ({
        onConflictDoNothing: async (opts: { target: unknown }) => {
          conflictTargets.push(opts.target)
          if (!rows.has(v.idempotencyKey)) rows.set(v.idempotencyKey, v)
        },
      }),
    }),
    __debug: { rows, conflictTargets },
  }

  return db
}

describe("DrizzleIntentStore", () => {
  it("finds nothing before an outcome is recorded", async () => {
    const store = new DrizzleIntentStore({
      db: createFakeDb() as unknown as Database,
      logger: new NoopLogger(),
    })

    const { val, err } = await store.find("issue-1")

    expect(err).toBeUndefined()
    expect(val).toBeNull()
  })

  it("keeps the first outcome recorded under a key", async () => {
    const fake = createFakeDb()
    const store = new DrizzleIntentStore({ db: fake as unknown as Database, logger: new NoopLogger() })

    await store.record(record)
    await store.record({ ...record, intentId: "int_2", status: "rejected", reason: "QuotaExceeded" })

    const { val } = await store.find("issue-1")
    expect(val).toEqual(record)
    expect(fake.__debug.conflictTargets).toHaveLength(2)
  })

  it("turns a failed insert into a storage error", async () => {
    const fake = createFakeDb()
    fake.insert = () => {
      throw new Error("connection reset")
    }
    const store = new DrizzleIntentStore({ db: fake as unknown as Database, logger: new NoopLogger() })

    const { err } = await store.record(record)

    expect(err).toBeInstanceOf(StorageError)
    expect(err?.message).toBe("connection reset")
  })
})
