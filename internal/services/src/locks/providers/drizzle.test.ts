import { describe, expect, it } from "vitest"

import type { Database } from "@peerline/db"
import { DrizzleLockStore } from "./drizzle"

type Row = { ownerToken: string; fence: number; expiresAt: number }

// single-resource stand-in for the query builder, where clauses are not evaluated
function createFakeDb() {
  let row: Row | null = null

  const db = {
    insert: (_table: unknown) => ({
      values: (v: Record<string, unknown>) => ({
        onConflictDoNothing: (_opts?: unknown) => ({
          returning: async (_sel?: unknown) => {
            if (row) return []
            row = {
              ownerToken: String(v.ownerToken),
              fence: Number(v.fence),
              expiresAt: Number(v.expiresAt),
            }
            return [{ fence: row.fence }]
          },
        }),
      }),
    }),
    update: (_table: unknown) => ({
      set: (s: Record<string, unknown>) => ({
        where: (_w: unknown) => ({
          returning: async (_sel?: unknown) => {
            const now = Number(s.updatedAtM)
            if (!row) return []
            // takeover path
            if (s.ownerToken !== undefined) {
              if (row.expiresAt > now) return []
              row = {
                ownerToken: String(s.ownerToken),
                fence: Math.max(row.fence + 1, now),
                expiresAt: Number(s.expiresAt),
              }
              return [{ fence: row.fence }]
            }
            // extend path
            if (row.expiresAt <= now) return []
            row = { ...row, expiresAt: Number(s.expiresAt) }
            return [{ resource: "usr_1" }]
          },
        }),
      }),
    }),
    delete: (_table: unknown) => ({
      where: (_w: unknown) => ({
        returning: async (_sel?: unknown) => {
          const existed = row !== null
          row = null
          return existed ? [{ resource: "usr_1" }] : []
        },
      }),
    }),
    __debug: { row: () => row },
  }

  return db
}

describe("DrizzleLockStore", () => {
  const now = 1_800_000_000_000

  it("starts a fresh lock with the current time as fence", async () => {
    const fake = createFakeDb()
    const store = new DrizzleLockStore({ db: fake as unknown as Database })

    const acquired = await store.acquire({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now })

    expect(acquired).toEqual({ fence: now })
    expect(fake.__debug.row()?.ownerToken).toBe("tok_1")
  })

  it("refuses while the current holder has not expired", async () => {
    const fake = createFakeDb()
    const store = new DrizzleLockStore({ db: fake as unknown as Database })

    await store.acquire({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now })
    const second = await store.acquire({
      resource: "usr_1",
      token: "tok_2",
      ttlMs: 1_000,
      now: now + 500,
    })

    expect(second).toBeNull()
    expect(fake.__debug.row()?.ownerToken).toBe("tok_1")
  })

  it("takes over an expired lock with a larger fence", async () => {
    const fake = createFakeDb()
    const store = new DrizzleLockStore({ db: fake as unknown as Database })

    await store.acquire({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now })
    const taken = await store.acquire({
      resource: "usr_1",
      token: "tok_2",
      ttlMs: 1_000,
      now: now + 1_000,
    })

    expect(taken).toEqual({ fence: now + 1_000 })
    expect(fake.__debug.row()?.ownerToken).toBe("tok_2")
  })

  it("extends only before expiry", async () => {
    const fake = createFakeDb()
    const store = new DrizzleLockStore({ db: fake as unknown as Database })

    await store.acquire({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now })

    expect(
      await store.extend({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now: now + 900 })
    ).toBe(true)
    expect(fake.__debug.row()?.expiresAt).toBe(now + 1_900)
    expect(
      await store.extend({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now: now + 5_000 })
    ).toBe(false)
  })

  it("reports whether release removed a row", async () => {
    const fake = createFakeDb()
    const store = new DrizzleLockStore({ db: fake as unknown as Database })

    await store.acquire({ resource: "usr_1", token: "tok_1", ttlMs: 1_000, now })

    expect(await store.release({ resource: "usr_1", token: "tok_1" })).toBe(true)
    expect(await store.release({ resource: "usr_1", token: "tok_1" })).toBe(false)
  })
})
