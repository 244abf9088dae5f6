import { describe, expect, it } from "vitest"

import type { Database } from "@peerline/db"
import type { Subscription } from "@peerline/db/validators"
import { NoopLogger } from "@peerline/logging"
import { StorageError } from "../../errors"
import { createMockSubscription } from "../../test-utils"
import { DrizzleSubscriptionRepository } from "./drizzle"

const T0 = 1_800_000_000_000

// one subscription row and the applied credit ids, where clauses are not evaluated
function createFakeDb(initial: Subscription | null) {
  let row = initial
  const credits = new Set<string>()
  const writes: Partial<Subscription>[] = []

  const replica = () => {
    throw new Error("read went to a replica")
  }

  const update = (_table: unknown) => ({
    set: (s: Partial<Subscription>) => ({
      where: (_w: unknown) => ({
        returning: async () => {
          writes.push(s)
          if (!row) return []
          row = { ...row, ...s }
          return [row]
        },
      }),
    }),
  })

  const query = {
    subscriptions: { findFirst: async (_opts?: unknown) => row ?? undefined },
  }

  const tx = {
    query,
    update,
    insert: (_table: unknown) => ({
      values: (v: { id: string }) => ({
        onConflictDoNothing: (_opts?: unknown) => ({
          returning: async (_sel?: unknown) => {
            if (credits.has(v.id)) return []
            credits.add(v.id)
            return [{ id: v.id }]
          },
        }),
      }),
    }),
  }

  const db = {
    $primary: { query },
    query: { subscriptions: { findFirst: replica } },
    update,
    select: () => ({
      from: (_table: unknown) => ({
        where: (_w: unknown) => ({
          orderBy: (_o: unknown) => ({
            limit: async (_n: number) => (row ? [row] : []),
          }),
        }),
      }),
    }),
    transaction: async <T>(run: (t: typeof tx) => Promise<T>) => run(tx),
    __debug: { row: () => row, writes, credits },
  }

  return db
}

function createRepository(fake: ReturnType<typeof createFakeDb>) {
  return new DrizzleSubscriptionRepository({
    db: fake as unknown as Database,
    logger: new NoopLogger(),
  })
}

describe("DrizzleSubscriptionRepository", () => {
  const subscription = createMockSubscription({ userId: "usr_1" }, T0)

  it("reads the subscription from the primary", async () => {
    const repository = createRepository(createFakeDb(subscription))

    const { val, err } = await repository.find("usr_1")

    expect(err).toBeUndefined()
    expect(val).toEqual(subscription)
  })

  it("returns null for an unknown user", async () => {
    const repository = createRepository(createFakeDb(null))

    const { val } = await repository.find("usr_1")

    expect(val).toBeNull()
  })

  it("stamps updatedAtM on every update", async () => {
    const fake = createFakeDb(subscription)
    const repository = createRepository(fake)

    const { val } = await repository.update({
      userId: "usr_1",
      patch: { status: "grace" },
      now: T0 + 1_000,
    })

    expect(fake.__debug.writes).toEqual([{ status: "grace", updatedAtM: T0 + 1_000 }])
    expect(val).toMatchObject({ status: "grace", updatedAtM: T0 + 1_000 })
  })

  it("lists due subscriptions from the replica", async () => {
    const repository = createRepository(createFakeDb(subscription))

    const { val } = await repository.listDue({ now: T0, limit: 10 })

    expect(val).toEqual([subscription])
  })

  it("records a credit event and applies the patch in one transaction", async () => {
    const fake = createFakeDb(subscription)
    const repository = createRepository(fake)

    const { val } = await repository.applyCredit({
      userId: "usr_1",
      creditEventId: "referral:ref_1",
      seconds: 3_600,
      patch: { activeUntil: subscription.activeUntil + 3_600_000, referralCreditSeconds: 3_600 },
      now: T0,
    })

    expect(val).toEqual({
      applied: true,
      subscription: {
        ...subscription,
        activeUntil: subscription.activeUntil + 3_600_000,
        referralCreditSeconds: 3_600,
        updatedAtM: T0,
      },
    })
    expect([...fake.__debug.credits]).toEqual(["referral:ref_1"])
  })

  it("leaves the subscription alone for a credit event seen before", async () => {
    const fake = createFakeDb(subscription)
    const repository = createRepository(fake)
    const credit = {
      userId: "usr_1",
      creditEventId: "referral:ref_1",
      seconds: 3_600,
      patch: { referralCreditSeconds: 3_600 },
      now: T0,
    }

    await repository.applyCredit(credit)
    const { val } = await repository.applyCredit(credit)

    expect(val).toEqual({ applied: false, reason: "duplicate" })
    expect(fake.__debug.writes).toHaveLength(1)
  })

  it("reports a missing subscription without recording the credit", async () => {
    const fake = createFakeDb(null)
    const repository = createRepository(fake)

    const { val } = await repository.applyCredit({
      userId: "usr_1",
      creditEventId: "referral:ref_1",
      seconds: 60,
      patch: {},
      now: T0,
    })

    expect(val).toEqual({ applied: false, reason: "not_found" })
    expect(fake.__debug.credits.size).toBe(0)
  })

  it("turns a failed transaction into a storage error", async () => {
    const fake = createFakeDb(subscription)
    fake.transaction = async () => {
      throw new Error("connection reset")
    }
    const repository = createRepository(fake)

    const { err } = await repository.applyCredit({
      userId: "usr_1",
      creditEventId: "referral:ref_1",
      seconds: 60,
      patch: {},
      now: T0,
    })

    expect(err).toBeInstanceOf(StorageError)
    expect(err?.message).toBe("connection reset")
  })
})
