import { describe, expect, it } from "vitest"

import type { Database } from "@peerline/db"
import type { Referral } from "@peerline/db/validators"
import { NoopLogger } from "@peerline/logging"
import { DrizzleReferralRepository } from "./drizzle"

const T0 = 1_800_000_000_000

const referral: Referral = {
  id: "ref_1",
  inviterId: "usr_inviter",
  invitedId: "usr_invited",
  bonusGrantedAtM: null,
  createdAtM: T0,
}

// referrals keyed by invited user, where clauses are not evaluated
function createFakeDb() {
  const rows = new Map<string, Referral>()

  const db = {
    $primary: {
      query: {
        referrals: { findFirst: async (_opts?: unknown) => rows.get("usr_invited") },
      },
    },
    query: {
      referrals: {
        findFirst: () => {
          throw new Error("read went to a replica")
        },
      },
    },
    insert: (_table: unknown) => ({
      values: (v: Referral) => ({
        onConflictDoNothing: (_opts?: unknown) => ({
          returning: async () => {
            if (rows.has(v.invitedId)) return []
            rows.set(v.invitedId, v)
            return [v]
          },
        }),
      }),
    }),
    update: (_table: unknown) => ({
      set: (s: Partial<Referral>) => ({
        where: (_w: unknown) => ({
          returning: async () => {
            const current = rows.get("usr_invited")
            if (!current) return []
            const next = { ...current, ...s }
            rows.set(next.invitedId, next)
            return [next]
          },
        }),
      }),
    }),
  }

  return db
}

function createRepository() {
  return new DrizzleReferralRepository({
    db: createFakeDb() as unknown as Database,
    logger: new NoopLogger(),
  })
}

describe("DrizzleReferralRepository", () => {
  it("stores an invitation once per invited user", async () => {
    const repository = createRepository()

    const first = await repository.insert(referral)
    const second = await repository.insert({ ...referral, id: "ref_2", inviterId: "usr_other" })

    expect(first.val).toEqual(referral)
    expect(second.val).toBeNull()
    expect((await repository.findByInvited("usr_invited")).val).toEqual(referral)
  })

  it("marks the bonus as granted", async () => {
    const repository = createRepository()
    await repository.insert(referral)

    const { val } = await repository.markBonusGranted({ id: "ref_1", now: T0 + 1_000 })

    expect(val).toEqual({ ...referral, bonusGrantedAtM: T0 + 1_000 })
  })

  it("returns null when the referral is gone", async () => {
    const repository = createRepository()

    const { val } = await repository.markBonusGranted({ id: "ref_1", now: T0 })

    expect(val).toBeNull()
  })
})
