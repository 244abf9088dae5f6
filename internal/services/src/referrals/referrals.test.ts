import { SECONDS_PER_DAY } from "@peerline/config"
import { beforeEach, describe, expect, it } from "vitest"
import { type MemoryProvisioning, createMemoryProvisioning } from "../test-utils"

const T0 = 1_800_000_000_000
const INVITER = "usr_inviter"
const INVITED = "usr_invited"
const BONUS_SECONDS = 7 * SECONDS_PER_DAY

describe("ReferralService", () => {
  let p: MemoryProvisioning

  beforeEach(() => {
    p = createMemoryProvisioning({ now: T0 })
  })

  it("refuses self-invitations", async () => {
    const { err } = await p.referrals.register({ inviterId: INVITER, invitedId: INVITER, now: T0 })
    expect(err?.code).toBe("SELF_REFERRAL")
  })

  it("records one invitation per invited user", async () => {
    const first = await p.referrals.register({ inviterId: INVITER, invitedId: INVITED, now: T0 })
    const second = await p.referrals.register({ inviterId: "usr_other", invitedId: INVITED, now: T0 })

    expect(first.val).toMatchObject({ inviterId: INVITER, invitedId: INVITED, bonusGrantedAtM: null })
    expect(second.val).toBeNull()
  })

  it("skips users who already took a trial", async () => {
    await p.submit({ kind: "activate", userId: INVITED, plan: "trial", extensionSeconds: 60 })

    const { val } = await p.referrals.register({ inviterId: INVITER, invitedId: INVITED, now: T0 })

    expect(val).toBeNull()
  })

  it("extends the inviter's subscription once", async () => {
    await p.submit({
      kind: "activate",
      userId: INVITER,
      plan: "standard",
      extensionSeconds: 30 * SECONDS_PER_DAY,
    })
    await p.referrals.register({ inviterId: INVITER, invitedId: INVITED, now: T0 })

    const first = await p.referrals.grantBonus({ invitedId: INVITED, seconds: BONUS_SECONDS, now: T0 })
    const second = await p.referrals.grantBonus({ invitedId: INVITED, seconds: BONUS_SECONDS, now: T0 })

    expect(first.val).toMatchObject({ granted: true, inviterId: INVITER })
    expect(second.val).toEqual({ granted: false, reason: "already_granted", outcome: null })

    const { val } = await p.ledger.get(INVITER)
    expect(val?.activeUntil).toBe(T0 + 37 * SECONDS_PER_DAY * 1000)
    expect(val?.referralCreditSeconds).toBe(BONUS_SECONDS)
  })

  it("opens a standard subscription for an inviter without one", async () => {
    await p.referrals.register({ inviterId: INVITER, invitedId: INVITED, now: T0 })

    const { val } = await p.referrals.grantBonus({ invitedId: INVITED, seconds: BONUS_SECONDS, now: T0 })

    expect(val?.granted).toBe(true)
    const { val: subscription } = await p.ledger.get(INVITER)
    expect(subscription).toMatchObject({
      plan: "standard",
      status: "active",
      activeUntil: T0 + BONUS_SECONDS * 1000,
    })
  })

  it("reports uninvited users", async () => {
    const { err } = await p.referrals.grantBonus({ invitedId: INVITED, seconds: 60, now: T0 })
    expect(err?.code).toBe("NOT_FOUND")
  })
})
