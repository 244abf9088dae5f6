import { logger, schedules } from "@trigger.dev/sdk/v3"
import { env } from "../../env"
import { expireTask } from "../tasks/expire"
import { createContext } from "../tasks/context"

export const expirySchedule = schedules.task({
  id: "subscription.expiry",
  cron: {
    timezone: "UTC",
    pattern: process.env.NODE_ENV === "development" ? "*/5 * * * *" : "*/10 * * * *",
  },
  run: async (payload) => {
    const now = payload.timestamp.getTime()
    const context = createContext({
      taskId: payload.scheduleId,
      defaultFields: { api: "jobs.subscription.expiry" },
    })

    // lock-free listing, each expire intent checks again under the lock
    const { val: due, err } = await context.ledger.listDue({ now, limit: env.EXPIRY_SWEEP_BATCH })

    if (err) {
      throw err
    }

    if (due.length === 0) {
      return {
        userIds: [],
      }
    }

    // trigger handles concurrency
    await expireTask.batchTrigger(
      due.map((s) => ({
        payload: {
          userId: s.userId,
          activeUntil: s.activeUntil,
          now,
        },
      }))
    )

    logger.info(`Found ${due.length} subscriptions due for expiry`)

    return {
      userIds: due.map((s) => s.userId),
    }
  },
})
