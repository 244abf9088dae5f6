import { logger, schedules } from "@trigger.dev/sdk/v3"
import { reconcileTask } from "../tasks/reconcile"
import { createContext } from "../tasks/context"

export const reconciliationSchedule = schedules.task({
  id: "peers.reconciliation",
  cron: {
    timezone: "UTC",
    pattern: process.env.NODE_ENV === "development" ? "*/5 * * * *" : "0 * * * *",
  },
  run: async (payload) => {
    const now = payload.timestamp.getTime()
    const context = createContext({
      taskId: payload.scheduleId,
      defaultFields: { api: "jobs.peers.reconciliation" },
    })

    // flags raised by any worker, then everyone holding live peers
    const flagged = await context.divergence.flagged({ limit: 1_000 })

    if (flagged.err) {
      throw flagged.err
    }

    const withPeers = await context.peers.listUsersWithPeers({ limit: 1_000 })

    if (withPeers.err) {
      throw withPeers.err
    }

    const userIds = [...new Set([...flagged.val, ...withPeers.val])]

    if (userIds.length === 0) {
      return {
        userIds: [],
      }
    }

    await reconcileTask.batchTrigger(userIds.map((userId) => ({ payload: { userId, now } })))

    logger.info(`Found ${userIds.length} users to reconcile`, {
      flagged: flagged.val.length,
    })

    return {
      userIds,
    }
  },
})
