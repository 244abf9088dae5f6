import { task } from "@trigger.dev/sdk/v3"
import { ExpiryScheduler } from "@peerline/services/scheduler"
import { createIntent } from "@peerline/services/orchestrator"
import { createContext } from "./context"

export const expireTask = task({
  id: "subscription.expire.task",
  retry: {
    maxAttempts: 3,
  },
  run: async (
    {
      userId,
      activeUntil,
      now,
    }: {
      userId: string
      activeUntil: number
      now: number
    },
    { ctx }
  ) => {
    const context = createContext({
      taskId: ctx.task.id,
      defaultFields: {
        userId,
        api: "jobs.subscription.expire.task",
        now: now.toString(),
      },
    })

    const outcome = await context.orchestrator.submitIntent(
      createIntent(
        {
          kind: "expire",
          userId,
          idempotencyKey: ExpiryScheduler.expireKey({ userId, activeUntil }),
        },
        now
      )
    )

    await context.flush()

    // grace or an unreachable appliance, the next sweep picks the user up again
    if (outcome.status === "failed") {
      context.logger.warn("expiry left for the next sweep", {
        userId,
        reason: outcome.reason,
        unresolvedPeers: outcome.unresolvedPeers,
      })
    }

    return {
      status: outcome.status,
      userId,
      now,
    }
  },
})
