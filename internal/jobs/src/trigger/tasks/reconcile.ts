import { task } from "@trigger.dev/sdk/v3"
import { createContext } from "./context"

export const reconcileTask = task({
  id: "peers.reconcile.task",
  retry: {
    maxAttempts: 2,
  },
  run: async ({ userId, now }: { userId: string; now: number }, { ctx }) => {
    const context = createContext({
      taskId: ctx.task.id,
      defaultFields: {
        userId,
        api: "jobs.peers.reconcile.task",
        now: now.toString(),
      },
    })

    const { val, err } = await context.reconciler.reconcileUser(userId)
    await context.flush()

    if (err) {
      throw err
    }

    return val
  },
})
