import { ConsoleLogger } from "@peerline/logging"
import { createProvisioningContext } from "@peerline/services/context"
import { env } from "../../env"
import { db } from "../db"

export const createContext = ({
  taskId,
  defaultFields,
}: {
  taskId: string
  defaultFields: Record<string, string> & {
    api: string
  }
}) => {
  const logger = new ConsoleLogger({
    requestId: taskId,
    environment: env.NODE_ENV,
    service: "jobs",
    logLevel: env.LOG_LEVEL,
    defaultFields: {
      ...defaultFields,
      requestId: taskId,
    },
  })

  // notifications are awaited here, the run ends with the task
  const pending: Promise<unknown>[] = []

  const provisioning = createProvisioningContext({
    db,
    logger,
    waitUntil: (promise) => {
      pending.push(promise)
    },
  })

  return {
    ...provisioning,
    logger,
    db,
    requestId: taskId,
    flush: async () => {
      await Promise.allSettled(pending)
      await logger.flush()
    },
  }
}
