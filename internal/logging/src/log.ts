import { z } from "zod"

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const

export const logSchema = z.object({
  type: z.enum(["log", "event"]),
  requestId: z.string(),
  time: z.number(),
  level: z.enum(LOG_LEVELS),
  message: z.string(),
  context: z.record(z.string(), z.unknown()).default({}),
  environment: z.enum(["development", "production", "test"]),
  service: z.enum(["orchestrator", "scheduler", "reconciler", "gateway", "jobs", "referrals"]),
})

export type LogSchema = z.infer<typeof logSchema>

export class Log<TLog extends LogSchema = LogSchema> {
  public readonly log: TLog

  constructor(log: TLog) {
    this.log = log
  }

  public toString(): string {
    return JSON.stringify(this.log, (_key, value: unknown) => {
      // errors serialize to {} otherwise
      if (value instanceof Error) {
        return { name: value.name, message: value.message }
      }
      return value
    })
  }
}
