import type { Logger } from "@peerline/logging"
import type { NotificationEvent, NotificationSink } from "./events"

export class NoopNotificationSink implements NotificationSink {
  async publish(_event: NotificationEvent): Promise<void> {}
}

/**
 * Emits every event as a structured log line for downstream consumers
 */
export class LoggerNotificationSink implements NotificationSink {
  private readonly logger: Logger

  constructor({ logger }: { logger: Logger }) {
    this.logger = logger
  }

  async publish(event: NotificationEvent): Promise<void> {
    this.logger.emit(event.type, { ...event })
  }
}
