export type { NotificationEvent, NotificationSink } from "./events"
export { LoggerNotificationSink, NoopNotificationSink } from "./sinks"
