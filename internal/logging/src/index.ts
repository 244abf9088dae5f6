export type { Fields, LogLevel, Logger } from "./interface"
export { ConsoleLogger } from "./console"
export { NoopLogger } from "./noop"
export { Log, logSchema, type LogSchema } from "./log"
