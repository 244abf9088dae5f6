import { Log, type LogSchema } from "./log"
import type { Fields, LogLevel, Logger } from "./interface"

type Level = LogSchema["level"]

const COLORS: Record<Level, string> = {
  debug: "\x1b[32m%s\x1b[0m",
  info: "\x1b[36m%s\x1b[0m",
  warn: "\x1b[33m%s\x1b[0m",
  error: "\x1b[31m%s\x1b[0m",
  fatal: "\x1b[31m%s\x1b[0m",
}

// levels each configured logLevel lets through
const ENABLED: Record<LogLevel, Level[]> = {
  debug: ["debug", "info", "warn", "error", "fatal"],
  info: ["info", "warn", "error", "fatal"],
  warn: ["warn", "error", "fatal"],
  error: ["error", "fatal"],
  off: [],
}

export class ConsoleLogger implements Logger {
  private requestId: string
  private readonly defaultFields: Fields
  private readonly environment: LogSchema["environment"]
  private readonly service: LogSchema["service"]
  private readonly logLevel: LogLevel
  private readonly write: (...args: unknown[]) => void

  constructor(opts: {
    requestId: string
    environment: LogSchema["environment"]
    service: LogSchema["service"]
    defaultFields?: Fields
    logLevel?: LogLevel
    write?: (...args: unknown[]) => void
  }) {
    this.requestId = opts.requestId
    this.environment = opts.environment
    this.service = opts.service
    this.defaultFields = opts.defaultFields ?? {}
    this.logLevel = opts.logLevel ?? "info"
    this.write = opts.write ?? console.log
  }

  private marshal(level: Level, message: string, fields?: Fields): string {
    return new Log({
      type: "log",
      requestId: this.requestId,
      time: Date.now(),
      level,
      message,
      context: { ...this.defaultFields, ...fields },
      environment: this.environment,
      service: this.service,
    }).toString()
  }

  private print(level: Level, message: string, fields?: Fields): void {
    if (!ENABLED[this.logLevel].includes(level)) return
    // don't show colored output in production mode because it's not readable
    if (this.environment === "production") {
      this.write(this.marshal(level, message, fields))
      return
    }
    this.write(COLORS[level], level, "-", this.marshal(level, message, fields))
  }

  public debug(message: string, fields?: Fields): void {
    this.print("debug", message, fields)
  }

  public emit(message: string, fields?: Fields): void {
    if (this.logLevel === "off") return
    this.write(
      new Log({
        type: "event",
        requestId: this.requestId,
        time: Date.now(),
        level: "info",
        message,
        context: { ...this.defaultFields, ...fields },
        environment: this.environment,
        service: this.service,
      }).toString()
    )
  }

  public info(message: string, fields?: Fields): void {
    this.print("info", message, fields)
  }

  public warn(message: string, fields?: Fields): void {
    this.print("warn", message, fields)
  }

  public error(message: string, fields?: Fields): void {
    this.print("error", message, fields)
  }

  public fatal(message: string, fields?: Fields): void {
    this.print("fatal", message, fields)
  }

  public async flush(): Promise<void> {
    return Promise.resolve()
  }

  public setRequestId(requestId: string): void {
    this.requestId = requestId
  }

  /**
   * Child logger sharing the sink, with extra default fields
   */
  public with(fields: Fields): ConsoleLogger {
    return new ConsoleLogger({
      requestId: this.requestId,
      environment: this.environment,
      service: this.service,
      logLevel: this.logLevel,
      defaultFields: { ...this.defaultFields, ...fields },
      write: this.write,
    })
  }
}
