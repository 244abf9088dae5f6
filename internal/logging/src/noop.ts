import type { Fields, Logger } from "./interface"

export class NoopLogger implements Logger {
  public debug(_message: string, _fields?: Fields): void {}
  public emit(_message: string, _fields?: Fields): void {}
  public info(_message: string, _fields?: Fields): void {}
  public warn(_message: string, _fields?: Fields): void {}
  public error(_message: string, _fields?: Fields): void {}
  public async flush(): Promise<void> {}
}
