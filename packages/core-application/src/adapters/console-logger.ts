import type { LogFields, Logger, LogLevel } from "../ports/logger";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type ConsoleSink = Pick<Console, "log" | "error">;

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: ConsoleSink = console,
    private readonly now: () => Date = () => new Date()
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const rest = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
    const line = `${this.now().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}${rest}`;
    // warn/error vão para stderr
    if (level === "warn" || level === "error") this.sink.error(line);
    else this.sink.log(line);
  }
}
