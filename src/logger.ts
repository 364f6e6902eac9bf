import fs from "node:fs";
import path from "node:path";

type LogLevel = "info" | "warn" | "error";

export type LoggerConfig = {
  logPath?: string;
  console?: boolean;
};

export class AppLogger {
  private readonly logPath: string | undefined;
  private readonly toConsole: boolean;

  constructor(config: LoggerConfig = {}) {
    this.logPath = config.logPath;
    this.toConsole = config.console ?? true;
    if (this.logPath) {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    }
  }

  info(event: string, payload?: Record<string, unknown>): void {
    this.write("info", event, payload);
  }

  warn(event: string, payload?: Record<string, unknown>): void {
    this.write("warn", event, payload);
  }

  error(event: string, payload?: Record<string, unknown>): void {
    this.write("error", event, payload);
  }

  private write(level: LogLevel, event: string, payload?: Record<string, unknown>): void {
    const entry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(payload ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.logPath) {
      fs.appendFileSync(this.logPath, line, "utf8");
    }
    if (this.toConsole) {
      // eslint-disable-next-line no-console
      console.log(line.trim());
    }
  }
}
