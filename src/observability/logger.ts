import fs from "node:fs";
import path from "node:path";
import { LogFields, LogLevel } from "./types";

const PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogDestination {
  write(level: LogLevel, line: string): void;
}

export const consoleDestination: LogDestination = {
  write(level, line) {
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  },
};

/** Appends each line to `filePath`; the file is never truncated. */
export function fileDestination(filePath: string): LogDestination {
  const absolutePath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
  return {
    write(_level, line) {
      fs.appendFileSync(absolutePath, `${line}\n`, "utf-8");
    },
  };
}

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  destinations?: LogDestination[];
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (PRIORITY[level] < PRIORITY[this.context.minLevel ?? "debug"]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    for (const destination of this.context.destinations ?? [consoleDestination]) {
      destination.write(level, line);
    }
  }
}
