import { appendFileSync } from "fs";
import { logTimestamp } from "../utils/time";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export const ACTIVITY_LOG_FILENAME = "ActivityLog.txt";

export interface ActivityLogOptions {
  mirrorToConsole?: boolean;
  clock?: () => Date;
}

/**
 * Append-only run log. Each line is written synchronously so that it is on disk before
 * `append` returns; the log is what survives when everything else in a run goes wrong.
 */
export class ActivityLog {
  private readonly written: string[] = [];
  private readonly mirrorToConsole: boolean;
  private readonly clock: () => Date;

  constructor(
    readonly filePath: string,
    options: ActivityLogOptions = {}
  ) {
    this.mirrorToConsole = options.mirrorToConsole ?? true;
    this.clock = options.clock ?? (() => new Date());
  }

  append(level: LogLevel, message: string, timestamp: Date = this.clock()): string {
    const line = `${logTimestamp(timestamp)} [${level}] ${message}`;
    appendFileSync(this.filePath, `${line}\n`, { encoding: "utf8", flag: "a" });
    this.written.push(line);

    if (this.mirrorToConsole) {
      if (level === "ERROR") console.error(line);
      else if (level === "WARN") console.warn(line);
      else console.log(line);
    }
    return line;
  }

  info(message: string): string {
    return this.append("INFO", message);
  }

  warn(message: string): string {
    return this.append("WARN", message);
  }

  error(message: string): string {
    return this.append("ERROR", message);
  }

  lines(): readonly string[] {
    return this.written;
  }
}
