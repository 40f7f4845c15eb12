import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import type { CycleLogger } from "./pipeline/orchestrator.js";
import { appendTextLine, logFileAbs, toErrorMessage } from "./pipeline/utils.js";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export type LogEntry = {
  level: LogLevel;
  message: string;
  cycleId?: string;
  at: string;
  line: string;
};

export type CycleLogOptions = {
  /** Mirror every line to the console. Defaults to true. */
  echo?: boolean;
};

const LEVEL_WIDTH = 8;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTimestamp(at: Date): string {
  const date = `${at.getFullYear()}-${pad2(at.getMonth() + 1)}-${pad2(at.getDate())}`;
  const time = `${pad2(at.getHours())}:${pad2(at.getMinutes())}:${pad2(at.getSeconds())}`;
  return `${date} ${time}`;
}

/** `YYYY-MM-DD HH:MM:SS | LEVEL    | [cycle-id] message`, local time. */
export function formatLogLine(level: LogLevel, message: string, at: Date, cycleId?: string): string {
  const scope = cycleId ? `[${cycleId}] ` : "";
  return `${formatTimestamp(at)} | ${level.padEnd(LEVEL_WIDTH)} | ${scope}${message}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Append-only progress log shared by every cycle. Lines are appended to the
 * log file in the order they were written and pushed to live subscribers.
 */
export class CycleLog {
  private readonly emitter = new EventEmitter();
  private pending: Promise<void> = Promise.resolve();
  private readonly echo: boolean;

  constructor(
    readonly filePath: string = logFileAbs(),
    options: CycleLogOptions = {}
  ) {
    this.echo = options.echo ?? true;
    // One listener per connected SSE client.
    this.emitter.setMaxListeners(0);
  }

  write(level: LogLevel, message: string, cycleId?: string): LogEntry {
    const at = new Date();
    const line = formatLogLine(level, message, at, cycleId);
    const entry: LogEntry = { level, message, cycleId, at: at.toISOString(), line };

    if (this.echo) {
      if (level === "ERROR") console.error(line);
      else if (level === "WARNING") console.warn(line);
      else console.log(line);
    }

    this.pending = this.pending
      .then(() => appendTextLine(this.filePath, line))
      .catch((err: unknown) => {
        console.error(`Cannot append to ${this.filePath}: ${toErrorMessage(err)}`);
      });

    this.emitter.emit("log", entry);
    return entry;
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  warn(message: string): void {
    this.write("WARNING", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  forCycle(cycleId: string): CycleLogger {
    return {
      info: (message) => void this.write("INFO", message, cycleId),
      warn: (message) => void this.write("WARNING", message, cycleId),
      error: (message) => void this.write("ERROR", message, cycleId)
    };
  }

  /** Resolves once every line written so far has reached the file. */
  flush(): Promise<void> {
    return this.pending;
  }

  /** Last `lines` lines of the log file; empty when nothing was logged yet. */
  async tail(lines: number): Promise<string[]> {
    await this.flush();
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    const all = raw.split("\n").filter((line) => line.length > 0);
    return lines > 0 ? all.slice(-lines) : [];
  }

  subscribe(listener: (entry: LogEntry) => void): () => void {
    this.emitter.on("log", listener);
    return () => {
      this.emitter.off("log", listener);
    };
  }
}
