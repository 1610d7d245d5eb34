import deepFreeze from "./fp/deepFreeze.ts";
import { format } from "util";

export type LogLevel = "log" | "warn" | "error";

type LogEntry = {
  entries: unknown[];
  level: LogLevel;
  system: string;
  timestamp: Date;
};

export type SystemLogger<SYSTEM extends string> = {
  readonly system: SYSTEM;
  log: (...entries: unknown[]) => void;
  warn: (...entries: unknown[]) => void;
  error: (...entries: unknown[]) => void;
};

type LogSink = Pick<Console, "log" | "warn" | "error">;

const MAX_LOG_ENTRIES = 50;

const formatLogEntry = (e: LogEntry): string =>
  `${e.timestamp.toISOString()} [${e.level}] [${e.system}] ${format(
    ...e.entries
  )}`;

class Logger {
  #logs: LogEntry[] = [];
  #sink: LogSink;
  #maxEntries: number;

  constructor({
    sink = console,
    maxEntries = MAX_LOG_ENTRIES,
  }: { sink?: LogSink; maxEntries?: number } = {}) {
    this.#sink = sink;
    this.#maxEntries = maxEntries;
  }

  forSystem<T extends string>(system: T): SystemLogger<T> {
    const write =
      (level: LogLevel) =>
      (...entries: unknown[]) => {
        const logEntry = {
          entries,
          system,
          level,
          timestamp: new Date(),
        } satisfies LogEntry;
        this.#logs.unshift(logEntry);
        this.#sink[level](formatLogEntry(logEntry));
        this.#capLogLength();
      };

    return {
      system,
      log: write("log"),
      warn: write("warn"),
      error: write("error"),
    };
  }

  #capLogLength = () => {
    while (this.#logs.length > this.#maxEntries) this.#logs.pop();
  };

  /** Most recent first. */
  get logs() {
    return deepFreeze([...this.#logs]);
  }
}

export default Logger;
