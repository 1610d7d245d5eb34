import fs from "fs/promises";
import os from "os";
import path from "path";
import Logger from "../lib/Logger.ts";

const silent = { log: () => {}, warn: () => {}, error: () => {} };

export const createTestLogger = () =>
  new Logger({ sink: silent, maxEntries: 1000 });

/** Formatted messages of one level, oldest first. */
export const messages = (logger: Logger, level?: "log" | "warn" | "error") =>
  logger.logs
    .filter((entry) => level === undefined || entry.level === level)
    .map((entry) => entry.entries.map(String).join(" "))
    .reverse();

export const createTempDir = () =>
  fs.mkdtemp(path.join(os.tmpdir(), "xray-bootstrap-"));
