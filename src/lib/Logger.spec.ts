import { describe, expect, it, vi } from "vitest";
import Logger from "./Logger.ts";

const createSink = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("Logger", () => {
  it("prefixes lines with timestamp, level and system", () => {
    vi.useFakeTimers({ now: new Date("2026-01-02T03:04:05.000Z") });
    const sink = createSink();
    const logger = new Logger({ sink }).forSystem("certificates");

    logger.warn("Renewal in %d days", 30);

    expect(sink.warn).toHaveBeenCalledWith(
      "2026-01-02T03:04:05.000Z [warn] [certificates] Renewal in 30 days"
    );
    expect(sink.log).not.toHaveBeenCalled();
    vi.useRealTimers();
  });

  it("keeps the most recent entries first, up to the limit", () => {
    const logger = new Logger({ sink: createSink(), maxEntries: 2 });
    const root = logger.forSystem("root");

    root.log("one");
    root.error("two");
    root.log("three");

    expect(logger.logs.map((entry) => entry.entries)).toEqual([
      ["three"],
      ["two"],
    ]);
    expect(logger.logs[1]?.level).toBe("error");
    expect(Object.isFrozen(logger.logs)).toBe(true);
  });
});
