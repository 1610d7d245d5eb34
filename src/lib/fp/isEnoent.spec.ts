import fs from "fs/promises";
import path from "path";
import { describe, expect, it } from "vitest";
import { createTempDir } from "../../testing/testLogger.ts";
import isEnoent from "./isEnoent.ts";

describe("isEnoent", () => {
  it("recognizes a missing file", async () => {
    const missing = path.join(await createTempDir(), "missing");
    const error = await fs.readFile(missing).catch((e: unknown) => e);

    expect(isEnoent(error)).toBe(true);
  });

  it.each([new Error("ENOENT"), { code: "ENOENT" }, undefined])(
    "rejects %o",
    (value) => {
      expect(isEnoent(value)).toBe(false);
    }
  );
});
