import { readFile } from "fs/promises";
import isEnoent from "./isEnoent.ts";

/** Resolves to `undefined` instead of rejecting when the file is missing. */
async function readFileOrUndefined(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (isEnoent(e)) return undefined;
    else throw e;
  }
}

export default readFileOrUndefined;
