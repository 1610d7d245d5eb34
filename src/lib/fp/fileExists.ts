import fs from "fs/promises";
import isEnoent from "./isEnoent.ts";

const fileExists = async (file: string) => {
  try {
    return (await fs.stat(file)).isFile();
  } catch (e) {
    if (isEnoent(e)) return false;
    throw e;
  }
};

export default fileExists;
