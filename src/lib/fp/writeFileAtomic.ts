import fs from "fs/promises";
import path from "path";

/**
 * Writes into a sibling temp file and renames it over `file`, so readers
 * never see a half-written file. The temp file is removed on failure.
 */
const writeFileAtomic = async (
  file: string,
  data: string | Uint8Array,
  mode?: number
) => {
  const tmpFile = path.join(
    path.dirname(file),
    `.${path.basename(file)}.${process.pid}.tmp`
  );
  try {
    await fs.writeFile(tmpFile, data, { mode });
    await fs.rename(tmpFile, file);
  } catch (e) {
    await fs.rm(tmpFile, { force: true });
    throw e;
  }
};

export default writeFileAtomic;
