import fs from "fs/promises";
import path from "path";
import { AuxiliaryFetchFailed, type StageResult } from "../errors.ts";
import withTimeout from "./fp/withTimeout.ts";
import writeFileAtomic from "./fp/writeFileAtomic.ts";
import type { SystemLogger } from "./Logger.ts";

export const GEODATA_FILES = ["geoip.dat", "geosite.dat"] as const;
export type GeoDataFile = (typeof GEODATA_FILES)[number];

type Fetch = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

/**
 * Best-effort download of Xray's routing datasets. A failed download keeps
 * whatever copy is already on disk.
 */
class GeoDataRefresher {
  #baseUrl;
  #dir;
  #timeoutMs;
  #logger;
  #fetch;

  constructor({
    baseUrl,
    dir,
    timeoutMs,
    logger,
    fetch = globalThis.fetch,
  }: {
    baseUrl: string;
    dir: string;
    timeoutMs: number;
    logger: SystemLogger<string>;
    fetch?: Fetch;
  }) {
    this.#baseUrl = baseUrl.replace(/\/+$/, "");
    this.#dir = dir;
    this.#timeoutMs = timeoutMs;
    this.#logger = logger;
    this.#fetch = fetch;
  }

  async #download(file: GeoDataFile) {
    const url = `${this.#baseUrl}/${file}`;
    const body = await withTimeout(async (signal) => {
      const response = await this.#fetch(url, { signal });
      if (response.status !== 200) {
        throw new Error(`GET ${url} responded with ${response.status}`);
      }
      return new Uint8Array(await response.arrayBuffer());
    }, this.#timeoutMs);

    if (body.byteLength === 0) throw new Error(`GET ${url} returned no data`);
    await fs.mkdir(this.#dir, { recursive: true });
    await writeFileAtomic(path.resolve(this.#dir, file), body);
    return body.byteLength;
  }

  async refresh() {
    this.#logger.log("Updating GeoIP and GeoSite data...");
    const results: { file: GeoDataFile; result: StageResult<number> }[] = [];
    for (const file of GEODATA_FILES) {
      try {
        const bytes = await this.#download(file);
        this.#logger.log(`Downloaded ${file} (${bytes} bytes)`);
        results.push({ file, result: { ok: true, value: bytes } });
      } catch (e) {
        const error = new AuxiliaryFetchFailed(file, { cause: e });
        results.push({ file, result: { ok: false, error } });
      }
    }
    return results;
  }
}

export default GeoDataRefresher;
