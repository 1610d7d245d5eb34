import path from "path";
import fs from "fs/promises";
import type { SystemLogger } from "./Logger.ts";

export type CertificateBundle = {
  readonly certificateFile: string;
  readonly keyFile: string;
  readonly fullchainFile: string;
};

const CERT_SUFFIX = ".crt";
const FULLCHAIN_SUFFIX = ".fullchain.crt";
const KEY_SUFFIX = ".key";

export const getCertificateBundle = (
  certDir: string,
  domain: string
): CertificateBundle => ({
  certificateFile: path.resolve(certDir, `${domain}${CERT_SUFFIX}`),
  keyFile: path.resolve(certDir, `${domain}${KEY_SUFFIX}`),
  fullchainFile: path.resolve(certDir, `${domain}${FULLCHAIN_SUFFIX}`),
});

/** Domains in `certDir` that have both a certificate and a key. */
export const getExistingDomains = async (
  certDir: string,
  logger: SystemLogger<string>
) => {
  const files = await fs.readdir(certDir);
  const found = files.reduce<{
    [domain: string]: { cert?: boolean; key?: boolean };
  }>((results, file) => {
    if (file.endsWith(FULLCHAIN_SUFFIX)) return results;
    if (file.endsWith(CERT_SUFFIX)) {
      const domain = file.slice(0, -CERT_SUFFIX.length);
      results[domain] = { ...results[domain], cert: true };
    } else if (file.endsWith(KEY_SUFFIX)) {
      const domain = file.slice(0, -KEY_SUFFIX.length);
      results[domain] = { ...results[domain], key: true };
    } else {
      logger.log("Unexpected file in certificate directory:", file);
    }
    return results;
  }, {});

  return Object.entries(found)
    .filter(([domain, { cert, key }]) => {
      if (cert && key) return true;
      logger.warn(`Incomplete certificate files for ${domain}, skipping`);
      return false;
    })
    .map(([domain]) => domain)
    .sort();
};
