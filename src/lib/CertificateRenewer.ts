import acme from "acme-client";
import fs from "fs/promises";
import type { RuntimePaths } from "../config.ts";
import { describeError } from "../errors.ts";
import {
  getCertificateBundle,
  getExistingDomains,
} from "./CertificatesManager.paths.ts";
import type { IssuanceClient } from "./IssuanceClient.ts";
import type Logger from "./Logger.ts";

const DAY_IN_MILLIS = 24 * 60 * 60 * 1000;

export type RenewalOutcome = {
  domain: string;
  status: "renewed" | "valid" | "failed";
  expiresOn: Date | undefined;
};

const readExpiry = async (certificateFile: string) =>
  acme.crypto.readCertificateInfo(await fs.readFile(certificateFile))
    .notAfter;

/**
 * Renews every installed certificate that expires within `renewBeforeDays`.
 * The long-running nginx already answers the HTTP-01 challenge path, so no
 * bootstrap listener is involved.
 */
class CertificateRenewer {
  #paths;
  #issuer;
  #server;
  #email;
  #renewBeforeDays;
  #logger;
  #now;
  #readExpiry;

  constructor({
    paths,
    issuer,
    server,
    email,
    renewBeforeDays,
    logger,
    now = () => new Date(),
    readExpiryDate = readExpiry,
  }: {
    paths: RuntimePaths;
    issuer: IssuanceClient;
    server: string;
    email: string;
    renewBeforeDays: number;
    logger: Logger;
    now?: () => Date;
    readExpiryDate?: (certificateFile: string) => Promise<Date>;
  }) {
    this.#paths = paths;
    this.#issuer = issuer;
    this.#server = server;
    this.#email = email;
    this.#renewBeforeDays = renewBeforeDays;
    this.#logger = logger.forSystem("renewal");
    this.#now = now;
    this.#readExpiry = readExpiryDate;
  }

  async #renew(domain: string): Promise<RenewalOutcome> {
    const bundle = getCertificateBundle(this.#paths.certDir, domain);
    const expiresOn = await this.#readExpiry(bundle.certificateFile);
    const threshold = new Date(
      this.#now().getTime() + this.#renewBeforeDays * DAY_IN_MILLIS
    );
    if (expiresOn > threshold) {
      this.#logger.log(
        `Certificate for ${domain} is valid until ${expiresOn.toISOString()}`
      );
      return { domain, status: "valid", expiresOn };
    }

    this.#logger.log(
      `Certificate for ${domain} expires on ${expiresOn.toISOString()}, renewing`
    );
    await this.#issuer.issue({
      domain,
      webroot: this.#paths.webroot,
      keyType: "ec-256",
      server: this.#server,
      email: this.#email,
      force: true,
    });
    await this.#issuer.install(domain, bundle);
    return {
      domain,
      status: "renewed",
      expiresOn: await this.#readExpiry(bundle.certificateFile),
    };
  }

  async renewAll(): Promise<RenewalOutcome[]> {
    const domains = await getExistingDomains(this.#paths.certDir, this.#logger);
    if (domains.length === 0) {
      this.#logger.log(`No certificates found in ${this.#paths.certDir}`);
    }

    const outcomes: RenewalOutcome[] = [];
    for (const domain of domains) {
      try {
        outcomes.push(await this.#renew(domain));
      } catch (e) {
        this.#logger.error(
          `Renewing certificate for ${domain} failed: ${describeError(e)}`
        );
        outcomes.push({ domain, status: "failed", expiresOn: undefined });
      }
    }
    return outcomes;
  }
}

export default CertificateRenewer;
