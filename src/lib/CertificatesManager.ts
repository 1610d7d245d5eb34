import fs from "fs/promises";
import path from "path";
import type { RuntimePaths, ServiceConfig } from "../config.ts";
import { CertificateIssuanceFailed, describeError } from "../errors.ts";
import { renderBootstrapNginxConfig } from "../templates/renderNginxConfig.ts";
import {
  getCertificateBundle,
  type CertificateBundle,
} from "./CertificatesManager.paths.ts";
import fileExists from "./fp/fileExists.ts";
import defaultSleep from "./fp/sleep.ts";
import writeFileAtomic from "./fp/writeFileAtomic.ts";
import type { IssuanceClient } from "./IssuanceClient.ts";
import type { default as Logger, SystemLogger } from "./Logger.ts";
import type { BootstrapListener } from "./NginxProcess.ts";

export type CertificateState =
  | "unchecked"
  | "cached"
  | "missing"
  | "issuing"
  | "issued"
  | "failed";

export type EnsuredCertificate = {
  bundle: CertificateBundle;
  source: "cached" | "issued";
};

/**
 * Makes sure a certificate and key exist for the configured domain. On a
 * miss it owns the bootstrap listener for the duration of the issuance and
 * always stops it before returning.
 */
class CertificatesManager {
  #state: CertificateState = "unchecked";

  #config;
  #paths;
  #acmeServer;
  #settleMs;
  #issuer;
  #listener;
  #logger: SystemLogger<"certificates">;
  #sleep;

  constructor({
    config,
    paths,
    acmeServer,
    settleMs,
    issuer,
    listener,
    logger,
    sleep = defaultSleep,
  }: {
    config: ServiceConfig;
    paths: RuntimePaths;
    acmeServer: string;
    settleMs: number;
    issuer: IssuanceClient;
    listener: BootstrapListener;
    logger: Logger;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.#config = config;
    this.#paths = paths;
    this.#acmeServer = acmeServer;
    this.#settleMs = settleMs;
    this.#issuer = issuer;
    this.#listener = listener;
    this.#logger = logger.forSystem("certificates");
    this.#sleep = sleep;
  }

  get state() {
    return this.#state;
  }

  #transition(next: CertificateState) {
    this.#logger.log(`Certificate state: ${this.#state} -> ${next}`);
    this.#state = next;
  }

  async ensureCertificate(): Promise<EnsuredCertificate> {
    const { domain } = this.#config;
    const bundle = getCertificateBundle(this.#paths.certDir, domain);
    await fs.mkdir(this.#paths.certDir, { recursive: true });

    const [hasCert, hasKey] = await Promise.all([
      fileExists(bundle.certificateFile),
      fileExists(bundle.keyFile),
    ]);
    if (hasCert && hasKey) {
      this.#transition("cached");
      this.#logger.log(`SSL certificate found for ${domain}`);
      return { bundle, source: "cached" };
    }

    this.#transition("missing");
    this.#logger.log(
      "SSL certificate not found. Applying for new certificate..."
    );
    await this.#issue(bundle);
    return { bundle, source: "issued" };
  }

  async #activateBootstrapConfig() {
    await fs.mkdir(
      path.resolve(this.#paths.webroot, ".well-known", "acme-challenge"),
      { recursive: true }
    );
    await fs.mkdir(path.dirname(this.#paths.nginxConfig), { recursive: true });
    await writeFileAtomic(
      this.#paths.nginxConfig,
      renderBootstrapNginxConfig(this.#config, this.#paths)
    );
  }

  async #issue(bundle: CertificateBundle) {
    const { domain, acmeEmail } = this.#config;
    await this.#activateBootstrapConfig();
    this.#transition("issuing");

    this.#logger.log("Starting temporary nginx for ACME validation...");
    try {
      await this.#listener.start();
    } catch (e) {
      this.#transition("failed");
      throw new CertificateIssuanceFailed(domain, { cause: e });
    }

    let failure: { error: unknown } | undefined = undefined;
    try {
      await this.#sleep(this.#settleMs);
      this.#logger.log(
        `Applying for SSL certificate via ${this.#issuer.name}...`
      );
      await this.#issuer.issue({
        domain,
        webroot: this.#paths.webroot,
        keyType: "ec-256",
        server: this.#acmeServer,
        email: acmeEmail,
        force: true,
      });
      await this.#issuer.install(domain, bundle);
    } catch (e) {
      failure = { error: e };
    }

    try {
      await this.#listener.stop();
    } catch (stopError) {
      if (!failure) {
        this.#transition("failed");
        throw stopError;
      }
      this.#logger.error(describeError(stopError));
    }

    if (failure) {
      this.#transition("failed");
      this.#logger.error(describeError(failure.error));
      throw new CertificateIssuanceFailed(domain, { cause: failure.error });
    }

    this.#transition("issued");
    this.#logger.log("SSL certificate obtained successfully");
  }
}

export default CertificatesManager;
