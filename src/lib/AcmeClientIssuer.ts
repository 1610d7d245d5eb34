import acme, { type Client } from "acme-client";
import fs from "fs/promises";
import path from "path";
import createAcmeClient from "./AcmeClientIssuer.createAcmeClient.ts";
import type { CertificateBundle } from "./CertificatesManager.paths.ts";
import isEnoent from "./fp/isEnoent.ts";
import writeFileAtomic from "./fp/writeFileAtomic.ts";
import type { IssuanceClient, IssuanceRequest } from "./IssuanceClient.ts";
import type { SystemLogger } from "./Logger.ts";

export type AcmeAutoClient = Pick<Client, "auto">;

export type AcmeClientFactory = (opts: {
  server: string;
  email: string;
}) => Promise<AcmeAutoClient>;

const CHALLENGE_DIR = path.join(".well-known", "acme-challenge");

/** Serves HTTP-01 key authorizations as files below `challengeDir`. */
export const http01TokenStore = (
  challengeDir: string,
  domain: string,
  logger: SystemLogger<string>
) => ({
  create: async (type: string, token: string, keyAuthorization: string) => {
    if (type !== "http-01") {
      logger.log(`Rejecting a challenge type ${type} with token ${token}`);
      return;
    }
    logger.log(`Storing token ${token} for ${domain}`);
    await fs.writeFile(path.resolve(challengeDir, token), keyAuthorization);
  },
  remove: async (token: string) => {
    logger.log(`Cleaning up token ${token} for ${domain}`);
    try {
      await fs.rm(path.resolve(challengeDir, token));
    } catch (e) {
      if (!isEnoent(e)) throw e;
    }
  },
});

/**
 * Talks ACME directly. HTTP-01 tokens are written below the web root that
 * nginx serves; issued material stays in memory until `install`.
 */
class AcmeClientIssuer implements IssuanceClient {
  readonly name = "acme-client";
  readonly renewalCommand;

  #logger;
  #createClient;
  #issued = new Map<string, { key: Buffer; chain: string }>();

  constructor({
    acmeHome,
    logger,
    renewalCommand,
    createClient = ({ server, email }) =>
      createAcmeClient({ acmeHome, server, email, logger }),
  }: {
    acmeHome: string;
    logger: SystemLogger<string>;
    renewalCommand: string;
    createClient?: AcmeClientFactory;
  }) {
    this.#logger = logger;
    this.#createClient = createClient;
    this.renewalCommand = renewalCommand;
  }

  async issue(request: IssuanceRequest) {
    const { domain, webroot } = request;
    const challengeDir = path.resolve(webroot, CHALLENGE_DIR);
    await fs.mkdir(challengeDir, { recursive: true });

    const client = await this.#createClient({
      server: request.server,
      email: request.email,
    });
    const [key, csr] = await acme.crypto.createCsr(
      { altNames: [domain] },
      await acme.crypto.createPrivateEcdsaKey("P-256")
    );

    const tokens = http01TokenStore(challengeDir, domain, this.#logger);
    const chain = await client.auto({
      csr,
      email: request.email,
      termsOfServiceAgreed: true,
      challengePriority: ["http-01"],
      challengeCreateFn: (_authz, challenge, keyAuthorization) =>
        tokens.create(challenge.type, challenge.token, keyAuthorization),
      challengeRemoveFn: (_authz, challenge) => tokens.remove(challenge.token),
    });

    this.#issued.set(domain, { key, chain });
  }

  async install(domain: string, bundle: CertificateBundle) {
    const issued = this.#issued.get(domain);
    if (!issued) {
      throw new Error(`No issued certificate for ${domain} to install`);
    }

    const [leaf] = acme.crypto.splitPemChain(issued.chain);
    if (!leaf) throw new Error(`Certificate chain for ${domain} is empty`);

    await fs.mkdir(path.dirname(bundle.certificateFile), { recursive: true });
    this.#logger.log(`Writing ${domain} key into ${bundle.keyFile}`);
    await writeFileAtomic(bundle.keyFile, issued.key, 0o600);
    this.#logger.log(`Writing ${domain} cert into ${bundle.certificateFile}`);
    await writeFileAtomic(bundle.certificateFile, leaf.trim() + "\n");
    this.#logger.log(`Writing ${domain} chain into ${bundle.fullchainFile}`);
    await writeFileAtomic(bundle.fullchainFile, issued.chain);

    this.#issued.delete(domain);
  }
}

export default AcmeClientIssuer;
