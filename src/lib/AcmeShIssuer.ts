import type { CertificateBundle } from "./CertificatesManager.paths.ts";
import type { IssuanceClient, IssuanceRequest } from "./IssuanceClient.ts";
import type { SystemLogger } from "./Logger.ts";
import {
  formatCommand,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from "./runCommand.ts";

export class AcmeShCommandFailed extends Error {
  constructor(readonly command: string, result: CommandResult) {
    super(
      `${command} exited with ${result.exitCode ?? "no exit code"}: ${
        result.stderr || result.stdout
      }`
    );
    this.name = "AcmeShCommandFailed";
  }
}

/** acme.sh names the staging CA differently; URLs pass through. */
export const toAcmeShServer = (server: string) =>
  server === "letsencrypt-staging" ? "letsencrypt_test" : server;

/** Drives the acme.sh shell client. */
class AcmeShIssuer implements IssuanceClient {
  readonly name = "acme.sh";

  #bin;
  #home;
  #logger;
  #run;

  constructor({
    bin,
    home,
    logger,
    run = runCommand,
  }: {
    bin: string;
    home: string;
    logger: SystemLogger<string>;
    run?: CommandRunner;
  }) {
    this.#bin = bin;
    this.#home = home;
    this.#logger = logger;
    this.#run = run;
  }

  get renewalCommand() {
    return formatCommand(this.#bin, ["--cron", "--home", this.#home]);
  }

  async #exec(args: string[]) {
    const command = formatCommand(this.#bin, args);
    this.#logger.log(`Running ${command}`);
    const result = await this.#run(this.#bin, args);
    if (result.failed || result.exitCode !== 0) {
      throw new AcmeShCommandFailed(command, result);
    }
    return result;
  }

  async issue(request: IssuanceRequest) {
    await this.#exec([
      "--issue",
      "-d",
      request.domain,
      "--webroot",
      request.webroot,
      "--keylength",
      request.keyType,
      "--server",
      toAcmeShServer(request.server),
      "--email",
      request.email,
      ...(request.force ? ["--force"] : []),
    ]);
  }

  async install(domain: string, bundle: CertificateBundle) {
    await this.#exec([
      "--install-cert",
      "-d",
      domain,
      "--ecc",
      "--cert-file",
      bundle.certificateFile,
      "--key-file",
      bundle.keyFile,
      "--fullchain-file",
      bundle.fullchainFile,
    ]);
  }
}

export default AcmeShIssuer;
