import { RenewalJobInstallFailed, type StageResult } from "../errors.ts";
import shellQuote from "./fp/shellQuote.ts";
import type { SystemLogger } from "./Logger.ts";
import { runCommand, type CommandRunner } from "./runCommand.ts";

/** Daily at 03:00. */
export const RENEWAL_SCHEDULE = "0 3 * * *";
export const RENEWAL_MARKER = "# xray-bootstrap: certificate renewal";

const NO_CRONTAB = /no crontab for/i;

/** cron turns an unescaped `%` into a newline. */
const escapeCron = (command: string) => command.replace(/%/g, "\\%");

export const renewalJobLine = (renewalCommand: string, logFile: string) =>
  [
    RENEWAL_SCHEDULE,
    escapeCron(`${renewalCommand} >> ${shellQuote(logFile)} 2>&1`),
    RENEWAL_MARKER,
  ].join(" ");

/** Replaces previously managed lines, keeps everything else in order. */
export const mergeCrontab = (existing: string, jobLine: string) => {
  const kept = existing
    .split("\n")
    .filter((line) => line.trim() !== "" && !line.includes(RENEWAL_MARKER));
  return [...kept, jobLine].join("\n") + "\n";
};

/**
 * Installs the renewal job into the current user's crontab. Failures are
 * reported as a result, never thrown.
 */
class RenewalRegistrar {
  #logger;
  #run;
  #crontabBin;

  constructor({
    logger,
    run = runCommand,
    crontabBin = "crontab",
  }: {
    logger: SystemLogger<string>;
    run?: CommandRunner;
    crontabBin?: string;
  }) {
    this.#logger = logger;
    this.#run = run;
    this.#crontabBin = crontabBin;
  }

  async #readCrontab() {
    const result = await this.#run(this.#crontabBin, ["-l"]);
    if (result.exitCode === 0) return result.stdout;
    if (NO_CRONTAB.test(result.stderr)) return "";
    throw new Error(
      `crontab -l failed (exit code ${result.exitCode ?? "none"}): ${
        result.stderr
      }`
    );
  }

  async register({
    renewalCommand,
    logFile,
  }: {
    renewalCommand: string;
    logFile: string;
  }): Promise<StageResult<string>> {
    this.#logger.log("Setting up crontab for certificate auto-renewal...");
    const jobLine = renewalJobLine(renewalCommand, logFile);
    try {
      const crontab = mergeCrontab(await this.#readCrontab(), jobLine);
      const result = await this.#run(this.#crontabBin, ["-"], {
        input: crontab,
      });
      if (result.failed || result.exitCode !== 0) {
        throw new Error(
          `crontab - failed (exit code ${result.exitCode ?? "none"}): ${
            result.stderr
          }`
        );
      }
      this.#logger.log(`Installed renewal job: ${jobLine}`);
      return { ok: true, value: jobLine };
    } catch (e) {
      return { ok: false, error: new RenewalJobInstallFailed({ cause: e }) };
    }
  }
}

export default RenewalRegistrar;
