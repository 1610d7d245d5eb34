import { BootstrapListenerStopFailed } from "../errors.ts";
import fileExists from "./fp/fileExists.ts";
import defaultSleep from "./fp/sleep.ts";
import type { SystemLogger } from "./Logger.ts";
import {
  formatCommand,
  runCommand,
  type CommandRunner,
} from "./runCommand.ts";

/** A short-lived HTTP responder for ACME domain validation. */
export interface BootstrapListener {
  start(): Promise<void>;
  /** Rejects with BootstrapListenerStopFailed if it may still be running. */
  stop(): Promise<void>;
}

/**
 * Temporary nginx started in daemon mode and stopped through its signal
 * interface.
 */
class NginxProcess implements BootstrapListener {
  #bin;
  #configPath;
  #pidPath;
  #stopGraceMs;
  #logger;
  #run;
  #sleep;

  constructor({
    bin,
    configPath,
    pidPath,
    stopGraceMs,
    logger,
    run = runCommand,
    sleep = defaultSleep,
  }: {
    bin: string;
    configPath: string;
    pidPath: string;
    stopGraceMs: number;
    logger: SystemLogger<string>;
    run?: CommandRunner;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.#bin = bin;
    this.#configPath = configPath;
    this.#pidPath = pidPath;
    this.#stopGraceMs = stopGraceMs;
    this.#logger = logger;
    this.#run = run;
    this.#sleep = sleep;
  }

  async start() {
    const args = ["-c", this.#configPath];
    this.#logger.log(`Starting ${formatCommand(this.#bin, args)}`);
    const result = await this.#run(this.#bin, args);
    if (result.failed || result.exitCode !== 0) {
      throw new Error(
        `nginx failed to start (exit code ${result.exitCode ?? "none"}): ${
          result.stderr
        }`
      );
    }
  }

  async stop() {
    this.#logger.log("Stopping temporary nginx");
    const result = await this.#run(this.#bin, [
      "-c",
      this.#configPath,
      "-s",
      "stop",
    ]);
    if (result.failed || result.exitCode !== 0) {
      throw new BootstrapListenerStopFailed({
        cause: new Error(result.stderr || `exit code ${result.exitCode}`),
      });
    }

    await this.#sleep(this.#stopGraceMs);
    if (await fileExists(this.#pidPath)) {
      throw new BootstrapListenerStopFailed({
        cause: new Error(`${this.#pidPath} still exists`),
      });
    }
  }
}

export default NginxProcess;
