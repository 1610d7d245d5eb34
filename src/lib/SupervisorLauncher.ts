import type { SystemLogger } from "./Logger.ts";
import {
  formatCommand,
  spawnInherited,
  type ProcessSpawner,
} from "./runCommand.ts";

export const DEFAULT_SUPERVISOR_COMMAND = [
  "supervisord",
  "-n",
  "-c",
  "/etc/supervisor/conf.d/supervisord.conf",
] as const;

const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGHUP"];

type SignalSource = {
  on: (signal: NodeJS.Signals, listener: () => void) => unknown;
  off: (signal: NodeJS.Signals, listener: () => void) => unknown;
};

/**
 * Runs the supervisor in the foreground and resolves with the exit code
 * this process should exit with. Signals sent to this process are passed
 * on so the container stops cleanly.
 */
const launchSupervisor = async ({
  command,
  logger,
  spawn = spawnInherited,
  signals = process,
}: {
  command: readonly string[];
  logger: SystemLogger<string>;
  spawn?: ProcessSpawner;
  signals?: SignalSource;
}): Promise<number> => {
  const [file, ...args] = command;
  if (!file) throw new Error("No supervisor command given");

  logger.log(`Starting services with ${formatCommand(file, args)}`);
  const child = spawn(file, args);

  const listeners = FORWARDED_SIGNALS.map((signal) => {
    const listener = () => {
      logger.log(`Forwarding ${signal} to ${file}`);
      child.kill(signal);
    };
    signals.on(signal, listener);
    return [signal, listener] as const;
  });

  try {
    const result = await child.result;
    logger.log(`${file} exited with code ${result.exitCode ?? "none"}`);
    return result.exitCode ?? 1;
  } finally {
    listeners.forEach(([signal, listener]) => signals.off(signal, listener));
  }
};

export default launchSupervisor;
