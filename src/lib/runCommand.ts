import { execa } from "execa";

export type CommandResult = {
  /** Undefined when the process could not be spawned or was killed. */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  failed: boolean;
};

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: { input?: string }
) => Promise<CommandResult>;

export type ChildHandle = {
  kill: (signal: NodeJS.Signals) => void;
  result: Promise<CommandResult>;
};

export type ProcessSpawner = (
  file: string,
  args: readonly string[]
) => ChildHandle;

const toResult = (r: {
  exitCode?: number;
  stdout?: unknown;
  stderr?: unknown;
  failed: boolean;
}): CommandResult => ({
  exitCode: r.exitCode,
  stdout: typeof r.stdout === "string" ? r.stdout : "",
  stderr: typeof r.stderr === "string" ? r.stderr : "",
  failed: r.failed,
});

/** Runs to completion, never rejects on a non-zero exit. */
export const runCommand: CommandRunner = async (file, args, options = {}) =>
  toResult(
    await execa(file, args, {
      input: options.input,
      reject: false,
      stripFinalNewline: true,
    })
  );

/** Starts a long-running child that shares this process's stdio. */
export const spawnInherited: ProcessSpawner = (file, args) => {
  const subprocess = execa(file, args, { stdio: "inherit", reject: false });
  return {
    kill: (signal) => {
      subprocess.kill(signal);
    },
    result: subprocess.then(toResult),
  };
};

export const formatCommand = (file: string, args: readonly string[]) =>
  [file, ...args].join(" ");
