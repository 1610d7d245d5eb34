import shellQuote from "./fp/shellQuote.ts";

/**
 * Shell command that re-invokes this entrypoint the way it was started,
 * with `renew`. `env` is prefixed as assignments since cron runs the job
 * with an almost empty environment.
 */
const selfRenewCommand = ({
  env,
  cwd = process.cwd(),
  argv = [process.execPath, ...process.execArgv, process.argv[1] ?? ""],
}: {
  env: Readonly<Record<string, string>>;
  cwd?: string;
  argv?: readonly string[];
}) =>
  [
    "cd",
    shellQuote(cwd),
    "&&",
    ...Object.entries(env).map(([key, value]) => `${key}=${shellQuote(value)}`),
    ...[...argv, "renew"].filter((arg) => arg !== "").map(shellQuote),
  ].join(" ");

export default selfRenewCommand;
