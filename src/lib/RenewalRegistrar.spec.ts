import { describe, expect, it, vi } from "vitest";
import { RenewalJobInstallFailed } from "../errors.ts";
import { createTestLogger } from "../testing/testLogger.ts";
import RenewalRegistrar, {
  mergeCrontab,
  renewalJobLine,
} from "./RenewalRegistrar.ts";
import type { CommandResult, CommandRunner } from "./runCommand.ts";

const JOB =
  "0 3 * * * /root/.acme.sh/acme.sh --cron --home /root/.acme.sh >> /var/log/acme.log 2>&1 # xray-bootstrap: certificate renewal";

const ok = (stdout = ""): CommandResult => ({
  exitCode: 0,
  stdout,
  stderr: "",
  failed: false,
});

const failed = (stderr: string): CommandResult => ({
  exitCode: 1,
  stdout: "",
  stderr,
  failed: true,
});

const register = (run: CommandRunner) =>
  new RenewalRegistrar({
    logger: createTestLogger().forSystem("renewal"),
    run,
  }).register({
    renewalCommand: "/root/.acme.sh/acme.sh --cron --home /root/.acme.sh",
    logFile: "/var/log/acme.log",
  });

describe("renewalJobLine", () => {
  it("runs daily at 03:00 and appends output to the log", () => {
    expect(
      renewalJobLine(
        "/root/.acme.sh/acme.sh --cron --home /root/.acme.sh",
        "/var/log/acme.log"
      )
    ).toBe(JOB);
  });

  it("quotes the log file and escapes cron's percent sign", () => {
    expect(
      renewalJobLine("date +%F", "/var/log/acme renewals.log")
    ).toBe(
      "0 3 * * * date +\\%F >> '/var/log/acme renewals.log' 2>&1 # xray-bootstrap: certificate renewal"
    );
  });
});

describe("mergeCrontab", () => {
  it("keeps unrelated jobs and appends the renewal job", () => {
    expect(mergeCrontab("*/5 * * * * /usr/bin/backup\n", JOB)).toBe(
      `*/5 * * * * /usr/bin/backup\n${JOB}\n`
    );
  });

  it("replaces a previously installed renewal job", () => {
    const once = mergeCrontab("", JOB);

    expect(mergeCrontab(once, JOB)).toBe(`${JOB}\n`);
    expect(mergeCrontab(mergeCrontab(once, JOB), JOB)).toBe(once);
  });
});

describe("RenewalRegistrar", () => {
  it("installs the job into an empty crontab", async () => {
    const run = vi.fn<CommandRunner>(async (_file, args) =>
      args[0] === "-l" ? failed("no crontab for root") : ok()
    );

    const result = await register(run);

    expect(result).toEqual({ ok: true, value: JOB });
    expect(run).toHaveBeenNthCalledWith(1, "crontab", ["-l"]);
    expect(run).toHaveBeenNthCalledWith(2, "crontab", ["-"], {
      input: `${JOB}\n`,
    });
  });

  it("leaves a single renewal job after repeated runs", async () => {
    let crontab = "MAILTO=\"\"\n";
    const run = vi.fn<CommandRunner>(async (_file, args, options) => {
      if (args[0] === "-l") return ok(crontab);
      crontab = options?.input ?? "";
      return ok();
    });

    await register(run);
    await register(run);

    expect(crontab).toBe(`MAILTO=""\n${JOB}\n`);
  });

  it("reports a failure to read the crontab as a warning-level result", async () => {
    const run = vi.fn<CommandRunner>(async () =>
      failed("crontab: command not found")
    );

    const result = await register(run);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RenewalJobInstallFailed);
    expect(result.error.fatal).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("reports a rejected crontab write", async () => {
    const run = vi.fn<CommandRunner>(async (_file, args) =>
      args[0] === "-l" ? ok() : failed("permission denied")
    );

    const result = await register(run);

    expect(result).toMatchObject({
      ok: false,
      error: { code: "RenewalJobInstallFailed" },
    });
  });
});
