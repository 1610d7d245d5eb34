import fs from "fs/promises";
import path from "path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidInput } from "./errors.ts";
import runInitWizard, { toEnv, toEnvFile } from "./init.ts";
import {
  createTempDir,
  createTestLogger,
  messages,
} from "./testing/testLogger.ts";

const CLIENT_ID = "0f8fad5b-d9cb-469f-a165-70867728950e";

let envFile: string;

beforeEach(async () => {
  envFile = path.join(await createTempDir(), ".env");
});

/** Answers prompts by name, the way prompts.inject would. */
const answering = (answers: Record<string, unknown>) =>
  vi.fn(async (questions: { name: unknown } | { name: unknown }[]) =>
    Object.fromEntries(
      [questions]
        .flat()
        .map(({ name }) => [String(name), answers[String(name)]])
    )
  );

describe("toEnvFile", () => {
  it("writes one assignment per line", () => {
    expect(
      toEnvFile(
        toEnv({
          domain: "example.com",
          acmeEmail: "ops@example.com",
          xrayPort: 8443,
          httpPort: 80,
          clientId: "",
        })
      )
    ).toBe(
      "DOMAIN=example.com\nACME_EMAIL=ops@example.com\nXRAY_PORT=8443\nNGINX_HTTP_PORT=80\n"
    );
  });

  it("includes the client id when one is given", () => {
    expect(
      toEnv({
        domain: "example.com",
        acmeEmail: "ops@example.com",
        xrayPort: 443,
        httpPort: 80,
        clientId: CLIENT_ID,
      }).XRAY_UUID
    ).toBe(CLIENT_ID);
  });
});

describe("runInitWizard", () => {
  const complete = {
    acceptLetsencryptTos: true,
    domain: "example.com",
    acmeEmail: "ops@example.com",
    xrayPort: 443,
    httpPort: 80,
    clientId: CLIENT_ID,
  };

  it("writes the answers to the env file", async () => {
    const logger = createTestLogger();

    const written = await runInitWizard({
      envFile,
      logger: logger.forSystem("init"),
      ask: answering(complete),
    });

    expect(written).toBe(true);
    expect(await fs.readFile(envFile, "utf8")).toBe(
      `DOMAIN=example.com\nACME_EMAIL=ops@example.com\nXRAY_PORT=443\nNGINX_HTTP_PORT=80\nXRAY_UUID=${CLIENT_ID}\n`
    );
    expect(messages(logger)).toEqual([
      `Writing ${envFile}`,
      "DONE! Start the container or run `npm start` now.",
    ]);
  });

  it("stops when the terms of service are declined", async () => {
    const logger = createTestLogger();
    const ask = answering({ ...complete, acceptLetsencryptTos: false });

    const written = await runInitWizard({
      envFile,
      logger: logger.forSystem("init"),
      ask,
    });

    expect(written).toBe(false);
    expect(ask).toHaveBeenCalledTimes(1);
    await expect(fs.access(envFile)).rejects.toMatchObject({ code: "ENOENT" });
    expect(messages(logger, "error")).toHaveLength(1);
  });

  it("asks before overwriting an existing file", async () => {
    await fs.writeFile(envFile, "DOMAIN=old.example.com\n");

    const written = await runInitWizard({
      envFile,
      logger: createTestLogger().forSystem("init"),
      ask: answering({ ...complete, overwrite: false }),
    });

    expect(written).toBe(false);
    expect(await fs.readFile(envFile, "utf8")).toBe(
      "DOMAIN=old.example.com\n"
    );
  });

  it("treats an aborted prompt as cancellation", async () => {
    expect(
      await runInitWizard({
        envFile,
        logger: createTestLogger().forSystem("init"),
        ask: answering({ ...complete, domain: undefined }),
      })
    ).toBe(false);
  });

  it("rejects answers that would not start", async () => {
    await expect(
      runInitWizard({
        envFile,
        logger: createTestLogger().forSystem("init"),
        ask: answering({ ...complete, xrayPort: 70000 }),
      })
    ).rejects.toBeInstanceOf(InvalidInput);
  });
});
