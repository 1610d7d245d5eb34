import fs from "fs/promises";
import path from "path";
import prompts, { type Answers, type PromptObject } from "prompts";
import { resolveConfig, type EnvInput } from "./config.ts";
import isEnoent from "./lib/fp/isEnoent.ts";
import type { SystemLogger } from "./lib/Logger.ts";

type Ask = (
  questions: PromptObject | PromptObject[]
) => Promise<Answers<string>>;

export type EnvAnswers = {
  domain: string;
  acmeEmail: string;
  xrayPort: number;
  httpPort: number;
  clientId: string;
};

const anyPropIsFalsy = (answers: Partial<EnvAnswers>) =>
  (["domain", "acmeEmail", "xrayPort", "httpPort"] as const).some(
    (key) => !answers[key]
  );

export const toEnv = (answers: EnvAnswers): Record<string, string> => ({
  DOMAIN: answers.domain,
  ACME_EMAIL: answers.acmeEmail,
  XRAY_PORT: String(answers.xrayPort),
  NGINX_HTTP_PORT: String(answers.httpPort),
  ...(answers.clientId ? { XRAY_UUID: answers.clientId } : {}),
});

export const toEnvFile = (env: EnvInput) =>
  Object.entries(env)
    .map(([key, value]) => `${key}=${value ?? ""}`)
    .join("\n") + "\n";

/**
 * Asks for the inputs and writes them into an env file that dotenv picks up
 * on the next start. Resolves to false when the wizard was aborted.
 */
const runInitWizard = async ({
  envFile = path.resolve(process.cwd(), ".env"),
  logger,
  ask = prompts,
}: {
  envFile?: string;
  logger: SystemLogger<string>;
  ask?: Ask;
}) => {
  try {
    await fs.access(envFile);
    const { overwrite } = await ask({
      type: "confirm",
      name: "overwrite",
      message: `${envFile} exists. Overwrite it?`,
      initial: false,
    });
    if (!overwrite) return false;
  } catch (e) {
    if (!isEnoent(e)) throw e;
  }

  const { acceptLetsencryptTos } = await ask({
    type: "confirm",
    name: "acceptLetsencryptTos",
    message:
      "Do you accept the TOS of Let's Encrypt? (https://community.letsencrypt.org/tos)",
  });
  if (!acceptLetsencryptTos) {
    logger.error(
      "⚠️ Accepting the TOS is required for the functionality of this software."
    );
    return false;
  }

  const answers: Partial<EnvAnswers> = await ask([
    {
      type: "text",
      name: "domain",
      message: "Domain pointing at this host",
      validate: (x: string) => x.includes(".") || "Enter a domain name",
    },
    {
      type: "text",
      name: "acmeEmail",
      message: "Your email (for letsencrypt)",
      validate: (x: string) =>
        (x.includes("@") && x.includes(".")) || "Enter an email address",
    },
    {
      type: "number",
      name: "xrayPort",
      message: "Port for Xray (TLS)",
      initial: 443,
    },
    {
      type: "number",
      name: "httpPort",
      message: "Port for HTTP traffic",
      initial: 80,
    },
    {
      type: "text",
      name: "clientId",
      message: "Client UUID (leave empty to generate one on every start)",
      initial: "",
    },
  ]);

  if (anyPropIsFalsy(answers)) return false;

  const complete: EnvAnswers = {
    domain: answers.domain ?? "",
    acmeEmail: answers.acmeEmail ?? "",
    xrayPort: answers.xrayPort ?? 443,
    httpPort: answers.httpPort ?? 80,
    clientId: answers.clientId ?? "",
  };
  const env = toEnv(complete);
  // Validates the answers the same way a start would.
  resolveConfig(env);

  logger.log(`Writing ${envFile}`);
  await fs.writeFile(envFile, toEnvFile(env));
  logger.log("DONE! Start the container or run `npm start` now.");
  return true;
};

export default runInitWizard;
