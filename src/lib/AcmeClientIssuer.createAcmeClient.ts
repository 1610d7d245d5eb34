import acme from "acme-client";
import fs from "fs/promises";
import path from "path";
import readFileOrUndefined from "./fp/readFileOrUndefined.ts";
import writeFileAtomic from "./fp/writeFileAtomic.ts";
import type { SystemLogger } from "./Logger.ts";

export const ACCOUNT_KEY_FILENAME = "account.key";

export const resolveDirectoryUrl = (server: string) => {
  if (server === "letsencrypt") return acme.directory.letsencrypt.production;
  if (server === "letsencrypt-staging") {
    return acme.directory.letsencrypt.staging;
  }
  if (/^https?:\/\//.test(server)) return server;
  throw new Error(`Unknown ACME server "${server}"`);
};

const createNewAccount = async ({
  accountKeyPath,
  directoryUrl,
  email,
  logger,
}: {
  accountKeyPath: string;
  directoryUrl: string;
  email: string;
  logger: SystemLogger<string>;
}) => {
  logger.log(`File ${accountKeyPath} not found, creating a new ACME account`);
  const accountPrivateKey = await acme.crypto.createPrivateKey();
  await fs.mkdir(path.dirname(accountKeyPath), { recursive: true });
  await writeFileAtomic(accountKeyPath, accountPrivateKey, 0o600);

  const client = new acme.Client({
    directoryUrl,
    accountKey: accountPrivateKey,
  });
  await client.createAccount({
    contact: [`mailto:${email}`],
    termsOfServiceAgreed: true,
  });
  logger.log(`Registered ACME account for ${email}`);
  return client;
};

/**
 * ACME client for the account stored in `acmeHome`. A missing account key
 * registers a new account; an existing one gets `email` added as contact.
 */
const createAcmeClient = async ({
  acmeHome,
  server,
  email,
  logger,
}: {
  acmeHome: string;
  server: string;
  email: string;
  logger: SystemLogger<string>;
}) => {
  const directoryUrl = resolveDirectoryUrl(server);
  const accountKeyPath = path.resolve(acmeHome, ACCOUNT_KEY_FILENAME);
  const accountPrivateKey = await readFileOrUndefined(accountKeyPath);
  if (!accountPrivateKey) {
    return createNewAccount({ accountKeyPath, directoryUrl, email, logger });
  }

  const client = new acme.Client({
    directoryUrl,
    accountKey: accountPrivateKey,
  });

  // make sure account exists
  const account = await client.createAccount({ onlyReturnExisting: true });
  if (!account.contact?.includes(`mailto:${email}`)) {
    logger.log(
      `Account doesn't have ${email} as a contact. Adding it (${JSON.stringify(
        account.contact
      )})`
    );
    await client.updateAccount({
      contact: [...(account.contact ?? []), `mailto:${email}`],
    });
  }
  return client;
};

export default createAcmeClient;
