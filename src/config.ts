import { randomUUID } from "crypto";
import { z } from "zod";
import deepFreeze, { type ReadonlyDeep } from "./lib/fp/deepFreeze.ts";
import { InvalidInput, MissingRequiredInput } from "./errors.ts";

export const DEFAULT_GEODATA_BASE_URL =
  "https://github.com/Loyalsoldier/v2ray-rules-dat/releases/latest/download";

const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?$/;
const TOKEN_PATTERN = /^[A-Za-z0-9._-]+$/;

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

/** Environment values that are empty strings count as unset. */
const env = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(blankToUndefined, schema);

const Port = z.coerce.number().int().min(1).max(65535);
const Millis = z.coerce.number().int().nonnegative();
const Flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const Env = z.object({
  DOMAIN: env(
    z
      .string()
      .trim()
      .regex(HOSTNAME_PATTERN, "must be a hostname such as proxy.example.com")
      .optional()
  ),
  XRAY_PORT: env(Port.default(443)),
  NGINX_HTTP_PORT: env(Port.default(80)),
  XRAY_UUID: env(z.string().trim().uuid().optional()),
  XRAY_PROTOCOL: env(z.string().regex(TOKEN_PATTERN).default("vless")),
  XRAY_FLOW: env(z.string().regex(TOKEN_PATTERN).default("xtls-rprx-vision")),
  ACME_EMAIL: env(z.string().trim().email().default("admin@example.com")),

  ISSUER: env(z.enum(["acme-client", "acme.sh"]).default("acme-client")),
  ACME_DIRECTORY: env(z.string().default("letsencrypt")),
  BOOTSTRAP_SETTLE_MS: env(Millis.default(2000)),
  NGINX_STOP_GRACE_MS: env(Millis.default(2000)),
  RENEW_BEFORE_DAYS: env(z.coerce.number().int().positive().default(30)),
  RENEW_COMMAND: env(z.string().optional()),
  GEODATA_BASE_URL: env(z.string().url().default(DEFAULT_GEODATA_BASE_URL)),
  GEODATA_TIMEOUT_MS: env(Millis.default(60_000)),
  SKIP_GEODATA: env(Flag.default("false")),
  NGINX_BIN: env(z.string().default("nginx")),
  ACME_SH_BIN: env(z.string().default("/root/.acme.sh/acme.sh")),

  CERT_DIR: env(z.string().default("/usr/local/etc/xray/cert")),
  XRAY_CONFIG_PATH: env(z.string().default("/usr/local/etc/xray/config.json")),
  NGINX_CONFIG_PATH: env(z.string().default("/etc/nginx/nginx.conf")),
  NGINX_MIME_TYPES_PATH: env(z.string().default("/etc/nginx/mime.types")),
  NGINX_PID_PATH: env(z.string().default("/var/run/nginx.pid")),
  WEBROOT: env(z.string().default("/var/www/html")),
  GEODATA_DIR: env(z.string().default("/usr/local/etc/xray")),
  ACME_HOME: env(z.string().default("/root/.acme.sh")),
  RENEWAL_LOG: env(z.string().default("/var/log/acme.log")),
});

export type ServiceConfig = ReadonlyDeep<{
  domain: string;
  xrayPort: number;
  httpPort: number;
  clientId: string;
  protocol: string;
  flow: string;
  acmeEmail: string;
}>;

export type RuntimePaths = ReadonlyDeep<{
  certDir: string;
  xrayConfig: string;
  nginxConfig: string;
  nginxMimeTypes: string;
  nginxPid: string;
  webroot: string;
  geodataDir: string;
  acmeHome: string;
  renewalLog: string;
}>;

export type IssuerKind = "acme-client" | "acme.sh";

export type BootstrapOptions = ReadonlyDeep<{
  issuer: IssuerKind;
  /** `letsencrypt`, `letsencrypt-staging` or a directory URL */
  acmeServer: string;
  settleMs: number;
  stopGraceMs: number;
  renewBeforeDays: number;
  renewCommand: string | undefined;
  geodata: { baseUrl: string; timeoutMs: number; skip: boolean };
  nginxBin: string;
  acmeShBin: string;
}>;

export type ResolvedConfig = {
  service: ServiceConfig;
  paths: RuntimePaths;
  options: BootstrapOptions;
  /** Set when no client id was supplied and one was generated. */
  generatedClientId: string | undefined;
};

export type EnvInput = Readonly<Record<string, string | undefined>>;

const parseEnv = (input: EnvInput) => {
  const parseResult = Env.safeParse(input);
  if (!parseResult.success) {
    const [issue] = parseResult.error.issues;
    throw new InvalidInput(String(issue.path.at(0) ?? "input"), issue.message);
  }
  return parseResult.data;
};
type Env = ReturnType<typeof parseEnv>;

const toPaths = (e: Env): RuntimePaths =>
  deepFreeze({
    certDir: e.CERT_DIR,
    xrayConfig: e.XRAY_CONFIG_PATH,
    nginxConfig: e.NGINX_CONFIG_PATH,
    nginxMimeTypes: e.NGINX_MIME_TYPES_PATH,
    nginxPid: e.NGINX_PID_PATH,
    webroot: e.WEBROOT,
    geodataDir: e.GEODATA_DIR,
    acmeHome: e.ACME_HOME,
    renewalLog: e.RENEWAL_LOG,
  });

const toOptions = (e: Env): BootstrapOptions =>
  deepFreeze({
    issuer: e.ISSUER,
    acmeServer: e.ACME_DIRECTORY,
    settleMs: e.BOOTSTRAP_SETTLE_MS,
    stopGraceMs: e.NGINX_STOP_GRACE_MS,
    renewBeforeDays: e.RENEW_BEFORE_DAYS,
    renewCommand: e.RENEW_COMMAND,
    geodata: {
      baseUrl: e.GEODATA_BASE_URL,
      timeoutMs: e.GEODATA_TIMEOUT_MS,
      skip: e.SKIP_GEODATA,
    },
    nginxBin: e.NGINX_BIN,
    acmeShBin: e.ACME_SH_BIN,
  });

/**
 * Resolves the environment into immutable configuration. Throws
 * MissingRequiredInput or InvalidInput without touching anything else.
 */
export const resolveConfig = (
  input: EnvInput,
  { generateId = randomUUID }: { generateId?: () => string } = {}
): ResolvedConfig => {
  // A missing domain is reported ahead of any malformed value.
  if (!input.DOMAIN?.trim()) throw new MissingRequiredInput("DOMAIN");
  const e = parseEnv(input);
  if (!e.DOMAIN) throw new MissingRequiredInput("DOMAIN");

  const clientId = e.XRAY_UUID ?? generateId();

  return {
    service: deepFreeze({
      domain: e.DOMAIN,
      xrayPort: e.XRAY_PORT,
      httpPort: e.NGINX_HTTP_PORT,
      clientId,
      protocol: e.XRAY_PROTOCOL,
      flow: e.XRAY_FLOW,
      acmeEmail: e.ACME_EMAIL,
    }),
    paths: toPaths(e),
    options: toOptions(e),
    generatedClientId: e.XRAY_UUID ? undefined : clientId,
  };
};

/**
 * The renewal job runs from cron without the container's inputs, so it
 * only needs what has defaults.
 */
export const resolveRenewalConfig = (input: EnvInput) => {
  const e = parseEnv(input);
  return {
    acmeEmail: e.ACME_EMAIL,
    paths: toPaths(e),
    options: toOptions(e),
  };
};

/**
 * The inputs `renew` needs, as environment assignments. cron starts the
 * renewal job without the container's environment, so these travel with
 * the job's command line.
 */
export const toRenewalEnv = ({
  acmeEmail,
  paths,
  options,
}: {
  acmeEmail: string;
  paths: RuntimePaths;
  options: BootstrapOptions;
}): Record<string, string> => ({
  ACME_EMAIL: acmeEmail,
  ISSUER: options.issuer,
  ACME_DIRECTORY: options.acmeServer,
  RENEW_BEFORE_DAYS: String(options.renewBeforeDays),
  ACME_SH_BIN: options.acmeShBin,
  CERT_DIR: paths.certDir,
  WEBROOT: paths.webroot,
  ACME_HOME: paths.acmeHome,
  XRAY_CONFIG_PATH: paths.xrayConfig,
  NGINX_CONFIG_PATH: paths.nginxConfig,
  NGINX_MIME_TYPES_PATH: paths.nginxMimeTypes,
  NGINX_PID_PATH: paths.nginxPid,
  GEODATA_DIR: paths.geodataDir,
  RENEWAL_LOG: paths.renewalLog,
});
