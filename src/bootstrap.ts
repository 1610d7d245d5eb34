import fs from "fs/promises";
import path from "path";
import type { ResolvedConfig, ServiceConfig } from "./config.ts";
import { describeError, type StageResult } from "./errors.ts";
import type { EnsuredCertificate } from "./lib/CertificatesManager.ts";
import fileExists from "./lib/fp/fileExists.ts";
import writeFileAtomic from "./lib/fp/writeFileAtomic.ts";
import type { GeoDataFile } from "./lib/GeoDataRefresher.ts";
import type { default as Logger, SystemLogger } from "./lib/Logger.ts";
import type { CertificateBundle } from "./lib/CertificatesManager.paths.ts";
import {
  loadMimeTypes as loadDefaultMimeTypes,
  renderMimeTypes,
  renderNginxConfig,
  type MimeTypeEntry,
} from "./templates/renderNginxConfig.ts";
import { ALPN, renderXrayConfig } from "./templates/renderXrayConfig.ts";

export type BootstrapDependencies = {
  logger: Logger;
  certificates: { ensureCertificate(): Promise<EnsuredCertificate> };
  renewal: {
    register(job: {
      renewalCommand: string;
      logFile: string;
    }): Promise<StageResult<string>>;
  };
  renewalCommand: string;
  /** Undefined when dataset downloads are disabled. */
  geoData:
    | {
        refresh(): Promise<
          { file: GeoDataFile; result: StageResult<number> }[]
        >;
      }
    | undefined;
  launchSupervisor: (command: readonly string[]) => Promise<number>;
  loadMimeTypes?: () => Promise<MimeTypeEntry[]>;
};

export const connectionSummary = (config: ServiceConfig): string[] => [
  "============================================",
  "Xray Connection Information:",
  "============================================",
  `Protocol: ${config.protocol}`,
  `Address: ${config.domain}`,
  `Port: ${config.xrayPort}`,
  `UUID: ${config.clientId}`,
  `Flow: ${config.flow}`,
  "TLS: tls",
  `SNI: ${config.domain}`,
  `ALPN: ${ALPN.join(",")}`,
  "============================================",
  "Please save this information for your client configuration",
  "============================================",
];

const writeConfigFile = async (file: string, contents: string) => {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await writeFileAtomic(file, contents);
};

const writeServiceConfigs = async (
  { service, paths }: ResolvedConfig,
  bundle: CertificateBundle,
  loadMimeTypes: () => Promise<MimeTypeEntry[]>,
  logger: SystemLogger<"bootstrap">
) => {
  logger.log("Generating Xray configuration...");
  await writeConfigFile(paths.xrayConfig, renderXrayConfig(service, bundle));
  logger.log(`Xray configuration written to ${paths.xrayConfig}`);

  logger.log("Generating Nginx configuration...");
  await writeConfigFile(paths.nginxConfig, renderNginxConfig(service, paths));
  logger.log(`Nginx configuration written to ${paths.nginxConfig}`);

  if (!(await fileExists(paths.nginxMimeTypes))) {
    await writeConfigFile(
      paths.nginxMimeTypes,
      renderMimeTypes(await loadMimeTypes())
    );
    logger.log(`Created ${paths.nginxMimeTypes}`);
  }
};

/**
 * Runs every stage in order and resolves with the supervisor's exit code.
 * Fatal errors reject; warnings are logged and the sequence continues.
 */
const runBootstrap = async (
  resolved: ResolvedConfig,
  supervisorCommand: readonly string[],
  deps: BootstrapDependencies
): Promise<number> => {
  const { service, paths } = resolved;
  const logger = deps.logger.forSystem("bootstrap");

  logger.log("Starting Xray bootstrap");
  logger.log(`Domain: ${service.domain}`);
  logger.log(`Xray Port: ${service.xrayPort}`);
  logger.log(`Nginx HTTP Port: ${service.httpPort}`);
  if (resolved.generatedClientId) {
    logger.log(`Generated UUID: ${resolved.generatedClientId}`);
  } else {
    logger.log(`Using provided UUID: ${service.clientId}`);
  }

  const { bundle } = await deps.certificates.ensureCertificate();

  await writeServiceConfigs(
    resolved,
    bundle,
    deps.loadMimeTypes ?? loadDefaultMimeTypes,
    logger
  );

  const renewal = await deps.renewal.register({
    renewalCommand: deps.renewalCommand,
    logFile: paths.renewalLog,
  });
  if (!renewal.ok) logger.warn(describeError(renewal.error));

  if (deps.geoData) {
    for (const { result } of await deps.geoData.refresh()) {
      if (!result.ok) logger.warn(describeError(result.error));
    }
    logger.log("GeoIP/GeoSite data updated");
  } else {
    logger.log("Skipping GeoIP/GeoSite update");
  }

  connectionSummary(service).forEach((line) => logger.log(line));

  return deps.launchSupervisor(supervisorCommand);
};

export default runBootstrap;
