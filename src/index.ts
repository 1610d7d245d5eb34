import "dotenv/config";
import runBootstrap from "./bootstrap.ts";
import {
  resolveConfig,
  resolveRenewalConfig,
  toRenewalEnv,
  type BootstrapOptions,
  type RuntimePaths,
} from "./config.ts";
import { BootstrapError, describeError } from "./errors.ts";
import runInitWizard from "./init.ts";
import AcmeClientIssuer from "./lib/AcmeClientIssuer.ts";
import AcmeShIssuer from "./lib/AcmeShIssuer.ts";
import CertificateRenewer from "./lib/CertificateRenewer.ts";
import CertificatesManager from "./lib/CertificatesManager.ts";
import GeoDataRefresher from "./lib/GeoDataRefresher.ts";
import type { IssuanceClient } from "./lib/IssuanceClient.ts";
import Logger from "./lib/Logger.ts";
import NginxProcess from "./lib/NginxProcess.ts";
import RenewalRegistrar from "./lib/RenewalRegistrar.ts";
import selfRenewCommand from "./lib/selfRenewCommand.ts";
import launchSupervisor, {
  DEFAULT_SUPERVISOR_COMMAND,
} from "./lib/SupervisorLauncher.ts";

const logger = new Logger();
const rootLogger = logger.forSystem("root");

const createIssuer = (
  acmeEmail: string,
  options: BootstrapOptions,
  paths: RuntimePaths
): IssuanceClient => {
  const issuerLogger = logger.forSystem("issuer");
  const issuer =
    options.issuer === "acme.sh"
      ? new AcmeShIssuer({
          bin: options.acmeShBin,
          home: paths.acmeHome,
          logger: issuerLogger,
        })
      : new AcmeClientIssuer({
          acmeHome: paths.acmeHome,
          logger: issuerLogger,
          renewalCommand: selfRenewCommand({
            env: toRenewalEnv({ acmeEmail, paths, options }),
          }),
        });
  if (!options.renewCommand) return issuer;

  const renewalCommand = options.renewCommand;
  return {
    name: issuer.name,
    renewalCommand,
    issue: (request) => issuer.issue(request),
    install: (domain, bundle) => issuer.install(domain, bundle),
  };
};

const start = async (supervisorCommand: readonly string[]) => {
  // Nothing is touched before the inputs are known to be complete.
  const resolved = resolveConfig(process.env);
  const { service, paths, options } = resolved;
  const issuer = createIssuer(service.acmeEmail, options, paths);

  return runBootstrap(resolved, supervisorCommand, {
    logger,
    certificates: new CertificatesManager({
      config: service,
      paths,
      acmeServer: options.acmeServer,
      settleMs: options.settleMs,
      issuer,
      listener: new NginxProcess({
        bin: options.nginxBin,
        configPath: paths.nginxConfig,
        pidPath: paths.nginxPid,
        stopGraceMs: options.stopGraceMs,
        logger: logger.forSystem("nginx"),
      }),
      logger,
    }),
    renewal: new RenewalRegistrar({ logger: logger.forSystem("renewal") }),
    renewalCommand: issuer.renewalCommand,
    geoData: options.geodata.skip
      ? undefined
      : new GeoDataRefresher({
          baseUrl: options.geodata.baseUrl,
          dir: paths.geodataDir,
          timeoutMs: options.geodata.timeoutMs,
          logger: logger.forSystem("geodata"),
        }),
    launchSupervisor: (command) =>
      launchSupervisor({ command, logger: logger.forSystem("supervisor") }),
  });
};

const renew = async () => {
  const { acmeEmail, paths, options } = resolveRenewalConfig(process.env);
  const renewer = new CertificateRenewer({
    paths,
    issuer: createIssuer(acmeEmail, options, paths),
    server: options.acmeServer,
    email: acmeEmail,
    renewBeforeDays: options.renewBeforeDays,
    logger,
  });
  const outcomes = await renewer.renewAll();
  return outcomes.some((o) => o.status === "failed") ? 1 : 0;
};

const main = async (argv: string[]): Promise<number> => {
  const [command = "start", ...rest] = argv;
  switch (command) {
    case "start": {
      const args = rest[0] === "--" ? rest.slice(1) : rest;
      return start(args.length > 0 ? args : DEFAULT_SUPERVISOR_COMMAND);
    }
    case "renew":
      return renew();
    case "init":
      return (await runInitWizard({ logger: rootLogger })) ? 0 : 1;
    default:
      rootLogger.error(
        `Unknown command "${command}". ` +
          "Usage: xray-bootstrap [start [-- command...] | renew | init]"
      );
      return 2;
  }
};

process.on("uncaughtException", (e) => rootLogger.error(e));
process.on("unhandledRejection", (e) => rootLogger.error(e));

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (e) {
  if (e instanceof BootstrapError) {
    rootLogger.error(describeError(e));
    if (e.code === "MissingRequiredInput") {
      rootLogger.error("Usage: docker run -e DOMAIN=your.domain.com ...");
    }
  } else {
    rootLogger.error(e);
  }
  process.exitCode = 1;
}
