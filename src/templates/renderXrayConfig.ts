import type { ServiceConfig } from "../config.ts";
import type { CertificateBundle } from "../lib/CertificatesManager.paths.ts";
import { TemplateRenderError } from "../errors.ts";

export const ALPN = ["h2", "http/1.1"] as const;

type XrayConfig = {
  log: { loglevel: "warning" };
  inbounds: {
    port: number;
    protocol: string;
    settings: {
      clients: { id: string; flow: string }[];
      decryption: "none";
    };
    streamSettings: {
      network: "tcp";
      security: "tls";
      tlsSettings: {
        serverName: string;
        certificates: { certificateFile: string; keyFile: string }[];
        alpn: string[];
      };
    };
    sniffing: { enabled: boolean; destOverride: string[] };
  }[];
  outbounds: { protocol: string; tag: string }[];
  routing: {
    domainStrategy: "IPIfNonMatch";
    rules: {
      type: "field";
      protocol: string[];
      outboundTag: string;
    }[];
  };
};

export const buildXrayConfig = (
  config: ServiceConfig,
  bundle: CertificateBundle
): XrayConfig => {
  if (!bundle.certificateFile || !bundle.keyFile) {
    throw new TemplateRenderError(
      `Certificate paths for ${config.domain} are missing`
    );
  }

  return {
    log: { loglevel: "warning" },
    inbounds: [
      {
        port: config.xrayPort,
        protocol: config.protocol,
        settings: {
          clients: [{ id: config.clientId, flow: config.flow }],
          decryption: "none",
        },
        streamSettings: {
          network: "tcp",
          security: "tls",
          tlsSettings: {
            serverName: config.domain,
            certificates: [
              {
                certificateFile: bundle.certificateFile,
                keyFile: bundle.keyFile,
              },
            ],
            alpn: [...ALPN],
          },
        },
        sniffing: { enabled: true, destOverride: ["http", "tls", "quic"] },
      },
    ],
    outbounds: [
      { protocol: "freedom", tag: "direct" },
      { protocol: "blackhole", tag: "block" },
    ],
    routing: {
      domainStrategy: "IPIfNonMatch",
      rules: [
        { type: "field", protocol: ["bittorrent"], outboundTag: "block" },
      ],
    },
  };
};

export const renderXrayConfig = (
  config: ServiceConfig,
  bundle: CertificateBundle
): string => JSON.stringify(buildXrayConfig(config, bundle), null, 2) + "\n";
