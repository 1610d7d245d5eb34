import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { RuntimePaths, ServiceConfig } from "../config.ts";
import {
  blank,
  block,
  directive,
  serializeNginx,
  type NginxNode,
} from "./nginx.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const MIME_TYPES_PATH = path.resolve(__dirname, "mime-types.json");

export const ACME_CHALLENGE_LOCATION = "/.well-known/acme-challenge/";

export const COMPRESSIBLE_TYPES = [
  "text/plain",
  "text/css",
  "text/xml",
  "text/javascript",
  "application/json",
  "application/javascript",
  "application/xml+rss",
  "application/rss+xml",
  "font/truetype",
  "font/opentype",
  "application/vnd.ms-fontobject",
  "image/svg+xml",
] as const;

const LOG_FORMAT_MAIN = [
  '$remote_addr - $remote_user [$time_local] "$request" ',
  '$status $body_bytes_sent "$http_referer" ',
  '"$http_user_agent" "$http_x_forwarded_for"',
];

const events = () =>
  block("events", [], [directive("worker_connections", 1024)]);

const challengeLocation = (paths: RuntimePaths) =>
  block(
    "location",
    [ACME_CHALLENGE_LOCATION],
    [directive("root", paths.webroot)]
  );

/**
 * Minimal config for the temporary nginx that answers ACME HTTP-01
 * validation before a certificate exists.
 */
export const renderBootstrapNginxConfig = (
  config: ServiceConfig,
  paths: RuntimePaths
): string =>
  serializeNginx([
    directive("pid", paths.nginxPid),
    blank,
    events(),
    blank,
    block(
      "http",
      [],
      [
        block(
          "server",
          [],
          [
            directive("listen", config.httpPort),
            directive("server_name", config.domain),
            blank,
            challengeLocation(paths),
            blank,
            block(
              "location",
              ["/"],
              [directive("return", 200, "acme challenge server")]
            ),
          ]
        ),
      ]
    ),
  ]);

const compression = (): NginxNode[] => [
  directive("brotli", "on"),
  directive("brotli_comp_level", 6),
  directive("brotli_types", ...COMPRESSIBLE_TYPES),
  blank,
  directive("gzip", "on"),
  directive("gzip_vary", "on"),
  directive("gzip_proxied", "any"),
  directive("gzip_comp_level", 6),
  directive("gzip_types", ...COMPRESSIBLE_TYPES),
];

/** Long-running nginx: ACME challenge answers and a redirect to HTTPS. */
export const renderNginxConfig = (
  config: ServiceConfig,
  paths: RuntimePaths
): string =>
  serializeNginx([
    directive("user", "nginx"),
    directive("worker_processes", "auto"),
    directive("error_log", "/var/log/nginx/error.log", "warn"),
    directive("pid", paths.nginxPid),
    blank,
    events(),
    blank,
    block(
      "http",
      [],
      [
        directive("include", paths.nginxMimeTypes),
        directive("default_type", "application/octet-stream"),
        blank,
        directive("log_format", "main", ...LOG_FORMAT_MAIN),
        blank,
        directive("access_log", "/var/log/nginx/access.log", "main"),
        blank,
        directive("sendfile", "on"),
        directive("tcp_nopush", "on"),
        directive("tcp_nodelay", "on"),
        directive("keepalive_timeout", 65),
        directive("types_hash_max_size", 2048),
        blank,
        ...compression(),
        blank,
        block(
          "server",
          [],
          [
            directive("listen", config.httpPort),
            directive("server_name", config.domain),
            blank,
            challengeLocation(paths),
            blank,
            block(
              "location",
              ["/"],
              [directive("return", 301, "https://$host$request_uri")]
            ),
          ]
        ),
      ]
    ),
  ]);

const MimeTypes = z.array(
  z.object({ type: z.string(), extensions: z.array(z.string()).min(1) })
);
export type MimeTypeEntry = z.TypeOf<typeof MimeTypes>[number];

export const loadMimeTypes = async (): Promise<MimeTypeEntry[]> =>
  MimeTypes.parse(JSON.parse(await fs.readFile(MIME_TYPES_PATH, "utf8")));

export const renderMimeTypes = (entries: readonly MimeTypeEntry[]): string =>
  serializeNginx([
    block(
      "types",
      [],
      entries.map((e) => directive(e.type, ...e.extensions))
    ),
  ]);
