import { describe, expect, it } from "vitest";
import { resolveConfig } from "../config.ts";
import {
  loadMimeTypes,
  renderBootstrapNginxConfig,
  renderMimeTypes,
  renderNginxConfig,
} from "./renderNginxConfig.ts";

const { service, paths } = resolveConfig({
  DOMAIN: "example.com",
  XRAY_UUID: "0f8fad5b-d9cb-469f-a165-70867728950e",
});

describe("renderBootstrapNginxConfig", () => {
  it("answers the challenge path and 200 everywhere else", () => {
    expect(renderBootstrapNginxConfig(service, paths)).toBe(
      [
        "pid /var/run/nginx.pid;",
        "",
        "events {",
        "    worker_connections 1024;",
        "}",
        "",
        "http {",
        "    server {",
        "        listen 80;",
        "        server_name example.com;",
        "",
        "        location /.well-known/acme-challenge/ {",
        "            root /var/www/html;",
        "        }",
        "",
        "        location / {",
        "            return 200 'acme challenge server';",
        "        }",
        "    }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("uses the configured HTTP port", () => {
    const custom = resolveConfig({
      DOMAIN: "proxy.example.org",
      NGINX_HTTP_PORT: "8080",
      WEBROOT: "/srv/acme",
    });

    const lines = renderBootstrapNginxConfig(custom.service, custom.paths).split(
      "\n"
    );

    expect(lines).toContain("        listen 8080;");
    expect(lines).toContain("        server_name proxy.example.org;");
    expect(lines).toContain("            root /srv/acme;");
  });
});

describe("renderNginxConfig", () => {
  const lines = renderNginxConfig(service, paths).split("\n");

  it("redirects everything but the challenge path to HTTPS", () => {
    const server = lines.slice(lines.indexOf("    server {"));

    expect(server).toEqual([
      "    server {",
      "        listen 80;",
      "        server_name example.com;",
      "",
      "        location /.well-known/acme-challenge/ {",
      "            root /var/www/html;",
      "        }",
      "",
      "        location / {",
      "            return 301 https://$host$request_uri;",
      "        }",
      "    }",
      "}",
      "",
    ]);
  });

  it("enables brotli and gzip for the same types", () => {
    const types =
      "text/plain text/css text/xml text/javascript application/json " +
      "application/javascript application/xml+rss application/rss+xml " +
      "font/truetype font/opentype application/vnd.ms-fontobject image/svg+xml";

    expect(lines).toContain("    brotli on;");
    expect(lines).toContain("    brotli_comp_level 6;");
    expect(lines).toContain(`    brotli_types ${types};`);
    expect(lines).toContain("    gzip on;");
    expect(lines).toContain("    gzip_comp_level 6;");
    expect(lines).toContain(`    gzip_types ${types};`);
  });

  it("logs access with the main format and errors at warn", () => {
    expect(lines).toContain("error_log /var/log/nginx/error.log warn;");
    expect(lines).toContain("    access_log /var/log/nginx/access.log main;");
    expect(lines).toContain(
      `    log_format main '$remote_addr - $remote_user [$time_local] "$request" ' ` +
        `'$status $body_bytes_sent "$http_referer" ' ` +
        `'"$http_user_agent" "$http_x_forwarded_for"';`
    );
  });

  it("includes the mime types file it may create", () => {
    expect(lines).toContain("    include /etc/nginx/mime.types;");
    expect(lines).toContain("pid /var/run/nginx.pid;");
  });

  it("renders identical output for identical input", () => {
    expect(renderNginxConfig(service, paths)).toBe(
      renderNginxConfig(service, paths)
    );
    expect(renderBootstrapNginxConfig(service, paths)).toBe(
      renderBootstrapNginxConfig(service, paths)
    );
  });
});

describe("renderMimeTypes", () => {
  it("renders one line per type", () => {
    expect(
      renderMimeTypes([
        { type: "text/html", extensions: ["html", "htm", "shtml"] },
        { type: "image/svg+xml", extensions: ["svg", "svgz"] },
      ])
    ).toBe(
      "types {\n    text/html html htm shtml;\n    image/svg+xml svg svgz;\n}\n"
    );
  });

  it("loads the bundled table", async () => {
    const entries = await loadMimeTypes();

    expect(entries[0]).toEqual({
      type: "text/html",
      extensions: ["html", "htm", "shtml"],
    });
    expect(entries).toContainEqual({
      type: "application/json",
      extensions: ["json"],
    });
  });
});
