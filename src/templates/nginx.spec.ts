import { describe, expect, it } from "vitest";
import { blank, block, directive, quoteArg, serializeNginx } from "./nginx.ts";

describe("quoteArg", () => {
  it.each([
    ["on", "on"],
    [1024, "1024"],
    ["https://$host$request_uri", "https://$host$request_uri"],
    ["/.well-known/acme-challenge/", "/.well-known/acme-challenge/"],
    ["acme challenge server", "'acme challenge server'"],
    ['"$request"', `'"$request"'`],
    ["it's", "'it\\'s'"],
    ["a;b", "'a;b'"],
    ["", "''"],
  ])("%j -> %s", (input, expected) => {
    expect(quoteArg(input)).toBe(expected);
  });
});

describe("serializeNginx", () => {
  it("indents nested blocks by four spaces", () => {
    const text = serializeNginx([
      directive("user", "nginx"),
      blank,
      block("events", [], [directive("worker_connections", 1024)]),
      block(
        "http",
        [],
        [
          block(
            "location",
            ["/"],
            [directive("return", 200, "acme challenge server")]
          ),
        ]
      ),
    ]);

    expect(text).toBe(
      [
        "user nginx;",
        "",
        "events {",
        "    worker_connections 1024;",
        "}",
        "http {",
        "    location / {",
        "        return 200 'acme challenge server';",
        "    }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("keeps blank lines free of indentation", () => {
    const text = serializeNginx([
      block("server", [], [directive("listen", 80), blank, directive("a", "b")]),
    ]);

    expect(text).toBe("server {\n    listen 80;\n\n    a b;\n}\n");
  });
});
