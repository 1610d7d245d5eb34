import { describe, expect, it } from "vitest";
import {
  AuxiliaryFetchFailed,
  CertificateIssuanceFailed,
  describeError,
  MissingRequiredInput,
} from "./errors.ts";

describe("describeError", () => {
  it("appends the cause chain", () => {
    const error = new CertificateIssuanceFailed("example.com", {
      cause: new Error("acme.sh exited with 1", {
        cause: "rate limited",
      }),
    });

    expect(describeError(error)).toBe(
      "Failed to obtain SSL certificate for example.com (acme.sh exited with 1 (rate limited))"
    );
  });

  it("describes non-errors", () => {
    expect(describeError("plain")).toBe("plain");
  });
});

describe("BootstrapError", () => {
  it("marks input errors fatal and download errors not", () => {
    const missing = new MissingRequiredInput("DOMAIN");
    const download = new AuxiliaryFetchFailed("geoip.dat");

    expect(missing).toMatchObject({
      name: "MissingRequiredInput",
      code: "MissingRequiredInput",
      fatal: true,
      message: "DOMAIN environment variable is required",
    });
    expect(download.fatal).toBe(false);
  });
});
