import type { CertificateBundle } from "./CertificatesManager.paths.ts";

export type IssuanceRequest = {
  domain: string;
  /** Directory served at `/.well-known/acme-challenge/` by nginx. */
  webroot: string;
  keyType: "ec-256";
  /** `letsencrypt`, `letsencrypt-staging` or an ACME directory URL */
  server: string;
  email: string;
  force: boolean;
};

/**
 * Obtains certificates from a CA. `issue` rejects when the CA refuses or
 * validation fails; nothing is written to the certificate directory until
 * `install` is called.
 */
export interface IssuanceClient {
  readonly name: string;
  issue(request: IssuanceRequest): Promise<void>;
  install(domain: string, bundle: CertificateBundle): Promise<void>;
  /** Command line the daily renewal job runs. */
  readonly renewalCommand: string;
}
