export type BootstrapErrorCode =
  | "MissingRequiredInput"
  | "InvalidInput"
  | "CertificateIssuanceFailed"
  | "BootstrapListenerStopFailed"
  | "TemplateRenderError"
  | "AuxiliaryFetchFailed"
  | "RenewalJobInstallFailed";

export abstract class BootstrapError extends Error {
  abstract readonly code: BootstrapErrorCode;
  /** Fatal errors abort the bootstrap with a non-zero exit code. */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingRequiredInput extends BootstrapError {
  readonly code = "MissingRequiredInput";
  readonly fatal = true;

  constructor(readonly field: string) {
    super(`${field} environment variable is required`);
  }
}

export class InvalidInput extends BootstrapError {
  readonly code = "InvalidInput";
  readonly fatal = true;

  constructor(readonly field: string, reason: string) {
    super(`${field} is invalid: ${reason}`);
  }
}

export class CertificateIssuanceFailed extends BootstrapError {
  readonly code = "CertificateIssuanceFailed";
  readonly fatal = true;

  constructor(readonly domain: string, options?: { cause?: unknown }) {
    super(`Failed to obtain SSL certificate for ${domain}`, options);
  }
}

export class BootstrapListenerStopFailed extends BootstrapError {
  readonly code = "BootstrapListenerStopFailed";
  readonly fatal = true;

  constructor(options?: { cause?: unknown }) {
    super("Temporary nginx for ACME validation could not be stopped", options);
  }
}

export class TemplateRenderError extends BootstrapError {
  readonly code = "TemplateRenderError";
  readonly fatal = true;
}

export class AuxiliaryFetchFailed extends BootstrapError {
  readonly code = "AuxiliaryFetchFailed";
  readonly fatal = false;

  constructor(readonly dataset: string, options?: { cause?: unknown }) {
    super(`Failed to download ${dataset}`, options);
  }
}

export class RenewalJobInstallFailed extends BootstrapError {
  readonly code = "RenewalJobInstallFailed";
  readonly fatal = false;

  constructor(options?: { cause?: unknown }) {
    super("Failed to install certificate renewal job", options);
  }
}

export type StageResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: BootstrapError };

/** Human-readable description including the cause chain. */
export const describeError = (e: unknown): string => {
  if (!(e instanceof Error)) return String(e);
  const cause = e.cause === undefined ? "" : ` (${describeError(e.cause)})`;
  return `${e.message}${cause}`;
};
