import type { RequestFailureKind } from "./enums.js";

export type DispatchErrorCode =
  | "SEARCH_REQUEST"
  | "CONFIGURATION"
  | "QUOTA_CHECK"
  | "HARD_CAP";

/**
 * Base class for every error the dispatcher raises on purpose.
 * `exitCode` is what the CLI exits with when the error reaches it.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly exitCode: number;

  constructor(
    code: DispatchErrorCode,
    message: string,
    exitCode = 1,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * A single search or account request failed. Always retryable from the
 * executor's point of view.
 */
export class SearchRequestError extends DispatchError {
  readonly kind: RequestFailureKind;
  readonly status?: number;

  constructor(
    kind: RequestFailureKind,
    message: string,
    status?: number,
    options?: { cause?: unknown },
  ) {
    super("SEARCH_REQUEST", message, 1, options);
    this.kind = kind;
    this.status = status;
  }
}

/** Bad input: dork file, empty task list, invalid option values. */
export class ConfigurationError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, 2, options);
  }
}

/** Remote quota lookup failed while auto-detect was required. */
export class QuotaCheckError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("QUOTA_CHECK", message, 3, options);
  }
}

export class HardCapError extends DispatchError {
  readonly creditsNeeded: number;
  readonly hardCap: number;

  constructor(creditsNeeded: number, hardCap: number) {
    super(
      "HARD_CAP",
      `This run needs ${creditsNeeded} credits, above the hard cap of ${hardCap}`,
      4,
    );
    this.creditsNeeded = creditsNeeded;
    this.hardCap = hardCap;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
