import { TransientCause } from "./types/fetchOutcome";

export class GstinValidationError extends Error {
  readonly gstin: string;

  constructor(gstin: string) {
    super(`Invalid GSTIN format: ${gstin}`);
    this.name = "GstinValidationError";
    this.gstin = gstin;
  }
}

/** A request failure the pipeline may retry. `status` is set when the portal answered non-2xx. */
export class TransientNetworkError extends Error {
  readonly reason: TransientCause;
  readonly status: number | null;

  constructor(reason: TransientCause, message: string, status: number | null = null) {
    super(message);
    this.name = "TransientNetworkError";
    this.reason = reason;
    this.status = status;
  }
}

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
