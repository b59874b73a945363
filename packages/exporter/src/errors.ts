/**
 * Error types used across the exporter.
 *
 * Only ConfigError is fatal, and only at startup. Everything raised while
 * collecting is caught by the collector and turned into either an
 * unavailable record (per claim) or a total-failure outcome (per tick).
 */

import type { VolumeType } from "@pvc-exporter/shared";

/** Reason codes a volume source may attach to a failed claim query */
export type ClaimFailureReason =
  | "unbound"
  | "not_mounted"
  | "stat_failed"
  | "api_error"
  | "timeout"
  | "invalid_measurement"
  | "error";

export interface ClaimQueryErrorOptions extends ErrorOptions {
  /** Bound volume, when it was resolved before the failure */
  volumeName?: string;
  volumeType?: VolumeType;
}

/** A single claim could not be measured */
export class ClaimQueryError extends Error {
  readonly reason: ClaimFailureReason;
  readonly volumeName?: string;
  readonly volumeType?: VolumeType;

  constructor(reason: ClaimFailureReason, message: string, options?: ClaimQueryErrorOptions) {
    super(message, options);
    this.name = "ClaimQueryError";
    this.reason = reason;
    this.volumeName = options?.volumeName;
    this.volumeType = options?.volumeType;
  }
}

/** A per-claim query exceeded its time budget */
export class TimeoutError extends ClaimQueryError {
  constructor(ms: number) {
    super("timeout", `Claim query timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/** The set of claims could not be listed at all */
export class EnumerationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EnumerationError";
  }
}

/** Environment configuration is missing or malformed */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Best-effort message extraction for logs and outcome labels */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
