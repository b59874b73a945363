/**
 * Types for the exporter's own health endpoints.
 */

import type { CollectionOutcomeKind } from "./volume.js";

export interface LivenessResponse {
  status: "ok";
}

export interface ReadinessResponse {
  status: "ready" | "no_data";
  hasSnapshot: boolean;
  /** ISO 8601 timestamp of the served snapshot */
  capturedAt: string | null;
  /** Seconds since the served snapshot was captured */
  ageSeconds: number | null;
  lastOutcome: CollectionOutcomeKind | null;
}
