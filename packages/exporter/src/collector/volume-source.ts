/**
 * Volume Source — the narrow, read-only interface the collector uses to
 * reach the cluster and the node filesystem.
 *
 * The collector only ever calls these two methods; anything Kubernetes- or
 * filesystem-specific stays behind this boundary so the collection loop can
 * be exercised against in-process fakes.
 */

import type { ClaimKey, PodRef, VolumeType } from "@pvc-exporter/shared";

/** A claim discovered during enumeration */
export interface ClaimRef extends ClaimKey {
  /** Running pods on this node that mount the claim */
  mountedBy: PodRef[];
}

/** Raw facts for one claim, before validation by the collector */
export interface VolumeMeasurement {
  volumeName?: string;
  volumeType?: VolumeType;
  capacityBytes: number;
  usedBytes: number;
  availableBytes: number;
}

/** Marker returned when a claim is filtered out after enumeration */
export interface ClaimExcluded {
  excluded: true;
  reason: string;
}

export interface VolumeSource {
  /**
   * List the claims to monitor. Rejects (with any error) when the set of
   * claims cannot be determined at all.
   */
  listClaims(signal: AbortSignal): Promise<ClaimRef[]>;

  /**
   * Measure a single claim. Rejects with a ClaimQueryError when the claim
   * cannot be measured; resolves with ClaimExcluded when it should not be
   * reported.
   */
  measure(claim: ClaimRef, signal: AbortSignal): Promise<VolumeMeasurement | ClaimExcluded>;
}

export function isExcluded(
  result: VolumeMeasurement | ClaimExcluded,
): result is ClaimExcluded {
  return "excluded" in result;
}
