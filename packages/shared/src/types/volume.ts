/**
 * Types for volume usage collection.
 *
 * These describe the records produced by the collector, the immutable
 * snapshots held by the snapshot store, and the outcome of each
 * collection tick.
 */

// ---------------------------------------------------------------------------
// Claim identity
// ---------------------------------------------------------------------------

/** Backing volume kind, taken from the bound PersistentVolume's spec */
export type VolumeType = "csi" | "hostPath" | "local" | "nfs" | "other";

/** A running pod that mounts a claim */
export interface PodRef {
  pod: string;
  namespace: string;
  /** Node IP the pod is scheduled on, when known */
  hostIp?: string;
}

/** Unique key of a claim within a snapshot */
export interface ClaimKey {
  namespace: string;
  claimName: string;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** Usage facts for a claim that was measured successfully */
export interface VolumeUsageOk {
  state: "ok";
  capacityBytes: number;
  usedBytes: number;
  availableBytes: number;
  /** False when used + available drifts from capacity beyond tolerance */
  consistent: boolean;
}

/** A claim that was attempted but could not be measured */
export interface VolumeUsageUnavailable {
  state: "unavailable";
  /** Short machine-readable reason, e.g. "timeout" or "not_mounted" */
  reason: string;
}

export type VolumeUsageStatus = VolumeUsageOk | VolumeUsageUnavailable;

/** One record per monitored claim */
export interface VolumeUsageRecord extends ClaimKey {
  /** Name of the bound PersistentVolume, if resolved */
  volumeName?: string;
  volumeType?: VolumeType;
  mountedBy: PodRef[];
  status: VolumeUsageStatus;
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

/** Outcome of a tick that produced a snapshot */
export type SnapshotOutcome =
  | { kind: "success" }
  | { kind: "partial_failure"; failedCount: number };

/** Outcome of any tick, including one that could not enumerate claims */
export type CollectionOutcome =
  | SnapshotOutcome
  | { kind: "total_failure"; error: string };

export type CollectionOutcomeKind = CollectionOutcome["kind"];

/** Immutable result of one collection tick */
export interface Snapshot {
  /** Ordered by namespace, then claim name */
  readonly records: readonly VolumeUsageRecord[];
  /** ISO 8601 timestamp of the tick that produced it */
  readonly capturedAt: string;
  readonly outcome: SnapshotOutcome;
}

/** Number of ticks per outcome since process start */
export type CollectionCounters = Record<CollectionOutcomeKind, number>;
