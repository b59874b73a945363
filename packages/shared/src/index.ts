export type {
  VolumeType,
  PodRef,
  ClaimKey,
  VolumeUsageOk,
  VolumeUsageUnavailable,
  VolumeUsageStatus,
  VolumeUsageRecord,
  SnapshotOutcome,
  CollectionOutcome,
  CollectionOutcomeKind,
  Snapshot,
  CollectionCounters,
} from "./types/volume.js";
export type { LivenessResponse, ReadinessResponse } from "./types/exporter.js";
