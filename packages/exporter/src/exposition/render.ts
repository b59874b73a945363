/**
 * Exposition renderer — turns the store state into Prometheus text.
 *
 * A fresh prom-client Registry is built for every scrape from the
 * immutable store state, so rendering is a pure read-and-format step: it
 * never touches the volume source and never shares mutable metric objects
 * between requests.
 */

import { Counter, Gauge, Registry } from "prom-client";
import type {
  CollectionOutcomeKind,
  Snapshot,
  VolumeUsageOk,
  VolumeUsageRecord,
} from "@pvc-exporter/shared";
import type { Logger } from "../logger.js";
import type { StoreState } from "../store/snapshot-store.js";

// ---------------------------------------------------------------------------
// Metric names and labels
// ---------------------------------------------------------------------------

export const METRIC = {
  usage: "pvc_usage_bytes",
  capacity: "pvc_capacity_bytes",
  available: "pvc_available_bytes",
  consistent: "pvc_usage_consistent",
  up: "pvc_volume_up",
  unavailable: "pvc_volume_unavailable",
  podMapping: "pvc_pod_mapping",
  outcome: "pvc_exporter_collection_outcome",
  failedClaims: "pvc_exporter_failed_claims",
  age: "pvc_exporter_snapshot_age_seconds",
  lastSuccess: "pvc_exporter_last_success_timestamp_seconds",
  collections: "pvc_exporter_collections_total",
} as const;

const VOLUME_LABELS = ["persistentvolumeclaim", "pvc_namespace", "volume", "pvc_type"] as const;
const MAPPING_LABELS = [
  "persistentvolumeclaim",
  "pvc_namespace",
  "mountedby",
  "pod_namespace",
  "host_ip",
] as const;

type VolumeLabel = (typeof VOLUME_LABELS)[number];

const OUTCOMES: CollectionOutcomeKind[] = ["success", "partial_failure", "total_failure"];

export const NO_DATA_LINE = "# no volume usage snapshot collected yet";

export interface RenderOptions {
  /** Reference time for snapshot age (default: now) */
  now?: Date;
  logger?: Pick<Logger, "warn">;
}

export interface RenderResult {
  body: string;
  contentType: string;
  /** False while no snapshot has been published yet */
  hasData: boolean;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export async function renderExposition(
  state: StoreState,
  opts: RenderOptions = {},
): Promise<RenderResult> {
  const registry = new Registry();
  const now = opts.now ?? new Date();
  const { snapshot } = state;

  if (snapshot) {
    registerVolumeMetrics(registry, snapshot, opts.logger);
  }
  registerHealthMetrics(registry, state, now);

  const text = await registry.metrics();
  return {
    body: snapshot ? text : `${NO_DATA_LINE}\n${text}`,
    contentType: registry.contentType,
    hasData: snapshot !== null,
  };
}

function registerVolumeMetrics(
  registry: Registry,
  snapshot: Snapshot,
  logger?: Pick<Logger, "warn">,
): void {
  const gauge = (name: string, help: string, labelNames: readonly string[] = VOLUME_LABELS) =>
    new Gauge({ name, help, labelNames, registers: [registry] });

  const usage = gauge(METRIC.usage, "Bytes used on the volume bound to the PVC");
  const capacity = gauge(METRIC.capacity, "Total bytes of the volume bound to the PVC");
  const available = gauge(METRIC.available, "Bytes available to unprivileged users on the volume");
  const consistent = gauge(
    METRIC.consistent,
    "1 if used + available matches capacity within tolerance, 0 otherwise",
  );
  const up = gauge(METRIC.up, "1 if the PVC was measured in the last collection, 0 otherwise");
  const unavailable = gauge(METRIC.unavailable, "PVCs that could not be measured, by reason", [
    ...VOLUME_LABELS,
    "reason",
  ]);
  const mapping = gauge(METRIC.podMapping, "Mapping between PVCs and the pods mounting them", MAPPING_LABELS);

  for (const record of snapshot.records) {
    const problem = recordProblem(record);
    if (problem) {
      logger?.warn(
        { namespace: record.namespace, claim: record.claimName, problem },
        "skipping malformed record",
      );
      continue;
    }

    const labels: Record<VolumeLabel, string> = {
      persistentvolumeclaim: record.claimName,
      pvc_namespace: record.namespace,
      volume: record.volumeName ?? "",
      pvc_type: record.volumeType ?? "",
    };

    if (record.status.state === "ok") {
      usage.set(labels, record.status.usedBytes);
      capacity.set(labels, record.status.capacityBytes);
      available.set(labels, record.status.availableBytes);
      consistent.set(labels, record.status.consistent ? 1 : 0);
      up.set(labels, 1);
    } else {
      up.set(labels, 0);
      unavailable.set({ ...labels, reason: record.status.reason }, 1);
    }

    for (const ref of record.mountedBy) {
      mapping.set(
        {
          persistentvolumeclaim: record.claimName,
          pvc_namespace: record.namespace,
          mountedby: ref.pod,
          pod_namespace: ref.namespace,
          host_ip: ref.hostIp ?? "",
        },
        1,
      );
    }
  }
}

function registerHealthMetrics(registry: Registry, state: StoreState, now: Date): void {
  const outcome = new Gauge({
    name: METRIC.outcome,
    help: "Outcome of the latest collection tick (1 for the current outcome)",
    labelNames: ["outcome"],
    registers: [registry],
  });
  const current = state.lastOutcome?.kind;
  for (const kind of OUTCOMES) {
    outcome.set({ outcome: kind }, current === kind ? 1 : 0);
  }

  const collections = new Counter({
    name: METRIC.collections,
    help: "Collection ticks since process start, by outcome",
    labelNames: ["outcome"],
    registers: [registry],
  });
  for (const kind of OUTCOMES) {
    collections.inc({ outcome: kind }, state.counters[kind]);
  }

  // Nothing below is meaningful until a snapshot has been captured
  if (!state.snapshot) return;

  const failed = new Gauge({
    name: METRIC.failedClaims,
    help: "PVCs that could not be measured in the served snapshot",
    registers: [registry],
  });
  const served = state.snapshot.outcome;
  failed.set(served.kind === "partial_failure" ? served.failedCount : 0);

  const capturedMs = Date.parse(state.snapshot.capturedAt);

  const age = new Gauge({
    name: METRIC.age,
    help: "Seconds since the served snapshot was captured",
    registers: [registry],
  });
  age.set(Math.max(0, now.getTime() - capturedMs) / 1000);

  const lastSuccess = new Gauge({
    name: METRIC.lastSuccess,
    help: "Unix time at which the served snapshot was captured",
    registers: [registry],
  });
  lastSuccess.set(capturedMs / 1000);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isByteValue(n: unknown): boolean {
  return typeof n === "number" && Number.isFinite(n) && n >= 0;
}

/** Returns a description of what is wrong with a record, or null */
export function recordProblem(record: VolumeUsageRecord): string | null {
  if (!record.namespace || !record.claimName) return "missing claim identity";
  if (record.status.state !== "ok") return null;
  const s: VolumeUsageOk = record.status;
  if (!isByteValue(s.capacityBytes) || !isByteValue(s.usedBytes) || !isByteValue(s.availableBytes)) {
    return "non-numeric or negative byte count";
  }
  if (s.usedBytes > s.capacityBytes) return "used exceeds capacity";
  return null;
}
