import { describe, it, expect, vi } from "vitest";
import type { Snapshot, VolumeUsageRecord } from "@pvc-exporter/shared";
import { NO_DATA_LINE, recordProblem, renderExposition } from "./render.js";
import type { StoreState } from "../store/snapshot-store.js";
import { parseSamples, sampleValue, samplesOf } from "../test/prom-text.js";

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

const GB = 1_000_000_000;
const CAPTURED_AT = "2026-03-01T12:00:00.000Z";
const NOW = new Date("2026-03-01T12:00:30.000Z");

const RECORD_A: VolumeUsageRecord = {
  namespace: "default",
  claimName: "a",
  volumeName: "pv-a",
  volumeType: "csi",
  mountedBy: [{ pod: "a-0", namespace: "default", hostIp: "10.0.0.1" }],
  status: {
    state: "ok",
    capacityBytes: 100 * GB,
    usedBytes: 10 * GB,
    availableBytes: 90 * GB,
    consistent: true,
  },
};

const RECORD_B: VolumeUsageRecord = {
  namespace: "default",
  claimName: "b",
  mountedBy: [],
  status: { state: "unavailable", reason: "timeout" },
};

const LABELS_A = {
  persistentvolumeclaim: "a",
  pvc_namespace: "default",
  volume: "pv-a",
  pvc_type: "csi",
};

function createState(snapshot: Snapshot | null, overrides?: Partial<StoreState>): StoreState {
  return {
    snapshot,
    lastAttemptAt: snapshot?.capturedAt ?? null,
    lastOutcome: snapshot?.outcome ?? null,
    counters: { success: snapshot ? 1 : 0, partial_failure: 0, total_failure: 0 },
    ...overrides,
  };
}

const PARTIAL: Snapshot = {
  capturedAt: CAPTURED_AT,
  outcome: { kind: "partial_failure", failedCount: 1 },
  records: [RECORD_A, RECORD_B],
};

// ---------------------------------------------------------------------------
// renderExposition
// ---------------------------------------------------------------------------

describe("renderExposition", () => {
  it("renders usage, capacity and available bytes for OK records", async () => {
    const { body, hasData } = await renderExposition(createState(PARTIAL), { now: NOW });

    expect(hasData).toBe(true);
    expect(sampleValue(body, "pvc_usage_bytes", LABELS_A)).toBe(10 * GB);
    expect(sampleValue(body, "pvc_capacity_bytes", LABELS_A)).toBe(100 * GB);
    expect(sampleValue(body, "pvc_available_bytes", LABELS_A)).toBe(90 * GB);
    expect(sampleValue(body, "pvc_usage_consistent", LABELS_A)).toBe(1);
    expect(sampleValue(body, "pvc_volume_up", LABELS_A)).toBe(1);
  });

  it("writes sample lines in the exposition syntax", async () => {
    const { body } = await renderExposition(createState(PARTIAL), { now: NOW });
    const lines = body.split("\n");

    expect(lines).toContain("# TYPE pvc_usage_bytes gauge");
    expect(lines).toContain("pvc_exporter_failed_claims 1");
    expect(lines).toContain("pvc_exporter_snapshot_age_seconds 30");
  });

  it("emits only status gauges for unavailable records", async () => {
    const { body } = await renderExposition(createState(PARTIAL), { now: NOW });

    for (const name of ["pvc_usage_bytes", "pvc_capacity_bytes", "pvc_available_bytes"]) {
      expect(samplesOf(body, name, { persistentvolumeclaim: "b" })).toHaveLength(0);
    }
    expect(sampleValue(body, "pvc_volume_up", { persistentvolumeclaim: "b" })).toBe(0);
    expect(samplesOf(body, "pvc_volume_unavailable")).toEqual([
      {
        name: "pvc_volume_unavailable",
        labels: {
          persistentvolumeclaim: "b",
          pvc_namespace: "default",
          volume: "",
          pvc_type: "",
          reason: "timeout",
        },
        value: 1,
      },
    ]);
  });

  it("maps claims to the pods mounting them", async () => {
    const { body } = await renderExposition(createState(PARTIAL), { now: NOW });

    expect(samplesOf(body, "pvc_pod_mapping")).toEqual([
      {
        name: "pvc_pod_mapping",
        labels: {
          persistentvolumeclaim: "a",
          pvc_namespace: "default",
          mountedby: "a-0",
          pod_namespace: "default",
          host_ip: "10.0.0.1",
        },
        value: 1,
      },
    ]);
  });

  it("reports outcome, failed count, age and capture time", async () => {
    const { body } = await renderExposition(createState(PARTIAL), { now: NOW });

    expect(sampleValue(body, "pvc_exporter_collection_outcome", { outcome: "success" })).toBe(0);
    expect(sampleValue(body, "pvc_exporter_collection_outcome", { outcome: "partial_failure" })).toBe(1);
    expect(sampleValue(body, "pvc_exporter_collection_outcome", { outcome: "total_failure" })).toBe(0);
    expect(sampleValue(body, "pvc_exporter_failed_claims")).toBe(1);
    expect(sampleValue(body, "pvc_exporter_snapshot_age_seconds")).toBe(30);
    expect(sampleValue(body, "pvc_exporter_last_success_timestamp_seconds")).toBe(1772366400);
  });

  it("reports a total failure while still serving the previous snapshot", async () => {
    const state = createState(PARTIAL, {
      lastOutcome: { kind: "total_failure", error: "api down" },
      counters: { success: 0, partial_failure: 1, total_failure: 3 },
    });

    const { body, hasData } = await renderExposition(state, { now: NOW });

    expect(hasData).toBe(true);
    expect(sampleValue(body, "pvc_exporter_collection_outcome", { outcome: "total_failure" })).toBe(1);
    expect(sampleValue(body, "pvc_exporter_collections_total", { outcome: "total_failure" })).toBe(3);
    expect(sampleValue(body, "pvc_exporter_collections_total", { outcome: "partial_failure" })).toBe(1);
    expect(sampleValue(body, "pvc_usage_bytes", LABELS_A)).toBe(10 * GB);
  });

  it("renders a no-data response before the first snapshot", async () => {
    const { body, hasData } = await renderExposition(createState(null), { now: NOW });

    expect(hasData).toBe(false);
    expect(body.startsWith(`${NO_DATA_LINE}\n`)).toBe(true);
    const names = new Set(parseSamples(body).map((s) => s.name));
    expect(names).toEqual(
      new Set(["pvc_exporter_collection_outcome", "pvc_exporter_collections_total"]),
    );
  });

  it("reports no failed-claim count before anything was measured", async () => {
    const state = createState(null, {
      lastOutcome: { kind: "total_failure", error: "api down" },
      counters: { success: 0, partial_failure: 0, total_failure: 1 },
    });

    const { body } = await renderExposition(state, { now: NOW });

    expect(samplesOf(body, "pvc_exporter_failed_claims")).toHaveLength(0);
    expect(sampleValue(body, "pvc_exporter_collection_outcome", { outcome: "total_failure" })).toBe(1);
  });

  it("skips a malformed record without blanking the others", async () => {
    const broken: VolumeUsageRecord = {
      namespace: "default",
      claimName: "broken",
      mountedBy: [],
      status: { state: "ok", capacityBytes: 10, usedBytes: Number.NaN, availableBytes: 5, consistent: true },
    };
    const snapshot: Snapshot = { ...PARTIAL, records: [RECORD_A, broken] };
    const logger = { warn: vi.fn() };

    const { body } = await renderExposition(createState(snapshot), { now: NOW, logger });

    expect(sampleValue(body, "pvc_usage_bytes", LABELS_A)).toBe(10 * GB);
    expect(samplesOf(body, "pvc_volume_up", { persistentvolumeclaim: "broken" })).toHaveLength(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("uses the Prometheus text content type", async () => {
    const { contentType } = await renderExposition(createState(PARTIAL), { now: NOW });
    expect(contentType).toBe("text/plain; version=0.0.4; charset=utf-8");
  });
});

// ---------------------------------------------------------------------------
// recordProblem
// ---------------------------------------------------------------------------

describe("recordProblem", () => {
  it("accepts well-formed records", () => {
    expect(recordProblem(RECORD_A)).toBeNull();
    expect(recordProblem(RECORD_B)).toBeNull();
  });

  it("flags used above capacity", () => {
    const record: VolumeUsageRecord = {
      ...RECORD_A,
      status: { state: "ok", capacityBytes: 1, usedBytes: 2, availableBytes: 0, consistent: false },
    };
    expect(recordProblem(record)).toBe("used exceeds capacity");
  });

  it("flags a missing claim name", () => {
    expect(recordProblem({ ...RECORD_B, claimName: "" })).toBe("missing claim identity");
  });
});
