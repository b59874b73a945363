import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import pino from "pino";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { SnapshotStore } from "../store/snapshot-store.js";
import { VolumeCollector } from "../collector/volume-collector.js";
import type { ClaimRef, VolumeMeasurement, VolumeSource } from "../collector/volume-source.js";
import { EnumerationError } from "../errors.js";
import { NO_DATA_LINE } from "../exposition/render.js";
import { sampleValue, samplesOf } from "../test/prom-text.js";

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

const logger = pino({ level: "silent" });
const GB = 1_000_000_000;
const T0 = new Date("2026-03-01T12:00:00.000Z");

/** Claim name → [used GB, capacity GB]; a missing entry never answers */
type Volumes = Record<string, [number, number] | undefined>;

function claim(claimName: string): ClaimRef {
  return { namespace: "default", claimName, mountedBy: [{ pod: `${claimName}-0`, namespace: "default" }] };
}

function createFakeSource(volumes: Volumes) {
  let failEnumeration = false;
  const source = {
    listClaims: vi.fn(async () => {
      if (failEnumeration) throw new EnumerationError("Failed to enumerate claims: api down");
      return Object.keys(volumes).map(claim);
    }),
    measure: vi.fn((c: ClaimRef): Promise<VolumeMeasurement> => {
      const v = volumes[c.claimName];
      if (!v) return new Promise<VolumeMeasurement>(() => {});
      const [used, capacity] = v;
      return Promise.resolve({
        volumeName: `pv-${c.claimName}`,
        volumeType: "csi",
        capacityBytes: capacity * GB,
        usedBytes: used * GB,
        availableBytes: (capacity - used) * GB,
      });
    }),
    failEnumeration(fail: boolean) {
      failEnumeration = fail;
    },
  };
  return source satisfies VolumeSource;
}

function labelsOf(claimName: string) {
  return { persistentvolumeclaim: claimName, pvc_namespace: "default" };
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let app: FastifyInstance;
let store: SnapshotStore;

beforeEach(async () => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(T0);
  store = new SnapshotStore();
  app = await buildApp({ logger: false, store });
});

afterEach(async () => {
  await app.close();
  vi.useRealTimers();
});

function createCollector(source: VolumeSource, claimTimeoutMs = 1000) {
  return new VolumeCollector(source, store, { claimTimeoutMs, logger });
}

// ---------------------------------------------------------------------------
// GET /metrics
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  it("answers 503 with a no-data line before the first snapshot", async () => {
    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(503);
    expect(res.body.split("\n")[0]).toBe(NO_DATA_LINE);
    expect(samplesOf(res.body, "pvc_usage_bytes")).toHaveLength(0);
    expect(samplesOf(res.body, "pvc_exporter_collection_outcome")).toHaveLength(3);
  });

  it("serves every claim after a successful collection", async () => {
    const collector = createCollector(createFakeSource({ a: [10, 100], b: [50, 100], c: [0, 100] }));
    await collector.collect();

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("a"))).toBe(10 * GB);
    expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("b"))).toBe(50 * GB);
    expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("c"))).toBe(0);
    expect(sampleValue(res.body, "pvc_capacity_bytes", labelsOf("c"))).toBe(100 * GB);
    expect(sampleValue(res.body, "pvc_exporter_collection_outcome", { outcome: "success" })).toBe(1);
    expect(sampleValue(res.body, "pvc_exporter_failed_claims")).toBe(0);
    expect(sampleValue(res.body, "pvc_exporter_snapshot_age_seconds")).toBe(0);
  });

  it("marks a timed-out claim unavailable and serves the rest", async () => {
    const collector = createCollector(
      createFakeSource({ a: [10, 100], b: undefined, c: [0, 100] }),
      30,
    );
    await collector.collect();

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("a"))).toBe(10 * GB);
    expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("c"))).toBe(0);
    expect(samplesOf(res.body, "pvc_usage_bytes", labelsOf("b"))).toHaveLength(0);
    expect(sampleValue(res.body, "pvc_volume_up", labelsOf("b"))).toBe(0);
    expect(sampleValue(res.body, "pvc_volume_unavailable", { ...labelsOf("b"), reason: "timeout" })).toBe(1);
    expect(
      sampleValue(res.body, "pvc_exporter_collection_outcome", { outcome: "partial_failure" }),
    ).toBe(1);
    expect(sampleValue(res.body, "pvc_exporter_failed_claims")).toBe(1);
  });

  it("keeps serving an ageing snapshot while enumeration fails", async () => {
    const source = createFakeSource({ a: [10, 100] });
    const collector = createCollector(source);
    await collector.collect();

    vi.setSystemTime(new Date(T0.getTime() + 60_000));
    source.failEnumeration(true);
    await collector.collect();
    const first = await app.inject({ method: "GET", url: "/metrics" });

    vi.setSystemTime(new Date(T0.getTime() + 120_000));
    await collector.collect();
    const second = await app.inject({ method: "GET", url: "/metrics" });

    for (const res of [first, second]) {
      expect(res.statusCode).toBe(200);
      expect(sampleValue(res.body, "pvc_usage_bytes", labelsOf("a"))).toBe(10 * GB);
      expect(
        sampleValue(res.body, "pvc_exporter_collection_outcome", { outcome: "total_failure" }),
      ).toBe(1);
      expect(sampleValue(res.body, "pvc_exporter_last_success_timestamp_seconds")).toBe(1772366400);
    }
    expect(sampleValue(first.body, "pvc_exporter_snapshot_age_seconds")).toBe(60);
    expect(sampleValue(second.body, "pvc_exporter_snapshot_age_seconds")).toBe(120);
    expect(
      sampleValue(second.body, "pvc_exporter_collections_total", { outcome: "total_failure" }),
    ).toBe(2);
  });

  it("never triggers a collection", async () => {
    const source = createFakeSource({ a: [1, 2] });
    const collector = createCollector(source);
    await collector.collect();

    await app.inject({ method: "GET", url: "/metrics" });
    await app.inject({ method: "GET", url: "/metrics" });

    expect(source.listClaims).toHaveBeenCalledTimes(1);
    expect(source.measure).toHaveBeenCalledTimes(1);
  });

  it("returns byte-identical bodies for the same snapshot and time", async () => {
    await createCollector(createFakeSource({ a: [10, 100], b: [50, 100] })).collect();

    const first = await app.inject({ method: "GET", url: "/metrics" });
    const second = await app.inject({ method: "GET", url: "/metrics" });

    expect(second.body).toBe(first.body);
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("collector lifecycle", () => {
  it("starts the collector when ready and stops it on close", async () => {
    const collector = { start: vi.fn(), stop: vi.fn() };
    const server = await buildApp({ logger: false, collector });

    await server.ready();
    expect(collector.start).toHaveBeenCalledTimes(1);
    expect(collector.stop).not.toHaveBeenCalled();

    await server.close();
    expect(collector.stop).toHaveBeenCalledTimes(1);
  });
});
