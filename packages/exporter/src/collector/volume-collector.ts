/**
 * Volume Collector — periodically lists the claims of interest, measures
 * each one, and publishes the result to the SnapshotStore as one
 * immutable snapshot.
 *
 * Per-claim isolation:
 *  - every claim is measured independently and bounded by a timeout
 *  - any per-claim failure becomes an "unavailable" record for that key
 *  - only a failure to enumerate claims fails the tick, and then nothing
 *    is published (the previous snapshot keeps serving, aged)
 *
 * IMPORTANT: Like the rest of the collection side, this is independent of
 * the web framework. It receives its dependencies via constructor
 * injection and talks to the HTTP layer only through the store.
 */

import type {
  SnapshotOutcome,
  Snapshot,
  VolumeUsageRecord,
  VolumeUsageStatus,
} from "@pvc-exporter/shared";
import type { Logger } from "../logger.js";
import type { SnapshotStore } from "../store/snapshot-store.js";
import { ClaimQueryError, TimeoutError, errorMessage } from "../errors.js";
import { isExcluded } from "./volume-source.js";
import type { ClaimRef, VolumeMeasurement, VolumeSource } from "./volume-source.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_INTERVAL_MS = 60_000;
const DEFAULT_CLAIM_TIMEOUT_MS = 10_000;
const DEFAULT_CONSISTENCY_TOLERANCE = 0.1;

export interface VolumeCollectorOptions {
  /** Collection interval in ms (default: 60000) */
  intervalMs?: number;
  /** Upper bound for a single claim query in ms (default: 10000) */
  claimTimeoutMs?: number;
  /** Allowed |used + available - capacity| as a fraction of capacity (default: 0.1) */
  consistencyTolerance?: number;
  logger: Logger;
  /** Clock, overridable in tests */
  now?: () => Date;
}

/** Result of measuring one claim */
type ClaimResult =
  | { kind: "record"; record: VolumeUsageRecord }
  | { kind: "excluded" };

// ---------------------------------------------------------------------------
// VolumeCollector
// ---------------------------------------------------------------------------

export class VolumeCollector {
  private source: VolumeSource;
  private store: SnapshotStore;
  private intervalMs: number;
  private claimTimeoutMs: number;
  private tolerance: number;
  private log: Logger;
  private now: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;

  /** Abort controller of the tick in flight, if any */
  private inFlight: AbortController | null = null;

  constructor(source: VolumeSource, store: SnapshotStore, options: VolumeCollectorOptions) {
    this.source = source;
    this.store = store;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.claimTimeoutMs = options.claimTimeoutMs ?? DEFAULT_CLAIM_TIMEOUT_MS;
    this.tolerance = options.consistencyTolerance ?? DEFAULT_CONSISTENCY_TOLERANCE;
    this.log = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Start the collection loop */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
    // Run an initial collection immediately
    void this.tick();
  }

  /** Stop the loop and abandon the tick in flight; the last snapshot stands */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.inFlight?.abort();
    this.inFlight = null;
  }

  /** Whether the collector is running */
  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Whether a tick is currently in progress */
  get isCollecting(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Run a single collection tick and publish its snapshot.
   * Returns the published snapshot, or null when nothing was published
   * (enumeration failed, or the tick was aborted).
   */
  async collect(signal?: AbortSignal): Promise<Snapshot | null> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    this.inFlight = controller;

    try {
      return await this.runTick(controller.signal);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (this.inFlight === controller) this.inFlight = null;
    }
  }

  // -----------------------------------------------------------------------
  // Internal collection
  // -----------------------------------------------------------------------

  /** Timer callback; never rejects and never overlaps a running tick */
  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.log.warn("previous collection still running, skipping tick");
      return;
    }
    try {
      await this.collect();
    } catch (err) {
      this.log.error({ err }, "collection tick failed unexpectedly");
    }
  }

  private async runTick(signal: AbortSignal): Promise<Snapshot | null> {
    const startedAt = this.now();

    // 1. Enumerate claims
    let claims: ClaimRef[];
    try {
      claims = await this.source.listClaims(signal);
    } catch (err) {
      if (signal.aborted) return null;
      const message = errorMessage(err);
      this.log.error({ err }, "claim enumeration failed, keeping previous snapshot");
      this.store.recordFailure(message, startedAt);
      return null;
    }

    // 2. Measure every claim independently
    const results = await Promise.all(claims.map((claim) => this.collectClaim(claim, signal)));

    if (signal.aborted) {
      this.log.info("collection aborted, snapshot not published");
      return null;
    }

    // 3. Aggregate into one snapshot
    const records = mergeRecords(
      results.flatMap((r) => (r.kind === "record" ? [r.record] : [])),
    );
    const failedCount = records.filter((r) => r.status.state === "unavailable").length;
    const outcome: SnapshotOutcome =
      failedCount === 0 ? { kind: "success" } : { kind: "partial_failure", failedCount };

    const snapshot: Snapshot = {
      records,
      capturedAt: startedAt.toISOString(),
      outcome,
    };

    // 4. Publish
    this.store.publish(snapshot);
    this.log.info(
      {
        claims: records.length,
        failed: failedCount,
        durationMs: this.now().getTime() - startedAt.getTime(),
      },
      "published volume usage snapshot",
    );
    return snapshot;
  }

  /** Measure one claim; every failure is converted into a record */
  private async collectClaim(claim: ClaimRef, signal: AbortSignal): Promise<ClaimResult> {
    const base = {
      namespace: claim.namespace,
      claimName: claim.claimName,
      mountedBy: claim.mountedBy.map((p) => ({ ...p })),
    };

    try {
      const result = await withTimeout(
        (s) => this.source.measure(claim, s),
        this.claimTimeoutMs,
        signal,
      );
      if (isExcluded(result)) {
        this.log.debug(
          { namespace: claim.namespace, claim: claim.claimName, reason: result.reason },
          "claim excluded",
        );
        return { kind: "excluded" };
      }
      const record: VolumeUsageRecord = {
        ...base,
        status: this.toStatus(result),
      };
      if (result.volumeName) record.volumeName = result.volumeName;
      if (result.volumeType) record.volumeType = result.volumeType;
      if (record.status.state === "unavailable") {
        this.log.warn(
          { namespace: claim.namespace, claim: claim.claimName, measurement: result },
          "discarding invalid measurement",
        );
      }
      return { kind: "record", record };
    } catch (err) {
      const reason = err instanceof ClaimQueryError ? err.reason : "error";
      this.log.warn(
        { namespace: claim.namespace, claim: claim.claimName, reason, err: errorMessage(err) },
        "claim unavailable",
      );
      const record: VolumeUsageRecord = { ...base, status: { state: "unavailable", reason } };
      if (err instanceof ClaimQueryError) {
        if (err.volumeName) record.volumeName = err.volumeName;
        if (err.volumeType) record.volumeType = err.volumeType;
      }
      return { kind: "record", record };
    }
  }

  /** Validate a raw measurement and flag used/available/capacity drift */
  private toStatus(m: VolumeMeasurement): VolumeUsageStatus {
    if (!isValidMeasurement(m)) {
      return { state: "unavailable", reason: "invalid_measurement" };
    }
    const drift = Math.abs(m.usedBytes + m.availableBytes - m.capacityBytes);
    return {
      state: "ok",
      capacityBytes: m.capacityBytes,
      usedBytes: m.usedBytes,
      availableBytes: m.availableBytes,
      consistent: drift <= m.capacityBytes * this.tolerance,
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isByteCount(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

export function isValidMeasurement(m: VolumeMeasurement): boolean {
  return (
    isByteCount(m.capacityBytes) &&
    isByteCount(m.usedBytes) &&
    isByteCount(m.availableBytes) &&
    m.usedBytes <= m.capacityBytes
  );
}

/** Compare claim keys: namespace first, then claim name */
export function compareKeys(
  a: { namespace: string; claimName: string },
  b: { namespace: string; claimName: string },
): number {
  if (a.namespace !== b.namespace) return a.namespace < b.namespace ? -1 : 1;
  if (a.claimName !== b.claimName) return a.claimName < b.claimName ? -1 : 1;
  return 0;
}

/**
 * Sort records by key and collapse duplicates. When a key appears twice
 * an OK record wins over an unavailable one, and mounting pods are merged.
 */
export function mergeRecords(records: VolumeUsageRecord[]): VolumeUsageRecord[] {
  const byKey = new Map<string, VolumeUsageRecord>();

  for (const record of records) {
    const key = `${record.namespace}/${record.claimName}`;
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, record);
      continue;
    }
    const winner =
      existing.status.state === "unavailable" && record.status.state === "ok" ? record : existing;
    const mountedBy = [...existing.mountedBy];
    for (const ref of record.mountedBy) {
      if (!mountedBy.some((p) => p.pod === ref.pod && p.namespace === ref.namespace)) {
        mountedBy.push(ref);
      }
    }
    byKey.set(key, { ...winner, mountedBy });
  }

  return [...byKey.values()].sort(compareKeys);
}

/**
 * Run `fn` with its own abort signal, rejecting with TimeoutError after
 * `ms`. Aborting `parent` aborts the call and rejects at once, whether or
 * not `fn` honours its signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new ClaimQueryError("error", "Claim query aborted");

  const controller = new AbortController();
  let stop: (err: Error) => void = () => {};
  const stopped = new Promise<never>((_resolve, reject) => {
    stop = reject;
  });

  const timer = setTimeout(() => {
    const err = new TimeoutError(ms);
    controller.abort(err);
    stop(err);
  }, ms);

  const onParentAbort = () => {
    controller.abort(parent?.reason);
    stop(new ClaimQueryError("error", "Claim query aborted"));
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
