/**
 * Snapshot Store — owns the single "current snapshot" reference.
 *
 * The collector is the only writer (publish / recordFailure); scrape
 * handlers only read. All state lives in one frozen object that is
 * replaced by a single assignment, so a reader sees either the whole old
 * state or the whole new one and never needs a lock.
 */

import type {
  CollectionCounters,
  CollectionOutcome,
  Snapshot,
} from "@pvc-exporter/shared";

/** Everything a scrape needs, read as one unit */
export interface StoreState {
  /** Latest published snapshot, or null before the first one */
  readonly snapshot: Snapshot | null;
  /** ISO 8601 timestamp of the latest tick, successful or not */
  readonly lastAttemptAt: string | null;
  readonly lastOutcome: CollectionOutcome | null;
  readonly counters: Readonly<CollectionCounters>;
}

const EMPTY_STATE: StoreState = Object.freeze({
  snapshot: null,
  lastAttemptAt: null,
  lastOutcome: null,
  counters: Object.freeze({ success: 0, partial_failure: 0, total_failure: 0 }),
});

export class SnapshotStore {
  private _state: StoreState = EMPTY_STATE;

  /** Replace the current snapshot (collector only) */
  publish(snapshot: Snapshot): void {
    const prev = this._state;
    this._state = Object.freeze({
      snapshot: freezeSnapshot(snapshot),
      lastAttemptAt: snapshot.capturedAt,
      lastOutcome: snapshot.outcome,
      counters: bump(prev.counters, snapshot.outcome.kind),
    });
  }

  /**
   * Record a tick that could not enumerate claims (collector only).
   * The previous snapshot keeps being served and ages.
   */
  recordFailure(error: string, at: Date = new Date()): void {
    const prev = this._state;
    this._state = Object.freeze({
      snapshot: prev.snapshot,
      lastAttemptAt: at.toISOString(),
      lastOutcome: Object.freeze({ kind: "total_failure" as const, error }),
      counters: bump(prev.counters, "total_failure"),
    });
  }

  /** The latest snapshot, or null before the first completed tick */
  current(): Snapshot | null {
    return this._state.snapshot;
  }

  /** Snapshot plus collection metadata */
  state(): StoreState {
    return this._state;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function bump(
  counters: Readonly<CollectionCounters>,
  kind: keyof CollectionCounters,
): Readonly<CollectionCounters> {
  return Object.freeze({ ...counters, [kind]: counters[kind] + 1 });
}

/** Deep-freeze a snapshot so published state cannot be mutated in place */
function freezeSnapshot(snapshot: Snapshot): Snapshot {
  if (Object.isFrozen(snapshot)) return snapshot;
  for (const record of snapshot.records) {
    for (const ref of record.mountedBy) Object.freeze(ref);
    Object.freeze(record.mountedBy);
    Object.freeze(record.status);
    Object.freeze(record);
  }
  Object.freeze(snapshot.records);
  Object.freeze(snapshot.outcome);
  return Object.freeze(snapshot);
}
