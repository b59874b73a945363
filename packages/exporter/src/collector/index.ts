/**
 * Collector Module
 *
 * Gathers volume usage on a timer and publishes immutable snapshots to the
 * SnapshotStore.
 *
 * IMPORTANT: This module must NOT import from or depend on the web
 * framework (Fastify, routes, plugins). Scrape handlers and the collector
 * communicate only through the store.
 */

export { VolumeCollector } from "./volume-collector.js";
export type { VolumeCollectorOptions } from "./volume-collector.js";
export { KubeVolumeSource } from "./kube-volume-source.js";
export type { CoreApi, KubeVolumeSourceOptions, NodeFs } from "./kube-volume-source.js";
export type {
  ClaimExcluded,
  ClaimRef,
  VolumeMeasurement,
  VolumeSource,
} from "./volume-source.js";
