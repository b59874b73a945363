/**
 * Kubernetes-backed volume source.
 *
 * Enumeration lists the running pods scheduled on this node and collects
 * the PersistentVolumeClaims they mount. Measurement resolves each claim
 * to its bound PersistentVolume, finds that volume's mount in the node
 * mount table, and reads block counts with statfs.
 *
 * Only read calls are made against the API server and the filesystem.
 */

import { readFile, statfs } from "node:fs/promises";
import type {
  CoreV1Api,
  V1PersistentVolume,
  V1PersistentVolumeClaim,
  V1Pod,
} from "@kubernetes/client-node";
import type { PodRef, VolumeType } from "@pvc-exporter/shared";
import type { Logger } from "../logger.js";
import { ClaimQueryError, EnumerationError, errorMessage } from "../errors.js";
import { findVolumeMount, parseMountTable, usageFromStatfs } from "./mount-table.js";
import type { FsStats, MountEntry } from "./mount-table.js";
import type {
  ClaimExcluded,
  ClaimRef,
  VolumeMeasurement,
  VolumeSource,
} from "./volume-source.js";

/** The CoreV1Api calls this source makes */
export type CoreApi = Pick<
  CoreV1Api,
  "listPodForAllNamespaces" | "readNamespacedPersistentVolumeClaim" | "readPersistentVolume"
>;

/** Filesystem access, swappable in tests */
export interface NodeFs {
  readFile(path: string): Promise<string>;
  statfs(path: string): Promise<FsStats>;
}

export interface KubeVolumeSourceOptions {
  /** Keep only pods whose status.hostIP matches */
  hostIp?: string;
  /** Keep only pods whose spec.nodeName matches */
  nodeName?: string;
  /** Namespace allow-list */
  namespaces?: string[];
  /** Equality selector matched against PVC labels */
  labelSelector?: Record<string, string>;
  mountTablePath: string;
  logger: Logger;
  fs?: NodeFs;
}

const defaultFs: NodeFs = {
  readFile: (path) => readFile(path, "utf8"),
  statfs: (path) => statfs(path),
};

export class KubeVolumeSource implements VolumeSource {
  private core: CoreApi;
  private opts: KubeVolumeSourceOptions;
  private fs: NodeFs;
  private log: Logger;

  /** Mount table read during the latest enumeration */
  private mounts: MountEntry[] | null = null;

  constructor(core: CoreApi, options: KubeVolumeSourceOptions) {
    this.core = core;
    this.opts = options;
    this.fs = options.fs ?? defaultFs;
    this.log = options.logger;
  }

  async listClaims(signal: AbortSignal): Promise<ClaimRef[]> {
    let pods: V1Pod[];
    try {
      const [podList, mountText] = await Promise.all([
        this.core.listPodForAllNamespaces(undefined, undefined, this.fieldSelector()),
        this.fs.readFile(this.opts.mountTablePath),
      ]);
      pods = podList.body.items;
      this.mounts = parseMountTable(mountText);
    } catch (err) {
      throw new EnumerationError(`Failed to enumerate claims: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    signal.throwIfAborted();

    const claims = new Map<string, ClaimRef>();

    for (const pod of pods) {
      if (!this.isLocalRunningPod(pod)) continue;

      const namespace = pod.metadata?.namespace;
      const podName = pod.metadata?.name;
      if (!namespace || !podName) continue;
      if (this.opts.namespaces && !this.opts.namespaces.includes(namespace)) continue;

      const ref: PodRef = { pod: podName, namespace };
      if (pod.status?.hostIP) ref.hostIp = pod.status.hostIP;

      for (const volume of pod.spec?.volumes ?? []) {
        const claimName = volume.persistentVolumeClaim?.claimName;
        if (!claimName) continue;

        const key = `${namespace}/${claimName}`;
        const existing = claims.get(key);
        if (existing) {
          if (!existing.mountedBy.some((p) => p.pod === podName)) {
            existing.mountedBy.push(ref);
          }
        } else {
          claims.set(key, { namespace, claimName, mountedBy: [ref] });
        }
      }
    }

    this.log.debug({ pods: pods.length, claims: claims.size }, "enumerated claims");
    return [...claims.values()];
  }

  async measure(
    claim: ClaimRef,
    signal: AbortSignal,
  ): Promise<VolumeMeasurement | ClaimExcluded> {
    const { namespace, claimName } = claim;

    let pvc: V1PersistentVolumeClaim;
    try {
      ({ body: pvc } = await this.core.readNamespacedPersistentVolumeClaim(claimName, namespace));
    } catch (err) {
      throw new ClaimQueryError("api_error", `Failed to read PVC: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    signal.throwIfAborted();

    if (!matchesSelector(pvc.metadata?.labels, this.opts.labelSelector)) {
      return { excluded: true, reason: "label selector" };
    }

    const volumeName = pvc.spec?.volumeName;
    if (!volumeName) {
      throw new ClaimQueryError("unbound", "Claim is not bound to a volume");
    }

    let pv: V1PersistentVolume;
    try {
      ({ body: pv } = await this.core.readPersistentVolume(volumeName));
    } catch (err) {
      throw new ClaimQueryError("api_error", `Failed to read PV ${volumeName}: ${errorMessage(err)}`, {
        cause: err,
        volumeName,
      });
    }
    signal.throwIfAborted();

    const volumeType = volumeTypeOf(pv);
    const mounts = this.mounts ?? parseMountTable(await this.readMountTable());
    const mount = findVolumeMount(mounts, volumeName);
    if (!mount) {
      throw new ClaimQueryError("not_mounted", `Volume ${volumeName} is not mounted on this node`, {
        volumeName,
        volumeType,
      });
    }

    let stats: FsStats;
    try {
      stats = await this.fs.statfs(mount.mountPoint);
    } catch (err) {
      throw new ClaimQueryError("stat_failed", `statfs ${mount.mountPoint}: ${errorMessage(err)}`, {
        cause: err,
        volumeName,
        volumeType,
      });
    }

    return {
      volumeName,
      volumeType,
      ...usageFromStatfs(stats),
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private fieldSelector(): string {
    const terms = ["status.phase=Running"];
    if (this.opts.nodeName) terms.push(`spec.nodeName=${this.opts.nodeName}`);
    return terms.join(",");
  }

  private isLocalRunningPod(pod: V1Pod): boolean {
    if (pod.status?.phase !== "Running") return false;
    if (this.opts.hostIp && pod.status?.hostIP !== this.opts.hostIp) return false;
    if (this.opts.nodeName && pod.spec?.nodeName !== this.opts.nodeName) return false;
    return true;
  }

  private async readMountTable(): Promise<string> {
    try {
      return await this.fs.readFile(this.opts.mountTablePath);
    } catch (err) {
      throw new ClaimQueryError("stat_failed", `Failed to read mount table: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function volumeTypeOf(pv: V1PersistentVolume): VolumeType {
  const spec = pv.spec;
  if (spec?.csi) return "csi";
  if (spec?.hostPath) return "hostPath";
  if (spec?.local) return "local";
  if (spec?.nfs) return "nfs";
  return "other";
}

export function matchesSelector(
  labels: Record<string, string> | undefined,
  selector: Record<string, string> | undefined,
): boolean {
  if (!selector) return true;
  return Object.entries(selector).every(([k, v]) => labels?.[k] === v);
}
