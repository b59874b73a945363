/**
 * Helpers for locating a volume's mount on this node and turning
 * filesystem statistics into byte counts.
 */

export interface MountEntry {
  device: string;
  mountPoint: string;
  fsType: string;
}

/** The subset of `fs.StatsFs` used to compute usage */
export interface FsStats {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface VolumeBytes {
  capacityBytes: number;
  usedBytes: number;
  availableBytes: number;
}

/** Decode the octal escapes (`\040` for space etc.) used in mount tables */
function unescapeMountField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_m, oct: string) =>
    String.fromCharCode(parseInt(oct, 8)),
  );
}

/**
 * Parse `/proc/mounts` (or `/etc/mtab`) content.
 * Lines with fewer than three fields are ignored.
 */
export function parseMountTable(text: string): MountEntry[] {
  const entries: MountEntry[] = [];

  for (const line of text.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3 || fields[0].startsWith("#")) continue;
    entries.push({
      device: unescapeMountField(fields[0]),
      mountPoint: unescapeMountField(fields[1]),
      fsType: fields[2],
    });
  }

  return entries;
}

/**
 * Find the mount of a PersistentVolume. Kubelet mounts a volume in a
 * directory named after the PV, directly under its plugin directory
 * (`/var/lib/kubelet/pods/<uid>/volumes/kubernetes.io~csi/<pv>/mount`), or
 * for CSI staging under `.../pv/<pv>/globalmount`. Only those positions
 * are matched, so a PV named like another path segment (`mount`, `pods`)
 * never picks up a foreign mount.
 */
export function findVolumeMount(
  entries: readonly MountEntry[],
  volumeName: string,
): MountEntry | undefined {
  return entries.find((e) => isVolumeMountPoint(e.mountPoint, volumeName));
}

function isVolumeMountPoint(mountPoint: string, volumeName: string): boolean {
  const segments = mountPoint.split("/");
  for (let i = 1; i < segments.length; i++) {
    if (segments[i] !== volumeName) continue;
    const parent = segments[i - 1];
    if (parent.startsWith("kubernetes.io~")) return true;
    if (parent === "pv" && segments[i + 1] === "globalmount") return true;
  }
  return false;
}

/** Capacity, used and available bytes from statfs block counts */
export function usageFromStatfs(stats: FsStats): VolumeBytes {
  return {
    capacityBytes: stats.blocks * stats.bsize,
    usedBytes: (stats.blocks - stats.bfree) * stats.bsize,
    availableBytes: stats.bavail * stats.bsize,
  };
}
