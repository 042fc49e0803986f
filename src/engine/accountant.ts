import type { FileStorage } from "../storage/storage.js";
import type { DiskProbe, DiskSpace } from "../storage/disk-probe.js";
import { formatBytes } from "./format.js";

const GiB = 1024 * 1024 * 1024;

/** Reported when the disk probe fails: a 500 GiB disk with 250 GiB free. */
export const FALLBACK_DISK_SPACE: DiskSpace = {
  freeBytes: 250 * GiB,
  totalBytes: 500 * GiB,
};

export interface StorageStats {
  used_bytes: number;
  total_files: number;
  used_percentage: number;
  formatted_used: string;
  max_size_mb: number;
  disk_free_bytes: number;
  disk_total_bytes: number;
  disk_used_percentage: number;
  formatted_disk_free: string;
  formatted_disk_total: string;
  /** False when the disk figures are FALLBACK_DISK_SPACE rather than measured. */
  disk_probe_ok: boolean;
}

export class StorageAccountant {
  private storage: FileStorage;
  private root: string;
  private quotaBytes: number;
  private probe: DiskProbe;

  constructor(storage: FileStorage, root: string, quotaBytes: number, probe: DiskProbe) {
    this.storage = storage;
    this.root = root;
    this.quotaBytes = quotaBytes;
    this.probe = probe;
  }

  async computeStats(): Promise<StorageStats> {
    const entries = await this.storage.scan();
    let usedBytes = 0;
    for (const e of entries) {
      usedBytes += e.size;
    }

    let disk = FALLBACK_DISK_SPACE;
    let probeOk = true;
    try {
      disk = await this.probe(this.root);
    } catch (err) {
      probeOk = false;
      console.warn(`WARN: disk probe failed for ${this.root}, reporting fallback capacity:`, err);
    }

    const diskUsed = Math.max(0, disk.totalBytes - disk.freeBytes);

    return {
      used_bytes: usedBytes,
      total_files: entries.length,
      used_percentage: this.quotaBytes > 0 ? (usedBytes * 100) / this.quotaBytes : 0,
      formatted_used: formatBytes(usedBytes),
      max_size_mb: Math.floor(this.quotaBytes / 1024 / 1024),
      disk_free_bytes: disk.freeBytes,
      disk_total_bytes: disk.totalBytes,
      disk_used_percentage: disk.totalBytes > 0 ? (diskUsed * 100) / disk.totalBytes : 0,
      formatted_disk_free: formatBytes(disk.freeBytes),
      formatted_disk_total: formatBytes(disk.totalBytes),
      disk_probe_ok: probeOk,
    };
  }
}
