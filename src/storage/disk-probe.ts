import fsp from "node:fs/promises";

export interface DiskSpace {
  freeBytes: number;
  totalBytes: number;
}

/** Reports capacity of the volume holding a path. Rejects when the host cannot tell. */
export type DiskProbe = (dir: string) => Promise<DiskSpace>;

export const statfsProbe: DiskProbe = async (dir) => {
  const stats = await fsp.statfs(dir);
  const blockSize = Number(stats.bsize);
  const totalBytes = blockSize * Number(stats.blocks);
  const freeBytes = blockSize * Number(stats.bavail);
  if (!Number.isFinite(totalBytes) || !Number.isFinite(freeBytes) || totalBytes <= 0) {
    throw new Error(`statfs returned no usable capacity for ${dir}`);
  }
  return { freeBytes, totalBytes };
};
