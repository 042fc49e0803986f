import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { Transform, type Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  InvalidStorageIdError,
  SizeLimitError,
  type FileStorage,
  type Prefix,
  type SaveOptions,
  type StoredEntry,
} from "./storage.js";

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT" || err instanceof InvalidStorageIdError;
}

/** Local filesystem storage: one flat directory, one file per storage id. */
export class LocalStorage implements FileStorage {
  readonly root: string;

  constructor(basePath: string) {
    this.root = path.resolve(basePath);
  }

  async init(): Promise<void> {
    await fsp.mkdir(this.root, { recursive: true });
  }

  /** Maps a storage id to its path, refusing anything that would leave the root. */
  resolve(storageId: string): string {
    if (
      storageId === "" ||
      storageId === "." ||
      storageId === ".." ||
      storageId.includes("/") ||
      storageId.includes("\\") ||
      storageId.includes("\0")
    ) {
      throw new InvalidStorageIdError(storageId);
    }
    const target = path.join(this.root, storageId);
    if (path.dirname(target) !== this.root) {
      throw new InvalidStorageIdError(storageId);
    }
    return target;
  }

  async save(storageId: string, source: Readable, opts: SaveOptions): Promise<number> {
    const target = this.resolve(storageId);
    await this.init();

    let written = 0;
    const meter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        written += chunk.length;
        if (written > opts.maxBytes) {
          callback(new SizeLimitError(opts.maxBytes));
          return;
        }
        callback(null, chunk);
      },
    });

    // Exclusive create: an existing file is never ours to overwrite or remove.
    const handle = await fsp.open(target, "wx");
    try {
      await pipeline(source, meter, handle.createWriteStream(), { signal: opts.signal });
    } catch (err) {
      await fsp.rm(target, { force: true });
      throw err;
    }
    return written;
  }

  async scan(): Promise<StoredEntry[]> {
    let dirents: Dirent[];
    try {
      dirents = await fsp.readdir(this.root, { withFileTypes: true });
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }

    const entries = await Promise.all(
      dirents
        .filter((d) => d.isFile())
        .map(async (d): Promise<StoredEntry | null> => {
          try {
            const stat = await fsp.stat(path.join(this.root, d.name));
            return { storageId: d.name, size: stat.size };
          } catch (err) {
            // removed between readdir and stat
            if (errnoCode(err) === "ENOENT") return null;
            throw err;
          }
        }),
    );
    return entries.filter((e): e is StoredEntry => e !== null);
  }

  async readPrefix(storageId: string, maxBytes: number): Promise<Prefix> {
    const handle = await fsp.open(this.resolve(storageId), "r");
    try {
      const { size } = await handle.stat();
      const data = Buffer.alloc(Math.min(size, maxBytes));
      const { bytesRead } = await handle.read(data, 0, data.length, 0);
      return { data: data.subarray(0, bytesRead), size };
    } finally {
      await handle.close();
    }
  }

  async locate(storageId: string): Promise<string | null> {
    let target: string;
    try {
      target = this.resolve(storageId);
    } catch {
      return null;
    }
    try {
      const stat = await fsp.stat(target);
      return stat.isFile() ? target : null;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async delete(storageId: string): Promise<boolean> {
    try {
      await fsp.unlink(this.resolve(storageId));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}
