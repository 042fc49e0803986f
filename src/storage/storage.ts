import type { Readable } from "node:stream";

export interface StoredEntry {
  storageId: string;
  size: number;
}

export interface SaveOptions {
  /** Ceiling on the bytes written; exceeding it aborts the write with SizeLimitError. */
  maxBytes: number;
  signal?: AbortSignal;
}

export interface Prefix {
  data: Buffer;
  /** Full size of the stored file, which may exceed data.length. */
  size: number;
}

/** FileStorage abstracts the flat directory of stored files. */
export interface FileStorage {
  /** Stream content into a new file, return the number of bytes written. The file never exists partially after a failure. */
  save(storageId: string, source: Readable, opts: SaveOptions): Promise<number>;
  /** Every regular file under the root. */
  scan(): Promise<StoredEntry[]>;
  /** Read at most maxBytes from the start of the file. */
  readPrefix(storageId: string, maxBytes: number): Promise<Prefix>;
  /** Absolute path of an existing file, or null when the id is invalid or absent. */
  locate(storageId: string): Promise<string | null>;
  /** Remove the file; false when there was nothing to remove. */
  delete(storageId: string): Promise<boolean>;
}

export class SizeLimitError extends Error {
  constructor(public readonly limit: number) {
    super(`Stream exceeded ${limit} bytes`);
    this.name = "SizeLimitError";
  }
}

export class InvalidStorageIdError extends Error {
  constructor(storageId: string) {
    super(`Invalid storage id: ${JSON.stringify(storageId)}`);
    this.name = "InvalidStorageIdError";
  }
}
