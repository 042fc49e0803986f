import type { FileStorage } from "../storage/storage.js";
import { classify, isTextCategory, type FileCategory } from "../storage/classifier.js";
import { displayNameOf } from "../storage/namer.js";
import { isNotFound } from "../storage/local.js";
import { notFoundError, notPreviewableError, readError } from "./errors.js";

export interface Preview {
  content: string;
  type: FileCategory;
  filename: string;
}

// Longest UTF-8 sequence minus one: enough lookahead to see whether the cut splits a character.
const LOOKAHEAD = 3;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Index at or before `limit` that does not fall inside a multi-byte character. */
export function charBoundary(data: Buffer, limit: number): number {
  let end = Math.min(limit, data.length);
  while (end > 0 && end < data.length && (data[end] & 0xc0) === 0x80) {
    end--;
  }
  return end;
}

export class PreviewReader {
  private storage: FileStorage;
  private limit: number;

  constructor(storage: FileStorage, limit: number) {
    this.storage = storage;
    this.limit = limit;
  }

  async preview(storageId: string): Promise<Preview> {
    const filename = displayNameOf(storageId);
    const { category } = classify(filename);
    if (!isTextCategory(category)) {
      throw notPreviewableError();
    }

    let data: Buffer;
    let size: number;
    try {
      ({ data, size } = await this.storage.readPrefix(storageId, this.limit + LOOKAHEAD));
    } catch (err) {
      if (isNotFound(err)) throw notFoundError();
      console.error(`ERROR: preview read failed for ${storageId}:`, err);
      throw readError();
    }

    const truncated = size > this.limit;
    const end = truncated ? charBoundary(data, this.limit) : data.length;

    let text: string;
    try {
      text = utf8.decode(data.subarray(0, end));
    } catch {
      throw readError();
    }

    if (truncated) {
      text += `...\n\n[Content truncated - showing first ${Math.round(this.limit / 1024)}KB of ${filename}]`;
    }
    return { content: text, type: category, filename };
  }
}
