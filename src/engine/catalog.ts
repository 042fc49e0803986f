import type { FileStorage } from "../storage/storage.js";
import { toRecord, type FileRecord } from "./records.js";
import { notFoundError } from "./errors.js";

export class Catalog {
  private storage: FileStorage;

  constructor(storage: FileStorage) {
    this.storage = storage;
  }

  /** Every stored file, sorted by display name. */
  async list(): Promise<FileRecord[]> {
    const entries = await this.storage.scan();
    const records = entries.map((e) => toRecord(e.storageId, e.size));
    records.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return records;
  }

  async delete(storageId: string): Promise<void> {
    const removed = await this.storage.delete(storageId);
    if (!removed) {
      throw notFoundError();
    }
  }
}
