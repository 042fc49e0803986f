import { classify, type FileCategory } from "../storage/classifier.js";
import { displayNameOf } from "../storage/namer.js";

/** A stored file as the API reports it. Derived from the filesystem on every call. */
export interface FileRecord {
  /** Display name: the storage id without its token prefix. */
  name: string;
  /** Storage id, the key for download, preview and delete. */
  path: string;
  size: number;
  file_type: FileCategory;
  can_preview: boolean;
}

export function toRecord(storageId: string, size: number): FileRecord {
  const name = displayNameOf(storageId);
  const { category, previewable } = classify(name);
  return {
    name,
    path: storageId,
    size,
    file_type: category,
    can_preview: previewable,
  };
}
