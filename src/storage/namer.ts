import { randomUUID } from "node:crypto";

const UNSAFE_CHARS = /[^\p{Alphabetic}\p{N}._-]/gu;

/**
 * Keeps letters, digits, ".", "-" and "_" and strips leading dots, so the
 * result can never name a hidden file, a parent directory or a nested path.
 */
export function sanitize(rawName: string): string {
  return rawName.replace(UNSAFE_CHARS, "").replace(/^\.+/, "");
}

export function makeStorageId(safeName: string): string {
  return `${randomUUID()}_${safeName}`;
}

/** Inverse of makeStorageId: everything after the first "_". */
export function displayNameOf(storageId: string): string {
  const sep = storageId.indexOf("_");
  return sep === -1 ? storageId : storageId.slice(sep + 1);
}
