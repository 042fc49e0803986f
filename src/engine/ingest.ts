import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import busboy from "busboy";
import { SizeLimitError, type FileStorage } from "../storage/storage.js";
import { makeStorageId, sanitize } from "../storage/namer.js";
import { toRecord, type FileRecord } from "./records.js";
import {
  fileTooLargeError,
  invalidMultipartError,
  noFilesError,
  tooManyFilesError,
} from "./errors.js";

/** An incoming request body together with its headers; an Express Request fits. */
export type UploadSource = Readable & { headers: IncomingHttpHeaders };

export interface IngestLimits {
  maxFileSize: number;
  maxFileCount: number;
}

export class ClientAbortedError extends Error {
  constructor() {
    super("Client disconnected during upload");
    this.name = "ClientAbortedError";
  }
}

/**
 * IngestPipeline streams the file parts of a multipart body to storage, one
 * part at a time in arrival order. A rejected part never leaves a file
 * behind; parts completed before the rejection are kept.
 */
export class IngestPipeline {
  private storage: FileStorage;
  private limits: IngestLimits;

  constructor(storage: FileStorage, limits: IngestLimits) {
    this.storage = storage;
    this.limits = limits;
  }

  ingest(req: UploadSource): Promise<FileRecord[]> {
    return new Promise((resolve, reject) => {
      let parser: busboy.Busboy;
      try {
        parser = busboy({ headers: req.headers, defParamCharset: "utf8" });
      } catch (err) {
        reject(invalidMultipartError(err instanceof Error ? err.message : "Invalid multipart body"));
        return;
      }

      const records: FileRecord[] = [];
      const abort = new AbortController();
      let queue: Promise<void> = Promise.resolve();
      let failure: Error | null = null;
      let settled = false;

      const settle = () => {
        if (settled) return;
        settled = true;
        queue.then(() => {
          if (failure) {
            reject(failure);
          } else if (records.length === 0) {
            reject(noFilesError());
          } else {
            resolve(records);
          }
        }, reject);
      };

      const fail = (err: Error) => {
        if (failure) return;
        failure = err;
        // Stop parsing but keep reading so the response can still be delivered.
        req.unpipe(parser);
        req.resume();
        settle();
      };

      const writePart = async (stream: Readable, info: busboy.FileInfo) => {
        // busboy also hands over octet-stream parts that carry no filename
        if (failure || typeof info.filename !== "string") {
          stream.resume();
          return;
        }
        if (records.length >= this.limits.maxFileCount) {
          stream.resume();
          fail(tooManyFilesError(this.limits.maxFileCount));
          return;
        }

        const storageId = makeStorageId(sanitize(info.filename));
        try {
          const size = await this.storage.save(storageId, stream, {
            maxBytes: this.limits.maxFileSize,
            signal: abort.signal,
          });
          records.push(toRecord(storageId, size));
        } catch (err) {
          stream.resume();
          fail(this.mapWriteError(err, abort.signal));
        }
      };

      parser.on("file", (_field, stream, info) => {
        queue = queue.then(() => writePart(stream, info));
      });
      parser.on("error", (err) => {
        fail(invalidMultipartError(err instanceof Error ? err.message : "Malformed multipart body"));
      });
      parser.on("close", settle);

      req.on("close", () => {
        if (!req.readableEnded && !failure) {
          abort.abort();
          fail(new ClientAbortedError());
        }
      });

      req.pipe(parser);
    });
  }

  private mapWriteError(err: unknown, signal: AbortSignal): Error {
    if (err instanceof SizeLimitError) {
      return fileTooLargeError(this.limits.maxFileSize);
    }
    if (signal.aborted) {
      return new ClientAbortedError();
    }
    return err instanceof Error ? err : new Error(String(err));
  }
}
