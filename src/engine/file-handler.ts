import type { Request, Response, NextFunction } from "express";
import type { FileStorage } from "../storage/storage.js";
import { displayNameOf } from "../storage/namer.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { ClientAbortedError, type IngestPipeline } from "./ingest.js";
import type { Catalog } from "./catalog.js";
import type { StorageAccountant } from "./accountant.js";
import type { PreviewReader } from "./preview.js";
import type { FileRecord } from "./records.js";
import { AppError, notFoundError } from "./errors.js";

/** Inline disposition with an ASCII fallback name and the exact UTF-8 name. */
export function inlineDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `inline; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function storageIdParam(req: Request): string {
  return req.params.storageId ?? "";
}

export class FileHandler {
  private pipeline: IngestPipeline;
  private catalog: Catalog;
  private accountant: StorageAccountant;
  private previews: PreviewReader;
  private storage: FileStorage;

  constructor(
    pipeline: IngestPipeline,
    catalog: Catalog,
    accountant: StorageAccountant,
    previews: PreviewReader,
    storage: FileStorage,
  ) {
    this.pipeline = pipeline;
    this.catalog = catalog;
    this.accountant = accountant;
    this.previews = previews;
    this.storage = storage;
  }

  upload = asyncHandler(async (req: Request, res: Response) => {
    let files: FileRecord[];
    try {
      files = await this.pipeline.ingest(req);
    } catch (err) {
      if (err instanceof ClientAbortedError) {
        console.warn(`WARN: upload aborted by client (${req.ip})`);
        return;
      }
      if (err instanceof AppError) {
        res.status(err.status).json({ success: false, message: err.message, files: [] });
        return;
      }
      throw err;
    }

    res.json({
      success: true,
      message: `Successfully uploaded ${files.length} file(s)`,
      files,
    });
  });

  list = asyncHandler(async (_req: Request, res: Response) => {
    const files = await this.catalog.list();
    res.json({ files });
  });

  stats = asyncHandler(async (_req: Request, res: Response) => {
    res.json(await this.accountant.computeStats());
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    try {
      await this.catalog.delete(storageIdParam(req));
    } catch (err) {
      if (err instanceof AppError) {
        res.status(err.status).json({ success: false, message: err.message });
        return;
      }
      throw err;
    }
    res.json({ success: true, message: "File deleted successfully" });
  });

  preview = asyncHandler(async (req: Request, res: Response) => {
    try {
      const preview = await this.previews.preview(storageIdParam(req));
      res.json({ ...preview, error: null });
    } catch (err) {
      if (err instanceof AppError) {
        res.status(err.status).json({ content: null, error: err.message });
        return;
      }
      throw err;
    }
  });

  download = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const storageId = storageIdParam(req);
    const target = await this.storage.locate(storageId);
    if (!target) {
      throw notFoundError();
    }

    res.sendFile(
      target,
      { headers: { "Content-Disposition": inlineDisposition(displayNameOf(storageId)) } },
      (err) => {
        if (err && !res.headersSent) next(err);
      },
    );
  });
}
