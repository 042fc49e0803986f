import express from "express";
import morgan from "morgan";
import type { Config } from "./config/index.js";
import { LocalStorage } from "./storage/local.js";
import { statfsProbe, type DiskProbe } from "./storage/disk-probe.js";
import { IngestPipeline } from "./engine/ingest.js";
import { Catalog } from "./engine/catalog.js";
import { StorageAccountant } from "./engine/accountant.js";
import { PreviewReader } from "./engine/preview.js";
import { FileHandler } from "./engine/file-handler.js";
import { registerFileRoutes } from "./engine/router.js";
import { Credentials } from "./auth/auth.js";
import { AuthHandler, registerAuthRoutes } from "./auth/handler.js";
import { authMiddleware } from "./auth/middleware.js";
import { errorHandler } from "./middleware/error-handler.js";

export interface AppOptions {
  probe?: DiskProbe;
  /** Access log on stdout; off in tests. */
  accessLog?: boolean;
}

/** Wires every component from one Config. Creates the storage root if missing. */
export async function buildApp(cfg: Config, opts: AppOptions = {}): Promise<express.Express> {
  const storage = new LocalStorage(cfg.storage.local_path);
  await storage.init();

  const pipeline = new IngestPipeline(storage, {
    maxFileSize: cfg.storage.max_file_size,
    maxFileCount: cfg.storage.max_file_count,
  });
  const catalog = new Catalog(storage);
  const accountant = new StorageAccountant(
    storage,
    storage.root,
    cfg.storage.quota_bytes,
    opts.probe ?? statfsProbe,
  );
  const previews = new PreviewReader(storage, cfg.storage.preview_limit);
  const credentials = await Credentials.create(cfg.auth.username, cfg.auth.password);

  const app = express();
  app.use(express.json());
  if (opts.accessLog ?? true) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  app.get("/debug", (_req, res) => {
    res.json({ debug_mode: cfg.server.debug });
  });

  registerAuthRoutes(app, new AuthHandler(credentials, cfg.auth));

  const fileHandler = new FileHandler(pipeline, catalog, accountant, previews, storage);
  registerFileRoutes(app, fileHandler, authMiddleware(cfg.auth.jwt_secret));

  // Error handler (must be last middleware)
  app.use(errorHandler);
  return app;
}
