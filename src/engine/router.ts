import type { Express, RequestHandler } from "express";
import type { FileHandler } from "./file-handler.js";

export function registerFileRoutes(app: Express, handler: FileHandler, authMW: RequestHandler): void {
  app.post("/upload", authMW, handler.upload);
  app.get("/files", authMW, handler.list);
  app.get("/storage", authMW, handler.stats);
  app.post("/delete/:storageId", authMW, handler.delete);
  app.get("/preview/:storageId", authMW, handler.preview);
  app.get("/download/:storageId", authMW, handler.download);
}
