import "dotenv/config";
import { loadConfig } from "./config/index.js";
import { buildApp } from "./app.js";

async function main() {
  // 1. Load config
  const cfg = loadConfig();
  console.log(
    `Config loaded (port: ${cfg.server.port}, storage: ${cfg.storage.local_path}, max files per upload: ${cfg.storage.max_file_count})`,
  );
  if (cfg.auth.password === "admin" || cfg.auth.jwt_secret === "changeme-secret") {
    console.warn("WARN: default credentials or session secret in use; set auth.password and auth.jwt_secret");
  }
  if (cfg.server.debug) {
    console.log("Debug mode enabled");
  }

  // 2. Build the app (creates the storage root)
  const app = await buildApp(cfg);

  // 3. Start server
  const { host, port } = cfg.server;
  app.listen(port, host, () => {
    console.log(`Starting file server at http://${host}:${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
