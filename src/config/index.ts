import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";

export interface ServerConfig {
  port: number;
  host: string;
  debug: boolean;
}

export interface StorageConfig {
  local_path: string;
  max_file_size: number;
  max_file_count: number;
  /** Aggregate soft quota. Only used for usage percentages, never enforced on write. */
  quota_bytes: number;
  preview_limit: number;
}

export interface AuthConfig {
  username: string;
  password: string;
  jwt_secret: string;
  /** Session lifetime in seconds. */
  session_ttl: number;
}

export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  auth: AuthConfig;
}

type RawSection = Record<string, unknown>;

function isSection(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isSection(value) ? value : {};
}

function num(s: RawSection, key: string, fallback: number): number {
  const value = s[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

function str(s: RawSection, key: string, fallback: string): string {
  const value = s[key];
  return typeof value === "string" || typeof value === "number" ? String(value) : fallback;
}

function bool(s: RawSection, key: string, fallback: boolean): boolean {
  const value = s[key];
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return fallback;
}

/** Builds a Config from parsed YAML, filling every missing key with its default. */
export function parseConfig(raw: RawSection, env: NodeJS.ProcessEnv = {}): Config {
  const server = section(raw, "server");
  const storage = section(raw, "storage");
  const auth = section(raw, "auth");

  return {
    server: {
      port: num(env, "PORT", num(server, "port", 8080)),
      host: str(server, "host", "127.0.0.1"),
      debug: bool(server, "debug", false),
    },
    storage: {
      local_path: str(storage, "local_path", "./uploads"),
      max_file_size: num(storage, "max_file_size", 16384 * 1024 * 1024),
      max_file_count: num(storage, "max_file_count", 10),
      quota_bytes: num(storage, "quota_bytes", 1024 * 1024 * 1024 * 1024),
      preview_limit: num(storage, "preview_limit", 10240),
    },
    auth: {
      username: str(auth, "username", "admin"),
      password: str(auth, "password", "admin"),
      jwt_secret: str(auth, "jwt_secret", "changeme-secret"),
      session_ttl: num(auth, "session_ttl", 24 * 60 * 60),
    },
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const candidates = env.CRATR_CONFIG
    ? [path.resolve(env.CRATR_CONFIG)]
    : [path.resolve("app.yaml"), path.resolve("../app.yaml")];

  let raw: RawSection = {};
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      const loaded = yaml.load(fs.readFileSync(p, "utf-8"));
      if (isSection(loaded)) raw = loaded;
      break;
    }
  }

  return parseConfig(raw, env);
}
