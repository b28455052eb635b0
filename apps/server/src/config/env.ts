import type { LogLevel } from "bansync-core";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type StorageConfig =
  | { kind: "fs"; dataDir: string }
  | { kind: "firestore"; collection: string };

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  storage: StorageConfig;
  platform: { baseUrl: string; token?: string; timeoutMs: number };
  commandPrefix: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function str(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function int(env: NodeJS.ProcessEnv, key: string, def: number, min: number, max: number): number {
  const raw = str(env, key);
  if (raw === undefined) return def;
  if (!/^\d+$/.test(raw)) throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < min || n > max) throw new ConfigError(`${key} must be between ${min} and ${max}, got ${n}`);
  return n;
}

function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

/** Read and validate the process environment. Throws ConfigError on the first bad value. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = str(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);

  const kind = str(env, "BANSYNC_STORAGE") ?? "fs";
  let storage: StorageConfig;
  if (kind === "fs") storage = { kind, dataDir: str(env, "BANSYNC_DATA_DIR") ?? "./data" };
  else if (kind === "firestore") storage = { kind, collection: str(env, "BANSYNC_FIRESTORE_COLLECTION") ?? "bansync" };
  else throw new ConfigError(`BANSYNC_STORAGE must be "fs" or "firestore", got "${kind}"`);

  const baseUrl = str(env, "PLATFORM_API_URL");
  if (!baseUrl) throw new ConfigError("PLATFORM_API_URL is required");
  if (!URL.canParse(baseUrl)) throw new ConfigError(`PLATFORM_API_URL is not a valid URL: "${baseUrl}"`);

  return {
    port: int(env, "PORT", 3000, 0, 65535),
    host: str(env, "HOST") ?? "0.0.0.0",
    logLevel,
    storage,
    platform: {
      baseUrl,
      token: str(env, "PLATFORM_API_TOKEN"),
      timeoutMs: int(env, "PLATFORM_TIMEOUT_MS", 10_000, 1, 120_000),
    },
    commandPrefix: str(env, "COMMAND_PREFIX") ?? "!",
  };
}
