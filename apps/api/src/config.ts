import path from "path";

// ─── Config ───────────────────────────────────────────────
// Everything comes from the environment with local-dev defaults.
// DB_PATH is resolved against the working directory, so a plain
// `npm start` keeps social_network.db next to where it was launched.
export interface AppConfig {
  host: string;
  port: number;
  dbPath: string;
  logLevel: string;
  nodeEnv: string;
  jsonLimit: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8001;
export const DEFAULT_DB_FILE = "social_network.db";

const MAX_PORT = 65_535;

function intOr(value: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const n = Number(value);
  return value !== undefined && value !== "" && Number.isInteger(n) && n >= 0 && n <= max
    ? n
    : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    host:      env.HOST || DEFAULT_HOST,
    port:      intOr(env.PORT, DEFAULT_PORT, MAX_PORT),
    dbPath:    path.resolve(env.DB_PATH || DEFAULT_DB_FILE),
    logLevel:  env.LOG_LEVEL || "info",
    nodeEnv:   env.NODE_ENV || "development",
    jsonLimit: env.JSON_LIMIT || "100kb",
    rateLimit: {
      windowMs: intOr(env.RATE_LIMIT_WINDOW_MS, 60_000),
      max:      intOr(env.RATE_LIMIT_MAX, 5_000),
    },
  };
}
