import path from "path";

// --- Config ---
// Everything the service needs at startup lives in one object that is built
// once and handed to the pieces that need it. Nothing reads process.env later.

// 26 lowercase + 26 uppercase + 10 digits
export const ALPHANUMERIC =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const DEFAULT_PORT = 5000;
export const DEFAULT_CODE_LENGTH = 6;
export const DEFAULT_MAX_ATTEMPTS = 20;
// The collision retry loop always gets at least this many tries
export const MIN_MAX_ATTEMPTS = 10;

export interface CodeConfig {
  length: number;
  alphabet: string;
  maxAttempts: number;
}

export interface AppConfig {
  port: number;
  dbPath: string;
  // Unset means "run without a cache"
  redisUrl?: string;
  staticDir: string;
  codes: CodeConfig;
}

// Parses a positive integer, falling back to `fallback` for anything else
// (missing, empty, "abc", "0", "-3", "2.5").
function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return fallback;
  }
  const parsed = Number(value.trim());
  return parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // The project root is one level up from both src/ and dist/
  const root = path.join(__dirname, "..");
  const redisUrl = env.REDIS_URL?.trim();

  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    dbPath: env.DB_PATH || path.join(root, "shorturl.db"),
    redisUrl: redisUrl ? redisUrl : undefined,
    staticDir: path.join(root, "static"),
    codes: {
      length: positiveInt(env.CODE_LENGTH, DEFAULT_CODE_LENGTH),
      alphabet: ALPHANUMERIC,
      maxAttempts: Math.max(
        MIN_MAX_ATTEMPTS,
        positiveInt(env.CODE_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
      ),
    },
  };
}
