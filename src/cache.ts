import { createClient } from "redis";

// --- Resolution cache ---
// Cache-aside copy of code -> original URL. SQLite stays the source of truth
// (and keeps the click counter); the cache only saves a lookup. Every helper
// swallows Redis failures so a missing cache never fails a request.

export interface UrlCache {
  get(code: string): Promise<string | null>;
  set(code: string, url: string): Promise<void>;
  del(code: string): Promise<void>;
  close(): Promise<void>;
}

// Entries expire after an hour so nothing stale lives forever
const TTL_SECONDS = 3600;
const KEY_PREFIX = "url:";

export class RedisUrlCache implements UrlCache {
  private readonly client: ReturnType<typeof createClient>;
  private connected = false;

  constructor(url: string) {
    // After 3 failed reconnects stop trying and keep running without cache
    this.client = createClient({
      url,
      socket: {
        connectTimeout: 3000,
        reconnectStrategy: (retries: number) => (retries < 3 ? 1000 : false),
      },
    });

    // Without an "error" listener a dropped connection would crash the process
    this.client.on("error", (err: unknown) => {
      if (this.connected) {
        console.warn("Redis disconnected, falling back to SQLite only:", err);
        this.connected = false;
      }
    });
    this.client.on("ready", () => {
      console.log("Redis connected");
      this.connected = true;
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (err) {
      console.warn("Redis unavailable, running without cache (SQLite only):", err);
    }
  }

  async get(code: string): Promise<string | null> {
    if (!this.connected) return null;
    try {
      return await this.client.get(KEY_PREFIX + code);
    } catch (err) {
      console.warn(`Redis GET failed for ${code}:`, err);
      return null;
    }
  }

  async set(code: string, url: string): Promise<void> {
    if (!this.connected) return;
    try {
      await this.client.set(KEY_PREFIX + code, url, { EX: TTL_SECONDS });
    } catch (err) {
      console.warn(`Redis SET failed for ${code}:`, err);
    }
  }

  async del(code: string): Promise<void> {
    if (!this.connected) return;
    try {
      await this.client.del(KEY_PREFIX + code);
    } catch (err) {
      console.warn(`Redis DEL failed for ${code}:`, err);
    }
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) return;
    this.connected = false;
    try {
      await this.client.quit();
    } catch (err) {
      console.warn("Redis QUIT failed:", err);
    }
  }
}

// Used when no REDIS_URL is configured
export class NoopUrlCache implements UrlCache {
  async get(): Promise<string | null> {
    return null;
  }

  async set(): Promise<void> {}

  async del(): Promise<void> {}

  async close(): Promise<void> {}
}
