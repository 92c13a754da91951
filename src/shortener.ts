import { NoopUrlCache, type UrlCache } from "./cache";
import type { CodeGenerator } from "./codes";
import type { UrlStore } from "./db";
import { CodeSpaceExhaustedError } from "./errors";

export interface ShortenerOptions {
  store: UrlStore;
  generateCode: CodeGenerator;
  maxAttempts: number;
  cache?: UrlCache;
  now?: () => Date;
}

export class Shortener {
  private readonly store: UrlStore;
  private readonly generateCode: CodeGenerator;
  private readonly maxAttempts: number;
  private readonly cache: UrlCache;
  private readonly now: () => Date;

  constructor(options: ShortenerOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.store = options.store;
    this.generateCode = options.generateCode;
    this.maxAttempts = options.maxAttempts;
    this.cache = options.cache ?? new NoopUrlCache();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Returns the short code for an already-normalized URL, creating a record
   * the first time the URL is seen.
   *
   * The lookup and the insert are separate statements, so two requests racing
   * on the same new URL can both insert (with different codes). Code
   * collisions, on the other hand, are caught by the UNIQUE constraint and
   * retried with a fresh candidate.
   *
   * @throws CodeSpaceExhaustedError when every candidate collided
   */
  async shorten(originalUrl: string): Promise<string> {
    const existing = this.store.findCodeByUrl(originalUrl);
    if (existing !== undefined) {
      return existing;
    }

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const code = this.generateCode();
      if (this.store.insert(code, originalUrl, this.now().toISOString())) {
        // Warm the cache so the first redirect doesn't need SQLite
        await this.cache.set(code, originalUrl);
        return code;
      }
    }

    throw new CodeSpaceExhaustedError(this.maxAttempts);
  }

  /**
   * Returns the target URL for `code` and records one click, or null when
   * the code was never issued. Matching is exact and case-sensitive.
   */
  async resolve(code: string): Promise<string | null> {
    const cached = await this.cache.get(code);
    if (cached !== null) {
      // The click still goes to SQLite, and only counts if the row still maps
      // this code to the cached URL. Otherwise the entry is stale (or came from
      // another database sharing the Redis), so forget it and ask the store.
      if (this.store.incrementClicks(code, cached)) {
        return cached;
      }
      await this.cache.del(code);
    }

    const originalUrl = this.store.resolve(code);
    if (originalUrl === undefined) {
      return null;
    }
    await this.cache.set(code, originalUrl);
    return originalUrl;
  }

  count(): number {
    return this.store.count();
  }
}
