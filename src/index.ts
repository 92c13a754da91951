import dotenv from "dotenv";
import { createApp } from "./app";
import { NoopUrlCache, RedisUrlCache, type UrlCache } from "./cache";
import { createCodeGenerator } from "./codes";
import { loadConfig } from "./config";
import { openStore } from "./db";
import { Shortener } from "./shortener";

// --- Start the server ---
// Order matters: config first, then the database (which creates the table
// on first run), then the optional cache, and only then start listening.
async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  const store = openStore({ dbPath: config.dbPath });

  let cache: UrlCache = new NoopUrlCache();
  if (config.redisUrl) {
    const redisCache = new RedisUrlCache(config.redisUrl);
    await redisCache.connect();
    cache = redisCache;
  }

  const shortener = new Shortener({
    store,
    cache,
    generateCode: createCodeGenerator({
      length: config.codes.length,
      alphabet: config.codes.alphabet,
    }),
    maxAttempts: config.codes.maxAttempts,
  });

  const app = createApp({ shortener, staticDir: config.staticDir });

  const server = app.listen(config.port, () => {
    const base = `http://localhost:${config.port}`;
    console.log(`Short URL running at ${base}`);
    console.log(`Database: ${config.dbPath}`);
    console.log();
    console.log("Endpoints:");
    console.log(`  GET    ${base}/                  submission form`);
    console.log(`  POST   ${base}/                  shorten the "url" form field`);
    console.log(`  GET    ${base}/<code>            redirect to original`);
    console.log(`  GET    ${base}/stats             total number of short URLs`);
  });

  // Stop accepting requests, then release the cache and the database
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`\n${signal} received, shutting down...`);

    server.close((err) => {
      if (err) {
        console.error("Error while closing HTTP server:", err);
      }
      cache
        .close()
        .catch((cacheErr: unknown) => console.error("Error while closing cache:", cacheErr))
        .finally(() => {
          store.close();
          process.exit(err ? 1 : 0);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
