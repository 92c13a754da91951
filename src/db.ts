import Database from "better-sqlite3";

// --- Types ---

// A single row of the "urls" table. Column names stay snake_case to match SQL.
export interface UrlRow {
  id: number;
  code: string;
  original_url: string;
  created_at: string;
  clicks: number;
}

// What the shortening service needs from storage. All calls are synchronous
// because better-sqlite3 is; each one runs to completion before the next.
export interface UrlStore {
  findCodeByUrl(originalUrl: string): string | undefined;
  // Returns false when `code` is already taken; any other failure throws.
  insert(code: string, originalUrl: string, createdAt: string): boolean;
  // Looks the code up and counts a click in one transaction.
  resolve(code: string): string | undefined;
  // Counts a click only if `code` still points at `originalUrl`. False when
  // no such row exists, so a cached copy can be checked against the table.
  incrementClicks(code: string, originalUrl: string): boolean;
  count(): number;
  close(): void;
}

export interface StoreOptions {
  // A file path, or ":memory:" for a throwaway database
  dbPath: string;
}

// --- Schema ---

// UNIQUE on `code` is what makes code collisions fail atomically.
// `original_url` only gets a plain index: duplicates are kept out by the
// service's lookup-before-insert, not by the database.
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS urls (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    code         TEXT UNIQUE NOT NULL,
    original_url TEXT NOT NULL,
    created_at   TEXT NOT NULL,
    clicks       INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_urls_code ON urls (code);
  CREATE INDEX IF NOT EXISTS idx_urls_original_url ON urls (original_url);
`;

// Prepared statements: SQL is parsed and compiled ONCE here, then reused on
// every call. The ? placeholders are filled in by .get() / .run(), so values
// never end up inside the SQL text.
// db.prepare<[string], UrlRow> reads as "takes one string, returns UrlRow rows".
function prepareStatements(db: Database.Database) {
  return {
    // Oldest row first, so a duplicate left by a racing insert never changes the answer
    findByUrl: db.prepare<[string], Pick<UrlRow, "code">>(
      "SELECT code FROM urls WHERE original_url = ? ORDER BY id LIMIT 1",
    ),
    findByCode: db.prepare<[string], UrlRow>("SELECT * FROM urls WHERE code = ?"),
    insert: db.prepare<[string, string, string]>(
      "INSERT INTO urls (code, original_url, created_at) VALUES (?, ?, ?)",
    ),
    // clicks = clicks + 1 is evaluated inside SQLite, so two increments can't
    // read the same old value and lose one
    incrementClicks: db.prepare<[string]>(
      "UPDATE urls SET clicks = clicks + 1 WHERE code = ?",
    ),
    incrementClicksFor: db.prepare<[string, string]>(
      "UPDATE urls SET clicks = clicks + 1 WHERE code = ? AND original_url = ?",
    ),
    count: db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM urls"),
  };
}

// better-sqlite3 throws SqliteError; "UNIQUE constraint failed: urls.code"
// is the only failure the retry loop is allowed to swallow.
function isCodeConflict(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE" &&
    err.message.includes("urls.code")
  );
}

// --- Store ---

export class SqliteUrlStore implements UrlStore {
  private readonly db: Database.Database;
  private readonly stmts: ReturnType<typeof prepareStatements>;
  private readonly resolveTx: (code: string) => string | undefined;

  constructor(db: Database.Database) {
    this.db = db;
    this.db.exec(SCHEMA);

    this.stmts = prepareStatements(db);

    // db.transaction() commits when the function returns and rolls back if it throws
    this.resolveTx = db.transaction((code: string) => {
      const row = this.stmts.findByCode.get(code);
      if (!row) {
        return undefined;
      }
      this.stmts.incrementClicks.run(code);
      return row.original_url;
    });
  }

  findCodeByUrl(originalUrl: string): string | undefined {
    return this.stmts.findByUrl.get(originalUrl)?.code;
  }

  insert(code: string, originalUrl: string, createdAt: string): boolean {
    try {
      this.stmts.insert.run(code, originalUrl, createdAt);
      return true;
    } catch (err) {
      if (isCodeConflict(err)) {
        return false;
      }
      throw err;
    }
  }

  resolve(code: string): string | undefined {
    return this.resolveTx(code);
  }

  incrementClicks(code: string, originalUrl: string): boolean {
    // .run() reports how many rows the UPDATE touched
    return this.stmts.incrementClicksFor.run(code, originalUrl).changes === 1;
  }

  // Full row for a code, without counting a click. Not part of UrlStore: the
  // service never needs it, it is here for inspecting the table (tests, tooling).
  findByCode(code: string): UrlRow | undefined {
    return this.stmts.findByCode.get(code);
  }

  count(): number {
    return this.stmts.count.get()?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// Opens (or creates) the database at options.dbPath and makes sure the
// schema exists. The returned store owns the connection until close().
export function openStore(options: StoreOptions): SqliteUrlStore {
  const db = new Database(options.dbPath, { timeout: 5000 });
  try {
    // WAL lets readers keep going while a write is in progress
    db.pragma("journal_mode = WAL");
    return new SqliteUrlStore(db);
  } catch (err) {
    db.close();
    throw err;
  }
}
