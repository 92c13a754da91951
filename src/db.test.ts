import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openStore, SqliteUrlStore } from "./db";

describe("SqliteUrlStore", () => {
  let store: SqliteUrlStore;

  beforeEach(() => {
    store = openStore({ dbPath: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  it("inserts a record with zero clicks", () => {
    expect(store.insert("abc123", "https://example.com", "2024-01-02T03:04:05.000Z")).toBe(true);

    expect(store.findByCode("abc123")).toEqual({
      id: 1,
      code: "abc123",
      original_url: "https://example.com",
      created_at: "2024-01-02T03:04:05.000Z",
      clicks: 0,
    });
    expect(store.count()).toBe(1);
  });

  it("reports a taken code instead of throwing", () => {
    store.insert("abc123", "https://example.com/one", "2024-01-01T00:00:00.000Z");

    expect(store.insert("abc123", "https://example.com/two", "2024-01-01T00:00:00.000Z")).toBe(false);
    expect(store.count()).toBe(1);
    expect(store.findByCode("abc123")?.original_url).toBe("https://example.com/one");
  });

  it("assigns increasing ids", () => {
    store.insert("aaaaaa", "https://example.com/1", "2024-01-01T00:00:00.000Z");
    store.insert("bbbbbb", "https://example.com/2", "2024-01-01T00:00:00.000Z");

    const first = store.findByCode("aaaaaa");
    const second = store.findByCode("bbbbbb");
    expect(first?.id).toBe(1);
    expect(second?.id).toBe(2);
  });

  it("finds the code of an already stored URL", () => {
    store.insert("abc123", "https://example.com", "2024-01-01T00:00:00.000Z");

    expect(store.findCodeByUrl("https://example.com")).toBe("abc123");
    expect(store.findCodeByUrl("https://example.org")).toBeUndefined();
  });

  it("resolves a code and counts the click", () => {
    store.insert("abc123", "https://example.com", "2024-01-01T00:00:00.000Z");

    expect(store.resolve("abc123")).toBe("https://example.com");
    expect(store.resolve("abc123")).toBe("https://example.com");
    expect(store.findByCode("abc123")?.clicks).toBe(2);
  });

  it("matches codes exactly", () => {
    store.insert("abc123", "https://example.com", "2024-01-01T00:00:00.000Z");

    expect(store.resolve("ABC123")).toBeUndefined();
    expect(store.resolve("abc12")).toBeUndefined();
    expect(store.findByCode("abc123")?.clicks).toBe(0);
  });

  it("leaves the table alone for unknown codes", () => {
    expect(store.resolve("nope00")).toBeUndefined();
    expect(store.incrementClicks("nope00", "https://example.com")).toBe(false);
    expect(store.count()).toBe(0);
  });

  it("increments clicks when the code still maps to the given URL", () => {
    store.insert("abc123", "https://example.com", "2024-01-01T00:00:00.000Z");

    expect(store.incrementClicks("abc123", "https://example.com")).toBe(true);
    expect(store.findByCode("abc123")?.clicks).toBe(1);
  });

  it("skips the increment when the code maps to another URL", () => {
    store.insert("abc123", "https://example.com/new", "2024-01-01T00:00:00.000Z");

    expect(store.incrementClicks("abc123", "https://stale.example/old")).toBe(false);
    expect(store.findByCode("abc123")?.clicks).toBe(0);
  });

  it("creates the lookup indexes", () => {
    const db = new Database(":memory:");
    const raw = new SqliteUrlStore(db);
    const names = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'urls' AND name LIKE 'idx_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name);

    expect(names).toEqual(["idx_urls_code", "idx_urls_original_url"]);
    raw.close();
  });

  it("lets constraint failures on other columns propagate", () => {
    const db = new Database(":memory:");
    const raw = new SqliteUrlStore(db);
    db.exec("CREATE UNIQUE INDEX test_unique_url ON urls (original_url)");

    raw.insert("aaaaaa", "https://example.com", "2024-01-01T00:00:00.000Z");
    expect(() => raw.insert("bbbbbb", "https://example.com", "2024-01-01T00:00:00.000Z")).toThrow(
      /urls\.original_url/,
    );
    raw.close();
  });

  it("can be closed more than once", () => {
    store.close();
    expect(() => store.close()).not.toThrow();
  });
});
