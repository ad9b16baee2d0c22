import Database from "better-sqlite3";
import { expect, test, describe, beforeEach, afterEach, vi } from "vitest";
import {
  executeDMQL,
  createSqliteContext,
  SqliteDatabaseContext,
  seedDatabase,
  clearDatabase,
  STRICT_LIMITS,
} from "./index";
import type { MiningRequest } from "../lib/dmql/database";

const CITIES = ["Mumbai", "Delhi", "Pune", "Chennai", "Kolkata", "Bengaluru"];

describe("DMQL on SQLite", () => {
  let db: Database.Database;
  let ctx: SqliteDatabaseContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    db = new Database(":memory:");
    ctx = new SqliteDatabaseContext(db);
    seedDatabase(ctx, { customers: 50, transactions: 120 });
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  function count(sql: string): number {
    const row = db.prepare<[], { n: number }>(sql).get();
    return row?.n ?? 0;
  }

  test("Seed: tables live under the database prefix", () => {
    expect(ctx.listTables()).toEqual(["sales__customers", "sales__transactions"]);
    expect(ctx.listTables("sales")).toEqual(["customers", "transactions"]);
    expect(ctx.getRowCount("sales__customers")).toBe(50);
    expect(ctx.getRowCount("sales__transactions")).toBe(120);
  });

  test("Seed: column types are inferred from the values", () => {
    const columns = ctx.getTableInfo("sales__customers").map((column) => [column.name, column.type]);

    expect(columns).toEqual([
      ["id", "INTEGER"],
      ["name", "TEXT"],
      ["email", "TEXT"],
      ["age", "INTEGER"],
      ["city", "TEXT"],
      ["income", "INTEGER"],
      ["purchase_amount", "REAL"],
    ]);
  });

  test("Seed: same seed, same rows", async () => {
    const other = createSqliteContext();
    seedDatabase(other, { customers: 50, transactions: 120 });

    const sql = "SELECT * FROM sales__transactions ORDER BY id";
    expect(await other.run(sql)).toEqual(await ctx.run(sql));
  });

  test("WHERE and ORDER BY: filtered, projected and sorted", async () => {
    const result = await executeDMQL(
      db,
      "USE DATABASE sales RELEVANCE TO name, age FROM customers WHERE age > 25 ORDER BY age DESC",
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.sql).toBe(
        "SELECT name, age FROM sales__customers WHERE age > 25 ORDER BY age DESC",
      );
      expect(result.rowCount).toBe(count("SELECT COUNT(*) AS n FROM sales__customers WHERE age > 25"));
      expect(result.columns).toEqual(["name", "age"]);

      const ages = result.data.map((row) => Number(row.age));
      expect(ages.every((age) => age > 25)).toBe(true);
      expect(ages).toEqual([...ages].sort((a, b) => b - a));
    }
  });

  test("WHERE: double-quoted strings become SQL strings", async () => {
    const result = await executeDMQL(db, `USE DATABASE sales FROM customers WHERE city = "Pune"`);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.sql).toBe("SELECT * FROM sales__customers WHERE city = 'Pune'");
      expect(result.rowCount).toBe(count("SELECT COUNT(*) AS n FROM sales__customers WHERE city = 'Pune'"));
      expect(result.data.every((row) => row.city === "Pune")).toBe(true);
    }
  });

  test("WHERE: BETWEEN and IN", async () => {
    const result = await executeDMQL(
      db,
      "USE DATABASE sales FROM customers WHERE age BETWEEN 30 AND 40 AND city IN ('Mumbai', 'Delhi')",
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.rowCount).toBe(
        count(
          "SELECT COUNT(*) AS n FROM sales__customers WHERE age >= 30 AND age <= 40 AND city IN ('Mumbai', 'Delhi')",
        ),
      );
      for (const row of result.data) {
        expect(Number(row.age)).toBeGreaterThanOrEqual(30);
        expect(Number(row.age)).toBeLessThanOrEqual(40);
        expect(["Mumbai", "Delhi"]).toContain(row.city);
      }
    }
  });

  test("GROUP BY: one row per city", async () => {
    const result = await executeDMQL(
      db,
      "USE DATABASE sales RELEVANCE TO city FROM customers GROUP BY city ORDER BY city",
    );

    expect(result.success).toBe(true);
    if (result.success) {
      const cities = result.data.map((row) => String(row.city));
      expect(cities).toEqual([...new Set(cities)].sort());
      expect(cities.every((city) => CITIES.includes(city))).toBe(true);
    }
  });

  test("IS NULL: loaded rows keep their nulls", async () => {
    ctx.loadRows(
      "contacts",
      [
        { id: 1, phone: "555-0100" },
        { id: 2, phone: null },
        { id: 3, phone: null },
      ],
      "crm",
    );

    const result = await executeDMQL(db, "USE DATABASE crm FROM contacts WHERE phone IS NULL ORDER BY id");

    expect(result).toEqual({
      success: true,
      queryType: "select",
      sql: "SELECT * FROM crm__contacts WHERE phone IS NULL ORDER BY id ASC",
      data: [
        { id: 2, phone: null },
        { id: 3, phone: null },
      ],
      columns: ["id", "phone"],
      rowCount: 2,
    });
  });

  test("Table resolution: prefixed table first, bare table otherwise", async () => {
    ctx.loadRows("customers", [{ id: 1, name: "Bare" }]);

    const prefixed = await executeDMQL(db, "USE DATABASE sales FROM customers");
    const bare = await executeDMQL(db, "FROM customers");
    const otherDatabase = await executeDMQL(db, "USE DATABASE crm FROM customers");

    expect(prefixed.success && prefixed.rowCount).toBe(50);
    expect(bare.success && bare.data).toEqual([{ id: 1, name: "Bare" }]);
    expect(otherDatabase.success && otherDatabase.sql).toBe("SELECT * FROM customers");
  });

  test("Missing table: storage error is returned", async () => {
    const result = await executeDMQL(db, "USE DATABASE sales FROM missing");

    expect(result).toEqual({
      success: false,
      error: "no such table: missing",
      sql: "SELECT * FROM missing",
    });
  });

  test("Syntax errors: nothing reaches SQLite", async () => {
    const result = await executeDMQL(db, "FROM WHERE age > 1");

    expect(result).toEqual({
      success: false,
      error: "Query has syntax errors",
      errors: ["Line 1:5 - mismatched input 'WHERE' expecting IDENTIFIER"],
    });
  });

  test("MINE: mining collaborator sees the filtered rows", async () => {
    const mine = vi.fn(async (request: MiningRequest) => ({
      table: request.table,
      result: { count: request.table.length },
    }));

    const result = await executeDMQL(
      db,
      "USE DATABASE sales FROM transactions WHERE returned = 1 MINE STATISTICS",
      { miner: { mine } },
    );

    const returned = count("SELECT COUNT(*) AS n FROM sales__transactions WHERE returned = 1");
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.queryType).toBe("mining");
      expect(result.miningResult).toEqual({ count: returned });
      expect(result.rowCount).toBe(returned);
    }
  });

  test("STRICT_LIMITS: results are capped at maxRows", async () => {
    clearDatabase(ctx);
    seedDatabase(ctx, { customers: 150, transactions: 10 });

    const result = await executeDMQL(db, "USE DATABASE sales FROM customers", {
      limits: STRICT_LIMITS,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.rowCount).toBe(100);
    }
  });

  test("clearDatabase: drops only that database's tables", () => {
    ctx.loadRows("customers", [{ id: 1, name: "Bare" }]);

    clearDatabase(ctx, "sales");

    expect(ctx.listTables("sales")).toEqual([]);
    expect(ctx.listTables()).toEqual(["customers"]);
  });

  test("loadRows: an empty row set cannot be loaded", () => {
    expect(() => ctx.loadRows("empty", [])).toThrow(
      "Cannot infer columns for table 'empty' from an empty row set",
    );
  });
});
