import { expect, test, describe, vi } from "vitest";
import { parseQuery } from "../lib/dmql/parseQuery";
import { translateToSQL, renderLiteral } from "../lib/dmql/translator";
import type { TableResolver } from "../lib/dmql/database";

function tables(...names: string[]): TableResolver {
  return { tableExists: (name) => names.includes(name) };
}

function translate(source: string, resolver: TableResolver = tables()): string {
  return translateToSQL(parseQuery(source), resolver);
}

describe("SQL translation - Table resolution", () => {
  test("No database, unknown table: passed through", () => {
    expect(translate("FROM customers")).toBe("SELECT * FROM customers");
  });

  test("Prefixed table wins over a bare table of the same name", () => {
    const sql = translate(
      "USE DATABASE sales FROM customers",
      tables("sales__customers", "customers"),
    );

    expect(sql).toBe("SELECT * FROM sales__customers");
  });

  test("Falls back to the bare table", () => {
    expect(translate("USE DATABASE sales FROM customers", tables("customers"))).toBe(
      "SELECT * FROM customers",
    );
  });

  test("Unresolved table inside a database is passed through", () => {
    expect(translate("USE DATABASE sales FROM customers")).toBe("SELECT * FROM customers");
  });

  test("Each table is resolved on its own", () => {
    const sql = translate("USE DATABASE sales FROM customers, orders", tables("sales__orders"));

    expect(sql).toBe("SELECT * FROM customers, sales__orders");
  });

  test("Probes: prefixed name first, then the bare name", () => {
    const tableExists = vi.fn((_name: string) => false);

    translate("USE DATABASE sales FROM customers", { tableExists });

    expect(tableExists.mock.calls).toEqual([["sales__customers"], ["customers"]]);
  });

  test("Probes: a prefixed hit stops the lookup", () => {
    const tableExists = vi.fn((name: string) => name === "sales__customers");

    translate("USE DATABASE sales FROM customers", { tableExists });

    expect(tableExists.mock.calls).toEqual([["sales__customers"]]);
  });

  test("Probes: without a database only the bare name is probed", () => {
    const tableExists = vi.fn((_name: string) => false);

    translate("FROM customers", { tableExists });

    expect(tableExists.mock.calls).toEqual([["customers"]]);
  });
});

describe("SQL translation - Clauses", () => {
  test("No WHERE, GROUP BY or ORDER BY: just SELECT and FROM", () => {
    expect(translate("USE DATABASE sales FROM customers MINE STATISTICS DISPLAY AS heatmap", tables("sales__customers"))).toBe(
      "SELECT * FROM sales__customers",
    );
  });

  test("Every clause", () => {
    const sql = translate(
      `USE DATABASE sales
       RELEVANCE TO city, age
       FROM customers
       WHERE age > 25 AND city = 'Mumbai'
       GROUP BY city
       ORDER BY age DESC, name`,
      tables("sales__customers"),
    );

    expect(sql).toBe(
      "SELECT city, age FROM sales__customers WHERE (age > 25 AND city = 'Mumbai') " +
        "GROUP BY city ORDER BY age DESC, name ASC",
    );
  });

  test("Qualified columns are kept as written", () => {
    expect(translate("RELEVANCE TO customers.name FROM customers")).toBe(
      "SELECT customers.name FROM customers",
    );
  });
});

describe("SQL translation - Conditions", () => {
  test("Nested logic keeps its parentheses", () => {
    expect(translate("FROM t WHERE a = 1 OR b = 2 AND c = 3")).toBe(
      "SELECT * FROM t WHERE (a = 1 OR (b = 2 AND c = 3))",
    );
  });

  test("NOT and BETWEEN", () => {
    expect(translate("FROM t WHERE NOT age BETWEEN 18 AND 30")).toBe(
      "SELECT * FROM t WHERE NOT (age BETWEEN 18 AND 30)",
    );
  });

  test("LIKE, IN and IS NOT NULL", () => {
    expect(
      translate("FROM t WHERE name LIKE 'A%' OR city IN ('Delhi', \"Pune\") OR email IS NOT NULL"),
    ).toBe(
      "SELECT * FROM t WHERE ((name LIKE 'A%' OR city IN ('Delhi', 'Pune')) OR email IS NOT NULL)",
    );
  });

  test("Float and NULL literals", () => {
    expect(translate("FROM t WHERE temperature > 30.0")).toBe(
      "SELECT * FROM t WHERE temperature > 30.0",
    );
    expect(translate("FROM t WHERE purchase_amount >= 5000.50")).toBe(
      "SELECT * FROM t WHERE purchase_amount >= 5000.5",
    );
    expect(translate("FROM t WHERE manager = NULL")).toBe("SELECT * FROM t WHERE manager = NULL");
  });

  test("Large integers are written out exactly", () => {
    expect(translate("FROM t WHERE id = 9007199254740993")).toBe(
      "SELECT * FROM t WHERE id = 9007199254740993",
    );
    expect(translate("FROM t WHERE id = 123456789012345678901234567890")).toBe(
      "SELECT * FROM t WHERE id = 123456789012345678901234567890",
    );
  });

  test("Embedded quotes are not escaped", () => {
    expect(translate(`FROM t WHERE name = "O'Brien"`)).toBe("SELECT * FROM t WHERE name = 'O'Brien'");
  });
});

describe("SQL translation - Literals", () => {
  test("renderLiteral", () => {
    expect(renderLiteral({ type: "INTEGER", value: 42 })).toBe("42");
    expect(renderLiteral({ type: "INTEGER", value: -12345678901234567890n })).toBe(
      "-12345678901234567890",
    );
    expect(renderLiteral({ type: "FLOAT", value: 0.25 })).toBe("0.25");
    expect(renderLiteral({ type: "FLOAT", value: -3 })).toBe("-3.0");
    expect(renderLiteral({ type: "STRING", value: "Pune" })).toBe("'Pune'");
    expect(renderLiteral({ type: "NULL" })).toBe("NULL");
  });
});
