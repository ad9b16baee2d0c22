/**
 * SQLite adapter - implements the DMQL DatabaseContext on better-sqlite3.
 *
 * Logical databases share one SQLite file: table `customers` of database
 * `sales` is stored as `sales__customers`.
 */

import type Database from "better-sqlite3";
import type { DatabaseContext, Row } from "../lib/dmql/database";
import { DATABASE_SEPARATOR } from "../lib/dmql/translator";

type SqliteValue = number | string | bigint | null;

export interface ColumnInfo {
  name: string;
  type: string;
  notNull: boolean;
  defaultValue: unknown;
  primaryKey: boolean;
}

type PragmaColumn = {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: unknown;
  pk: number;
};

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toSqliteValue(value: unknown): SqliteValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string" || typeof value === "bigint") {
    return value;
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

function inferColumnType(rows: Row[], column: string): "INTEGER" | "REAL" | "TEXT" {
  const values = rows
    .map((row) => row[column])
    .filter((value) => value !== null && value !== undefined);

  if (values.length === 0) return "TEXT";

  const isWhole = (value: unknown) =>
    typeof value === "boolean" ||
    typeof value === "bigint" ||
    (typeof value === "number" && Number.isInteger(value));

  if (values.every(isWhole)) return "INTEGER";
  if (values.every((value) => isWhole(value) || typeof value === "number")) return "REAL";
  return "TEXT";
}

export class SqliteDatabaseContext implements DatabaseContext {
  constructor(private db: Database.Database) {}

  tableExists(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
      )
      .get(name);
    return row !== undefined;
  }

  async run(sql: string): Promise<Row[]> {
    return this.db.prepare<unknown[], Row>(sql).all();
  }

  /**
   * Create (or replace) a table from rows, optionally inside a logical database.
   * Column types are inferred from the non-null values of each column.
   *
   * @returns The physical table name
   */
  loadRows(tableName: string, rows: Row[], databaseName?: string): string {
    if (rows.length === 0) {
      throw new Error(`Cannot infer columns for table '${tableName}' from an empty row set`);
    }

    const fullName = databaseName
      ? `${databaseName}${DATABASE_SEPARATOR}${tableName}`
      : tableName;
    const columns = Object.keys(rows[0]);
    const table = quoteIdentifier(fullName);

    const columnDefs = columns
      .map((column) => `${quoteIdentifier(column)} ${inferColumnType(rows, column)}`)
      .join(", ");
    const placeholders = columns.map(() => "?").join(", ");

    const load = this.db.transaction((batch: Row[]) => {
      this.db.exec(`DROP TABLE IF EXISTS ${table}`);
      this.db.exec(`CREATE TABLE ${table} (${columnDefs})`);

      const insert = this.db.prepare<SqliteValue[]>(
        `INSERT INTO ${table} (${columns.map(quoteIdentifier).join(", ")}) VALUES (${placeholders})`,
      );
      for (const row of batch) {
        insert.run(...columns.map((column) => toSqliteValue(row[column])));
      }
    });
    load(rows);

    return fullName;
  }

  dropTable(name: string): void {
    this.db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(name)}`);
  }

  /**
   * List tables; with a database name, only that database's tables, prefix removed
   */
  listTables(database?: string): string[] {
    const tables = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      )
      .all()
      .map((row) => row.name);

    if (!database) return tables;

    const prefix = `${database}${DATABASE_SEPARATOR}`;
    return tables
      .filter((name) => name.startsWith(prefix))
      .map((name) => name.slice(prefix.length));
  }

  getTableInfo(name: string): ColumnInfo[] {
    return this.db
      .prepare<[], PragmaColumn>(`PRAGMA table_info(${quoteIdentifier(name)})`)
      .all()
      .map((column) => ({
        name: column.name,
        type: column.type,
        notNull: column.notnull === 1,
        defaultValue: column.dflt_value,
        primaryKey: column.pk > 0,
      }));
  }

  getRowCount(name: string): number {
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(name)}`)
      .get();
    return row?.count ?? 0;
  }
}
