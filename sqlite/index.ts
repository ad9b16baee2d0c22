import Database from "better-sqlite3";
import { executeDMQL as executeDMQLEngine } from "../lib/dmql/engine";
import type { ExecutionOptions, ExecutionResult } from "../lib/dmql/engine";
import { SqliteDatabaseContext } from "./adapter";

/**
 * Open a SQLite database (in memory by default) wrapped as a DMQL context
 */
export function createSqliteContext(path: string = ":memory:"): SqliteDatabaseContext {
  return new SqliteDatabaseContext(new Database(path));
}

/**
 * Execute a DMQL query against a SQLite database
 *
 * @param db - better-sqlite3 connection
 * @param source - DMQL query text
 * @param options - Optional limits and mining/visualization collaborators
 * @returns Tagged result; failures carry the storage engine's message
 *
 * @example
 * const result = await executeDMQL(db, "USE DATABASE sales FROM customers WHERE age > 25");
 *
 * @example
 * const result = await executeDMQL(db, "FROM customers ORDER BY age DESC", { limits: STRICT_LIMITS });
 */
export async function executeDMQL(
  db: Database.Database,
  source: string,
  options?: ExecutionOptions,
): Promise<ExecutionResult> {
  const ctx = new SqliteDatabaseContext(db);
  return await executeDMQLEngine(ctx, source, options);
}

export { SqliteDatabaseContext } from "./adapter";
export type { ColumnInfo } from "./adapter";
export { seedDatabase, clearDatabase } from "./seedData";
export type { SeedOptions } from "./seedData";
// Re-export limits for convenience
export type { ExecutionLimits } from "../lib/dmql/limits";
export { DEFAULT_LIMITS, PERMISSIVE_LIMITS, STRICT_LIMITS } from "../lib/dmql/limits";
