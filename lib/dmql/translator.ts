/**
 * DMQL to SQL translation.
 *
 * String literals are wrapped in single quotes as-is: embedded quotes are not
 * escaped, so query text must come from a trusted source.
 */

import type { Condition, DMQLQuery, Literal } from "./query";
import type { TableResolver } from "./database";

export const DATABASE_SEPARATOR = "__";

/**
 * Resolve a table name within a logical database. The prefixed name
 * (`sales__customers`) is probed first and wins over a bare table of the same
 * name, then the bare name is probed. A name found in neither form is
 * returned unchanged and fails when the SQL runs.
 */
export function resolveTableName(
  resolver: TableResolver,
  database: string,
  table: string,
): string {
  if (database) {
    const prefixed = `${database}${DATABASE_SEPARATOR}${table}`;
    if (resolver.tableExists(prefixed)) return prefixed;
  }
  if (resolver.tableExists(table)) return table;
  return table;
}

export function renderLiteral(literal: Literal): string {
  switch (literal.type) {
    case "STRING":
      return `'${literal.value}'`;
    case "NULL":
      return "NULL";
    case "INTEGER":
      return String(literal.value);
    case "FLOAT":
      return Number.isInteger(literal.value) ? literal.value.toFixed(1) : String(literal.value);
  }
}

export function renderCondition(condition: Condition): string {
  switch (condition.type) {
    case "LOGICAL": {
      const [left, right] = condition.children;
      return `(${renderCondition(left)} ${condition.operator} ${renderCondition(right)})`;
    }
    case "COMPARISON":
      return `${condition.left} ${condition.operator} ${renderLiteral(condition.right)}`;
    case "NOT":
      return `NOT (${renderCondition(condition.child)})`;
    case "BETWEEN":
      return `${condition.expression} BETWEEN ${renderLiteral(condition.low)} AND ${renderLiteral(condition.high)}`;
    case "LIKE":
      return `${condition.expression} LIKE ${renderLiteral(condition.pattern)}`;
    case "IN":
      return `${condition.expression} IN (${condition.values.map(renderLiteral).join(", ")})`;
    case "IS_NULL":
      return `${condition.expression} IS ${condition.negated ? "NOT NULL" : "NULL"}`;
  }
}

/**
 * Translate a parsed DMQL query into a SQL SELECT statement
 *
 * @param query - Parsed query
 * @param resolver - Table existence check used to pick `db__table` or `table`
 * @returns SQL text; translation itself never fails
 *
 * @example
 * translateToSQL(parseQuery("USE DATABASE sales FROM customers WHERE age > 25"), ctx);
 * // "SELECT * FROM sales__customers WHERE age > 25"
 */
export function translateToSQL(query: DMQLQuery, resolver: TableResolver): string {
  const tables = query.tables.map((table) => resolveTableName(resolver, query.database, table));
  const columns = query.columns.length > 0 ? query.columns.join(", ") : "*";

  let sql = `SELECT ${columns} FROM ${tables.join(", ")}`;

  if (query.conditions) {
    sql += ` WHERE ${renderCondition(query.conditions)}`;
  }

  if (query.groupBy.length > 0) {
    sql += ` GROUP BY ${query.groupBy.join(", ")}`;
  }

  if (query.orderBy.length > 0) {
    const orderParts = query.orderBy.map((item) => `${item.column} ${item.direction}`);
    sql += ` ORDER BY ${orderParts.join(", ")}`;
  }

  return sql;
}
