import { Lexer } from "./lexer";
import { Parser } from "./parser";
import { DMQLQueryReducer } from "./reducer";
import { QueryBuilder } from "./query";
import type { DMQLQuery } from "./query";
import type { SyntaxErrorInfo } from "./types";

export function formatSyntaxError(error: SyntaxErrorInfo): string {
  return `Line ${error.line}:${error.column} - ${error.message}`;
}

/**
 * Parse DMQL source text into a query.
 *
 * Never throws. Syntax errors are collected in `errors` and the query holds
 * whatever could still be understood.
 *
 * @example
 * const query = parseQuery(`
 *   USE DATABASE sales_data
 *   FROM customers
 *   WHERE age > 25
 *   MINE STATISTICS
 * `);
 * query.database; // "sales_data"
 * query.tables; // ["customers"]
 */
export function parseQuery(source: string): DMQLQuery {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser(tokens);
  const tree = parser.parse();

  const builder = new QueryBuilder();

  const errors = [...lexer.errors, ...parser.errors].sort(
    (a, b) => a.line - b.line || a.column - b.column,
  );
  for (const error of errors) {
    builder.addError(formatSyntaxError(error));
  }

  new DMQLQueryReducer().reduce(tree, builder);
  return builder.build(source);
}

/**
 * Check DMQL source for syntax errors without keeping the parsed query
 */
export function validateQuery(source: string): { valid: boolean; errors: string[] } {
  const { errors } = parseQuery(source);
  return { valid: errors.length === 0, errors: [...errors] };
}
