/**
 * DMQL execution engine - decoupled from any specific storage, mining or
 * charting system
 */

import { parseQuery } from "./parseQuery";
import { translateToSQL } from "./translator";
import { DEFAULT_DISPLAY_TYPE } from "./query";
import type { DMQLQuery } from "./query";
import type {
  DatabaseContext,
  MiningCollaborator,
  Row,
  VisualizationCollaborator,
} from "./database";
import { DEFAULT_LIMITS } from "./limits";
import type { ExecutionLimits } from "./limits";

export type ExecutionResult =
  | {
      success: true;
      queryType: "select" | "mining";
      sql: string;
      data: Row[];
      columns: string[];
      rowCount: number;
      miningResult?: unknown;
      chart?: unknown;
    }
  | {
      success: false;
      error: string;
      sql?: string;
      errors?: string[];
    };

export interface ExecutionOptions {
  limits?: ExecutionLimits;
  miner?: MiningCollaborator;
  visualizer?: VisualizationCollaborator;
}

/**
 * Execute a DMQL query against a database context
 *
 * Never rejects: syntax errors and collaborator failures come back as
 * `{ success: false }` carrying the collaborator's own message.
 *
 * @param ctx - Database context providing table lookup and SQL execution
 * @param source - DMQL query text
 * @param options - Limits plus optional mining and visualization collaborators
 *
 * @example
 * const result = await executeDMQL(ctx, "USE DATABASE sales FROM customers WHERE age > 25");
 * if (result.success) console.log(result.rowCount);
 */
export async function executeDMQL(
  ctx: DatabaseContext,
  source: string,
  options: ExecutionOptions = {},
): Promise<ExecutionResult> {
  const limits = options.limits ?? DEFAULT_LIMITS;

  if (source.length > limits.maxQueryLength) {
    return {
      success: false,
      error:
        `Query length ${source.length} exceeds maximum allowed length of ${limits.maxQueryLength}. ` +
        `Shorten the query or raise maxQueryLength.`,
    };
  }

  const query = parseQuery(source);
  if (query.errors.length > 0) {
    return { success: false, error: "Query has syntax errors", errors: [...query.errors] };
  }

  return await executeDMQLQuery(ctx, query, options);
}

/**
 * Execute an already parsed DMQL query
 */
export async function executeDMQLQuery(
  ctx: DatabaseContext,
  query: DMQLQuery,
  options: ExecutionOptions = {},
): Promise<ExecutionResult> {
  const limits = options.limits ?? DEFAULT_LIMITS;
  const mining = query.miningOperation;
  let sql: string | undefined;

  try {
    // Table resolution already talks to storage
    sql = translateToSQL(query, ctx);
    console.log(`[DMQL] ${sql}`);

    let table = await ctx.run(sql);
    console.log(`[DMQL] Query returned ${table.length} rows`);

    let miningResult: unknown;
    if (mining) {
      if (!options.miner) {
        throw new Error(`No mining collaborator configured for ${mining.operationType}`);
      }
      console.log(`[DMQL] Mining ${mining.operationType} over ${table.length} rows`);
      const outcome = await options.miner.mine({
        table,
        operationType: mining.operationType,
        parameters: mining.parameters,
        interestMeasures: query.interestMeasures,
      });
      table = outcome.table;
      miningResult = outcome.result;
    }

    let chart: unknown;
    if (query.displayType !== DEFAULT_DISPLAY_TYPE && options.visualizer) {
      console.log(`[DMQL] Rendering ${query.displayType}`);
      chart = await options.visualizer.render({ table, displayType: query.displayType });
    }

    // Enforce maximum result size
    const data = table.length > limits.maxRows ? table.slice(0, limits.maxRows) : table;

    return {
      success: true,
      queryType: mining ? "mining" : "select",
      sql,
      data,
      columns: data.length > 0 ? Object.keys(data[0]) : [],
      rowCount: data.length,
      ...(mining && { miningResult }),
      ...(chart !== undefined && { chart }),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[DMQL] Query failed: ${message}`);
    return { success: false, error: message, ...(sql !== undefined && { sql }) };
  }
}
