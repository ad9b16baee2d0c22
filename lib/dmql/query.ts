/**
 * DMQL query model: the immutable result of parsing one DMQL query, and the
 * builder that assembles it.
 */

import type { ComparisonOperator, SortDirection } from "./types";

export type Literal =
  /** `bigint` only when the value lies outside the safe integer range */
  | { readonly type: "INTEGER"; readonly value: number | bigint }
  | { readonly type: "FLOAT"; readonly value: number }
  | { readonly type: "STRING"; readonly value: string }
  | { readonly type: "NULL" };

export type LogicalOperator = "AND" | "OR";

export type Condition =
  | {
      readonly type: "COMPARISON";
      readonly left: string;
      readonly operator: ComparisonOperator;
      readonly right: Literal;
    }
  | {
      readonly type: "LOGICAL";
      readonly operator: LogicalOperator;
      readonly children: readonly [Condition, Condition];
    }
  | { readonly type: "NOT"; readonly child: Condition }
  | {
      readonly type: "BETWEEN";
      readonly expression: string;
      readonly low: Literal;
      readonly high: Literal;
    }
  | { readonly type: "LIKE"; readonly expression: string; readonly pattern: Literal }
  | { readonly type: "IN"; readonly expression: string; readonly values: readonly Literal[] }
  | { readonly type: "IS_NULL"; readonly expression: string; readonly negated: boolean };

export type MiningOperationType =
  | "CLUSTER"
  | "STATISTICS"
  | "ANOMALIES"
  | "ASSOCIATION_RULES"
  | "CLASSIFICATION"
  | "REGRESSION"
  | "UNKNOWN";

export type MiningParameters = Readonly<Record<string, string | number>>;

export interface MiningOperation {
  readonly operationType: MiningOperationType;
  /** Operation-specific: `k` for CLUSTER, `target` for CLASSIFICATION and REGRESSION */
  readonly parameters: MiningParameters;
}

export interface InterestMeasure {
  readonly confidence?: number;
  readonly support?: number;
  readonly lift?: number;
  readonly threshold?: number;
  readonly confidenceLevel?: number;
}

export interface OrderByItem {
  readonly column: string;
  readonly direction: SortDirection;
}

export interface DMQLQuery {
  readonly database: string;
  readonly tables: readonly string[];
  /** Empty means every column */
  readonly columns: readonly string[];
  readonly conditions?: Condition;
  readonly groupBy: readonly string[];
  readonly orderBy: readonly OrderByItem[];
  readonly miningOperation?: MiningOperation;
  readonly interestMeasures?: InterestMeasure;
  readonly displayType: string;
  readonly rawQuery: string;
  /** Syntax errors formatted as "Line {line}:{col} - {message}" */
  readonly errors: readonly string[];
}

export const DEFAULT_DISPLAY_TYPE = "table";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Accumulates clause results during a single parse. `build()` hands out a
 * frozen copy, so nothing partially constructed escapes.
 */
export class QueryBuilder {
  private database = "";
  private tables: string[] = [];
  private columns: string[] = [];
  private conditions: Condition | undefined;
  private groupBy: string[] = [];
  private orderBy: OrderByItem[] = [];
  private miningOperation: MiningOperation | undefined;
  private interestMeasures: InterestMeasure | undefined;
  private displayType = DEFAULT_DISPLAY_TYPE;
  private errors: string[] = [];

  setDatabase(name: string): this {
    this.database = name;
    return this;
  }

  addTable(name: string): this {
    this.tables.push(name);
    return this;
  }

  setColumns(columns: string[]): this {
    this.columns = [...columns];
    return this;
  }

  setConditions(condition: Condition): this {
    this.conditions = condition;
    return this;
  }

  setGroupBy(columns: string[]): this {
    this.groupBy = [...columns];
    return this;
  }

  addOrderBy(item: OrderByItem): this {
    this.orderBy.push(item);
    return this;
  }

  setMiningOperation(operation: MiningOperation): this {
    this.miningOperation = operation;
    return this;
  }

  setInterestMeasures(measures: InterestMeasure): this {
    this.interestMeasures = measures;
    return this;
  }

  setDisplayType(displayType: string): this {
    this.displayType = displayType;
    return this;
  }

  addError(message: string): this {
    this.errors.push(message);
    return this;
  }

  build(rawQuery: string): DMQLQuery {
    const query: DMQLQuery = {
      database: this.database,
      tables: [...this.tables],
      columns: [...this.columns],
      groupBy: [...this.groupBy],
      orderBy: [...this.orderBy],
      displayType: this.displayType,
      rawQuery,
      errors: [...this.errors],
      ...(this.conditions && { conditions: this.conditions }),
      ...(this.miningOperation && { miningOperation: this.miningOperation }),
      ...(this.interestMeasures && { interestMeasures: this.interestMeasures }),
    };
    return deepFreeze(query);
  }
}
