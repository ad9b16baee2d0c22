import type { AttributeNode, ClauseNode, ParseTree } from "./types";
import type { MiningOperation, QueryBuilder } from "./query";
import { extractCondition } from "./conditions";

type Clause<T extends ClauseNode["type"]> = Extract<ClauseNode, { type: T }>;

function attributeName(attribute: AttributeNode): string {
  switch (attribute.type) {
    case "STAR":
      return "*";
    case "IDENTIFIER":
      return attribute.name;
    case "QUALIFIED":
      return `${attribute.table}.${attribute.column}`;
  }
}

/**
 * Walks a parse tree depth-first and feeds each clause into a QueryBuilder.
 */
export class DMQLQueryReducer {
  reduce(tree: ParseTree, builder: QueryBuilder): QueryBuilder {
    for (const clause of tree.clauses) {
      switch (clause.type) {
        case "USE":
          this.reduceUse(clause, builder);
          break;
        case "RELEVANCE":
          this.reduceRelevance(clause, builder);
          break;
        case "FROM":
          this.reduceFrom(clause, builder);
          break;
        case "WHERE":
          this.reduceWhere(clause, builder);
          break;
        case "GROUP_BY":
          this.reduceGroupBy(clause, builder);
          break;
        case "ORDER_BY":
          this.reduceOrderBy(clause, builder);
          break;
        case "MINE":
          this.reduceMine(clause, builder);
          break;
        case "WITH":
          this.reduceWith(clause, builder);
          break;
        case "DISPLAY":
          this.reduceDisplay(clause, builder);
          break;
      }
    }
    return builder;
  }

  reduceUse(clause: Clause<"USE">, builder: QueryBuilder): void {
    builder.setDatabase(clause.database.value);
  }

  reduceRelevance(clause: Clause<"RELEVANCE">, builder: QueryBuilder): void {
    builder.setColumns(clause.attributes.map(attributeName));
  }

  reduceFrom(clause: Clause<"FROM">, builder: QueryBuilder): void {
    // Aliases are accepted by the grammar but only the table name is kept
    for (const relation of clause.relations) {
      builder.addTable(relation.table.value);
    }
  }

  reduceWhere(clause: Clause<"WHERE">, builder: QueryBuilder): void {
    builder.setConditions(extractCondition(clause.condition));
  }

  reduceGroupBy(clause: Clause<"GROUP_BY">, builder: QueryBuilder): void {
    builder.setGroupBy(clause.attributes.map(attributeName));
  }

  reduceOrderBy(clause: Clause<"ORDER_BY">, builder: QueryBuilder): void {
    for (const item of clause.items) {
      builder.addOrderBy({
        column: attributeName(item.attribute),
        direction: item.direction ?? "ASC",
      });
    }
  }

  reduceMine(clause: Clause<"MINE">, builder: QueryBuilder): void {
    const operation = clause.operation;
    let mining: MiningOperation;

    switch (operation.type) {
      case "CLUSTER":
        mining = {
          operationType: "CLUSTER",
          parameters: { k: Number(operation.k.value) },
        };
        break;
      case "CLASSIFICATION":
      case "REGRESSION":
        mining = {
          operationType: operation.type,
          parameters: { target: operation.target.value },
        };
        break;
      default:
        mining = { operationType: operation.type, parameters: {} };
    }

    builder.setMiningOperation(mining);
  }

  reduceWith(clause: Clause<"WITH">, builder: QueryBuilder): void {
    const measures: {
      confidence?: number;
      support?: number;
      lift?: number;
      threshold?: number;
      confidenceLevel?: number;
    } = {};

    for (const item of clause.measures) {
      const value = parseFloat(item.value.value);
      switch (item.name) {
        case "confidence":
          measures.confidence = value;
          break;
        case "support":
          measures.support = value;
          break;
        case "lift":
          measures.lift = value;
          break;
        case "threshold":
          measures.threshold = value;
          break;
        case "confidence_level":
          measures.confidenceLevel = value;
          break;
      }
    }

    if (Object.keys(measures).length > 0) {
      builder.setInterestMeasures(measures);
    }
  }

  reduceDisplay(clause: Clause<"DISPLAY">, builder: QueryBuilder): void {
    builder.setDisplayType(clause.displayType.value.toLowerCase());
  }
}
