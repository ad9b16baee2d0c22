import type { ConditionNode, ExpressionNode } from "./types";
import type { Condition, Literal } from "./query";

/**
 * Reduce a WHERE parse tree into a condition tree.
 *
 * Every predicate form is handled the same way at any depth, so a BETWEEN
 * nested under OR reduces exactly as it would at the top level.
 */
export function extractCondition(node: ConditionNode): Condition {
  switch (node.type) {
    case "AND":
    case "OR":
      return {
        type: "LOGICAL",
        operator: node.type,
        children: [extractCondition(node.left), extractCondition(node.right)],
      };
    case "NOT":
      return { type: "NOT", child: extractCondition(node.operand) };
    case "PAREN":
      return extractCondition(node.inner);
    case "COMPARISON":
      return {
        type: "COMPARISON",
        left: node.left.text,
        operator: node.operator,
        right: toLiteral(node.right),
      };
    case "BETWEEN":
      return negate(node.negated, {
        type: "BETWEEN",
        expression: node.expression.text,
        low: toLiteral(node.low),
        high: toLiteral(node.high),
      });
    case "LIKE":
      return negate(node.negated, {
        type: "LIKE",
        expression: node.expression.text,
        pattern: toLiteral(node.pattern),
      });
    case "IN":
      return negate(node.negated, {
        type: "IN",
        expression: node.expression.text,
        values: node.values.map(toLiteral),
      });
    case "IS_NULL":
      return { type: "IS_NULL", expression: node.expression.text, negated: node.negated };
    case "ERROR":
      // Best effort for a clause the parser could not make sense of
      return {
        type: "COMPARISON",
        left: node.text,
        operator: "=",
        right: { type: "STRING", value: node.text },
      };
  }
}

function negate(negated: boolean, condition: Condition): Condition {
  return negated ? { type: "NOT", child: condition } : condition;
}

/**
 * Convert the right-hand side of a predicate into a literal. Token types
 * decide the kind, so '007' stays a string while 007 becomes the integer 7.
 * Anything that is not a plain literal keeps its raw text as a string.
 */
export function toLiteral(expression: ExpressionNode): Literal {
  switch (expression.type) {
    case "INTEGER":
      return { type: "INTEGER", value: parseInteger(expression.token.value) };
    case "FLOAT":
      return { type: "FLOAT", value: parseFloat(expression.token.value) };
    case "STRING":
      return { type: "STRING", value: expression.token.value };
    case "NULL":
      return { type: "NULL" };
    case "NEGATE": {
      const operand = toLiteral(expression.operand);
      if (operand.type === "INTEGER") {
        const value = operand.value;
        return { type: "INTEGER", value: typeof value === "bigint" ? narrowInteger(-value) : -value };
      }
      if (operand.type === "FLOAT") return { type: "FLOAT", value: -operand.value };
      break;
    }
  }

  return { type: "STRING", value: expression.text };
}

/**
 * Parse a run of digits exactly. Values a double cannot hold stay `bigint`.
 */
export function parseInteger(digits: string): number | bigint {
  return narrowInteger(BigInt(digits));
}

function narrowInteger(value: bigint): number | bigint {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}
