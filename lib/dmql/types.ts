// DMQL token and parse tree types

export type TokenType =
  | "KEYWORD"
  | "IDENTIFIER"
  | "INTEGER"
  | "FLOAT"
  | "STRING"
  | "OPERATOR"
  | "ARITHMETIC"
  | "COMMA"
  | "DOT"
  | "STAR"
  | "LPAREN"
  | "RPAREN"
  | "EOF";

export type Token = {
  type: TokenType;
  value: string; // Normalized: upper-cased keywords, unquoted strings
  text: string; // Exact source text
  position: number;
  line: number; // 1-based
  column: number; // 0-based
};

export type SyntaxErrorInfo = {
  line: number;
  column: number;
  message: string;
};

export type ComparisonOperator = "=" | "!=" | "<" | ">" | "<=" | ">=";

export type SortDirection = "ASC" | "DESC";

export type AttributeNode =
  | { type: "STAR" }
  | { type: "IDENTIFIER"; name: string }
  | { type: "QUALIFIED"; table: string; column: string };

export type RelationNode = {
  table: Token;
  alias?: Token;
};

export type OrderItemNode = {
  attribute: AttributeNode;
  direction?: SortDirection;
};

export type ExpressionNode =
  | { type: "INTEGER" | "FLOAT" | "STRING" | "NULL"; token: Token; text: string }
  | { type: "IDENTIFIER"; name: string; text: string }
  | { type: "QUALIFIED"; table: string; column: string; text: string }
  | { type: "FUNCTION"; name: string; args: ExpressionNode[] | "*"; text: string }
  | { type: "NEGATE"; operand: ExpressionNode; text: string }
  | { type: "BINARY"; operator: string; left: ExpressionNode; right: ExpressionNode; text: string }
  | { type: "PAREN"; inner: ExpressionNode; text: string };

export type ConditionNode =
  | { type: "AND" | "OR"; left: ConditionNode; right: ConditionNode }
  | { type: "NOT"; operand: ConditionNode }
  | { type: "PAREN"; inner: ConditionNode }
  | { type: "COMPARISON"; left: ExpressionNode; operator: ComparisonOperator; right: ExpressionNode }
  | { type: "BETWEEN"; expression: ExpressionNode; low: ExpressionNode; high: ExpressionNode; negated: boolean }
  | { type: "LIKE"; expression: ExpressionNode; pattern: ExpressionNode; negated: boolean }
  | { type: "IN"; expression: ExpressionNode; values: ExpressionNode[]; negated: boolean }
  | { type: "IS_NULL"; expression: ExpressionNode; negated: boolean }
  | { type: "ERROR"; text: string }; // WHERE clause that failed to parse

export type MiningOperationNode =
  | { type: "CLUSTER"; k: Token }
  | { type: "STATISTICS" | "ANOMALIES" | "ASSOCIATION_RULES" }
  | { type: "CLASSIFICATION" | "REGRESSION"; target: Token }
  | { type: "UNKNOWN"; name: string };

export type MeasureName = "confidence" | "support" | "lift" | "threshold" | "confidence_level";

export type MeasureItemNode = {
  name: MeasureName;
  value: Token;
};

export type ClauseNode =
  | { type: "USE"; database: Token }
  | { type: "RELEVANCE"; attributes: AttributeNode[] }
  | { type: "FROM"; relations: RelationNode[] }
  | { type: "WHERE"; condition: ConditionNode }
  | { type: "GROUP_BY"; attributes: AttributeNode[] }
  | { type: "ORDER_BY"; items: OrderItemNode[] }
  | { type: "MINE"; operation: MiningOperationNode }
  | { type: "WITH"; measures: MeasureItemNode[] }
  | { type: "DISPLAY"; displayType: Token };

export type ParseTree = {
  type: "QUERY";
  clauses: ClauseNode[];
};
