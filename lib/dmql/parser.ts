import type {
  Token,
  TokenType,
  SyntaxErrorInfo,
  ParseTree,
  ClauseNode,
  AttributeNode,
  RelationNode,
  OrderItemNode,
  ConditionNode,
  ExpressionNode,
  MiningOperationNode,
  MeasureItemNode,
  MeasureName,
  ComparisonOperator,
} from "./types";

// Clause keywords in the order a query must list them
const CLAUSE_KEYWORDS = [
  "USE",
  "RELEVANCE",
  "FROM",
  "WHERE",
  "GROUP",
  "ORDER",
  "MINE",
  "WITH",
  "DISPLAY",
] as const;

type ClauseKeyword = (typeof CLAUSE_KEYWORDS)[number];

const EXPECTED_CLAUSE = `{${CLAUSE_KEYWORDS.join(", ")}}`;

const COMPARISON_OPERATORS: readonly string[] = ["=", "!=", "<", ">", "<=", ">="];

const MEASURE_NAMES: readonly string[] = [
  "confidence",
  "support",
  "lift",
  "threshold",
  "confidence_level",
];

// Deepest nesting of parentheses, NOT and unary minus a condition may use
const MAX_NESTING_DEPTH = 100;

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.includes(value);
}

function isMeasureName(value: string): value is MeasureName {
  return MEASURE_NAMES.includes(value);
}

class ParseError extends Error {
  constructor(
    message: string,
    readonly token: Token,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * Recursive-descent parser producing a DMQL parse tree.
 *
 * Never throws on bad input: each syntax error is recorded in `errors` and
 * the parser skips ahead to the next clause keyword.
 */
export class Parser {
  private tokens: Token[];
  private current: number = 0;
  private depth: number = 0;
  readonly errors: SyntaxErrorInfo[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): ParseTree {
    const clauses: ClauseNode[] = [];
    let lastRank = -1;

    while (!this.isAtEnd()) {
      const token = this.peek();
      const rank = this.clauseRank(token);

      if (rank === -1) {
        this.report(`extraneous input '${token.text}' expecting ${EXPECTED_CLAUSE}`, token);
        this.synchronize(this.current);
        continue;
      }

      if (rank <= lastRank) {
        this.report(
          `${CLAUSE_KEYWORDS[rank]} clause is out of order or repeated; ` +
            `expected order is ${CLAUSE_KEYWORDS.join(", ")}`,
          token,
        );
      }
      lastRank = Math.max(lastRank, rank);

      const clause = this.parseClauseWithRecovery(CLAUSE_KEYWORDS[rank]);
      if (clause) clauses.push(clause);
    }

    return { type: "QUERY", clauses };
  }

  private clauseRank(token: Token): number {
    if (token.type !== "KEYWORD") return -1;
    return CLAUSE_KEYWORDS.findIndex((keyword) => keyword === token.value);
  }

  private parseClauseWithRecovery(keyword: ClauseKeyword): ClauseNode | undefined {
    const start = this.current;

    try {
      return this.parseClause(keyword);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;

      this.report(error.message, error.token);
      this.synchronize(start);

      if (keyword === "WHERE") {
        const text = this.tokens
          .slice(start + 1, this.current)
          .map((token) => token.text)
          .join("");
        return { type: "WHERE", condition: { type: "ERROR", text } };
      }
      return undefined;
    }
  }

  private parseClause(keyword: ClauseKeyword): ClauseNode {
    switch (keyword) {
      case "USE": {
        this.consume("KEYWORD", "USE");
        this.consume("KEYWORD", "DATABASE");
        return { type: "USE", database: this.consume("IDENTIFIER") };
      }
      case "RELEVANCE": {
        this.consume("KEYWORD", "RELEVANCE");
        this.consume("KEYWORD", "TO");
        return { type: "RELEVANCE", attributes: this.parseAttributeList() };
      }
      case "FROM": {
        this.consume("KEYWORD", "FROM");
        return { type: "FROM", relations: this.parseRelations() };
      }
      case "WHERE": {
        this.consume("KEYWORD", "WHERE");
        return { type: "WHERE", condition: this.parseCondition() };
      }
      case "GROUP": {
        this.consume("KEYWORD", "GROUP");
        this.consume("KEYWORD", "BY");
        return { type: "GROUP_BY", attributes: this.parseAttributeList() };
      }
      case "ORDER": {
        this.consume("KEYWORD", "ORDER");
        this.consume("KEYWORD", "BY");
        return { type: "ORDER_BY", items: this.parseOrderBy() };
      }
      case "MINE": {
        this.consume("KEYWORD", "MINE");
        return { type: "MINE", operation: this.parseMiningOperation() };
      }
      case "WITH": {
        this.consume("KEYWORD", "WITH");
        return { type: "WITH", measures: this.parseMeasures() };
      }
      case "DISPLAY": {
        this.consume("KEYWORD", "DISPLAY");
        this.consume("KEYWORD", "AS");
        return { type: "DISPLAY", displayType: this.consume("IDENTIFIER") };
      }
    }
  }

  private parseRelations(): RelationNode[] {
    const relations: RelationNode[] = [];

    do {
      const table = this.consume("IDENTIFIER");
      let alias: Token | undefined;

      if (this.check("KEYWORD", "AS")) {
        this.advance();
        alias = this.consume("IDENTIFIER");
      } else if (this.check("IDENTIFIER")) {
        alias = this.advance();
      }

      relations.push({ table, alias });
    } while (this.match("COMMA"));

    return relations;
  }

  private parseAttributeList(): AttributeNode[] {
    const attributes: AttributeNode[] = [];

    do {
      attributes.push(this.parseAttribute());
    } while (this.match("COMMA"));

    return attributes;
  }

  private parseAttribute(): AttributeNode {
    if (this.check("STAR")) {
      this.advance();
      return { type: "STAR" };
    }

    const first = this.consume("IDENTIFIER").value;

    // Check for table.column syntax
    if (this.check("DOT")) {
      this.advance();
      const column = this.consume("IDENTIFIER").value;
      return { type: "QUALIFIED", table: first, column };
    }

    return { type: "IDENTIFIER", name: first };
  }

  private parseOrderBy(): OrderItemNode[] {
    const items: OrderItemNode[] = [];

    do {
      const attribute = this.parseAttribute();

      if (this.check("KEYWORD", "ASC") || this.check("KEYWORD", "DESC")) {
        const direction = this.advance().value === "DESC" ? "DESC" : "ASC";
        items.push({ attribute, direction });
      } else {
        items.push({ attribute });
      }
    } while (this.match("COMMA"));

    return items;
  }

  private parseMiningOperation(): MiningOperationNode {
    const token = this.peek();

    if (token.type === "KEYWORD") {
      switch (token.value) {
        case "CLUSTER": {
          this.advance();
          const parameter = this.consume("IDENTIFIER");
          if (parameter.value.toUpperCase() !== "K") {
            throw new ParseError(`mismatched input '${parameter.text}' expecting 'K'`, parameter);
          }
          this.consume("OPERATOR", "=");
          const k = this.consume("INTEGER");
          if (!Number.isSafeInteger(Number(k.value))) {
            throw new ParseError(`cluster count '${k.text}' is out of range`, k);
          }
          return { type: "CLUSTER", k };
        }
        case "STATISTICS":
        case "ANOMALIES":
        case "ASSOCIATION_RULES":
          this.advance();
          return { type: token.value };
        case "CLASSIFICATION":
        case "REGRESSION":
          this.advance();
          return { type: token.value, target: this.consume("IDENTIFIER") };
      }
    }

    if (token.type === "IDENTIFIER") {
      this.advance();
      this.report(`unknown mining operation '${token.text}'`, token);
      return { type: "UNKNOWN", name: token.value };
    }

    throw this.unexpected(
      "{CLUSTER, STATISTICS, ANOMALIES, ASSOCIATION_RULES, CLASSIFICATION, REGRESSION}",
    );
  }

  private parseMeasures(): MeasureItemNode[] {
    const measures: MeasureItemNode[] = [];

    do {
      const nameToken = this.consume("IDENTIFIER");
      this.consume("OPERATOR", "=");
      const value = this.check("FLOAT") ? this.advance() : this.consume("INTEGER");

      const name = nameToken.value.toLowerCase();
      if (isMeasureName(name)) {
        measures.push({ name, value });
      } else {
        this.report(`unknown interest measure '${nameToken.text}'`, nameToken);
      }
    } while (this.match("COMMA"));

    return measures;
  }

  // Conditions: OR binds loosest, then AND, then NOT

  private parseCondition(): ConditionNode {
    return this.parseOrCondition();
  }

  private parseOrCondition(): ConditionNode {
    let left = this.parseAndCondition();

    while (this.check("KEYWORD", "OR")) {
      this.advance();
      const right = this.parseAndCondition();
      left = { type: "OR", left, right };
    }

    return left;
  }

  private parseAndCondition(): ConditionNode {
    let left = this.parseNotCondition();

    while (this.check("KEYWORD", "AND")) {
      this.advance();
      const right = this.parseNotCondition();
      left = { type: "AND", left, right };
    }

    return left;
  }

  private parseNotCondition(): ConditionNode {
    if (this.check("KEYWORD", "NOT")) {
      return this.nested<ConditionNode>(() => {
        this.advance();
        return { type: "NOT", operand: this.parseNotCondition() };
      });
    }
    return this.parsePrimaryCondition();
  }

  private parsePrimaryCondition(): ConditionNode {
    // "(" opens either a nested condition or an arithmetic expression such as
    // "(price + tax) > 100"; try the condition first and rewind if it fails.
    if (this.check("LPAREN")) {
      const saved = this.current;
      try {
        const inner = this.nested(() => {
          this.advance();
          const condition = this.parseCondition();
          this.consume("RPAREN");
          return condition;
        });
        if (!this.atPredicateContinuation()) {
          return { type: "PAREN", inner };
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
      }
      this.current = saved;
    }

    return this.parsePredicate();
  }

  private atPredicateContinuation(): boolean {
    const token = this.peek();
    if (token.type === "OPERATOR" || token.type === "ARITHMETIC" || token.type === "STAR") {
      return true;
    }
    return (
      token.type === "KEYWORD" &&
      ["BETWEEN", "LIKE", "IN", "IS", "NOT"].includes(token.value)
    );
  }

  private parsePredicate(): ConditionNode {
    const expression = this.parseExpression();

    if (this.check("OPERATOR")) {
      const token = this.advance();
      if (!isComparisonOperator(token.value)) {
        throw new ParseError(`unsupported comparison operator '${token.text}'`, token);
      }
      const right = this.parseExpression();
      return { type: "COMPARISON", left: expression, operator: token.value, right };
    }

    if (this.check("KEYWORD", "IS")) {
      this.advance();
      const negated = this.matchKeyword("NOT");
      this.consume("KEYWORD", "NULL");
      return { type: "IS_NULL", expression, negated };
    }

    const negated = this.matchKeyword("NOT");

    if (this.check("KEYWORD", "BETWEEN")) {
      this.advance();
      const low = this.parseExpression();
      this.consume("KEYWORD", "AND");
      const high = this.parseExpression();
      return { type: "BETWEEN", expression, low, high, negated };
    }

    if (this.check("KEYWORD", "LIKE")) {
      this.advance();
      const pattern = this.parseExpression();
      return { type: "LIKE", expression, pattern, negated };
    }

    if (this.check("KEYWORD", "IN")) {
      this.advance();
      this.consume("LPAREN");
      const values: ExpressionNode[] = [];
      do {
        values.push(this.parseExpression());
      } while (this.match("COMMA"));
      this.consume("RPAREN");
      return { type: "IN", expression, values, negated };
    }

    throw this.unexpected(
      negated ? "{BETWEEN, LIKE, IN}" : "{=, !=, <, >, <=, >=, BETWEEN, LIKE, IN, IS, NOT}",
    );
  }

  // Expressions

  private parseExpression(): ExpressionNode {
    let left = this.parseTerm();

    while (this.check("ARITHMETIC", "+") || this.check("ARITHMETIC", "-")) {
      const operator = this.advance().value;
      const right = this.parseTerm();
      left = { type: "BINARY", operator, left, right, text: `${left.text}${operator}${right.text}` };
    }

    return left;
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseFactor();

    while (this.check("STAR") || this.check("ARITHMETIC", "/")) {
      const operator = this.advance().value;
      const right = this.parseFactor();
      left = { type: "BINARY", operator, left, right, text: `${left.text}${operator}${right.text}` };
    }

    return left;
  }

  private parseFactor(): ExpressionNode {
    const token = this.peek();

    switch (token.type) {
      case "ARITHMETIC":
        if (token.value === "-") {
          return this.nested<ExpressionNode>(() => {
            this.advance();
            const operand = this.parseFactor();
            return { type: "NEGATE", operand, text: `-${operand.text}` };
          });
        }
        break;
      case "INTEGER":
      case "FLOAT":
      case "STRING":
        this.advance();
        return { type: token.type, token, text: token.text };
      case "KEYWORD":
        if (token.value === "NULL") {
          this.advance();
          return { type: "NULL", token, text: token.text };
        }
        break;
      case "IDENTIFIER":
        return this.parseIdentifierExpression();
      case "LPAREN":
        return this.nested<ExpressionNode>(() => {
          this.advance();
          const inner = this.parseExpression();
          this.consume("RPAREN");
          return { type: "PAREN", inner, text: `(${inner.text})` };
        });
    }

    throw this.unexpected("expression");
  }

  private parseIdentifierExpression(): ExpressionNode {
    const name = this.consume("IDENTIFIER").value;

    // Function call, e.g. AVG(amount) or COUNT(*)
    if (this.check("LPAREN")) {
      this.advance();

      if (this.check("STAR")) {
        this.advance();
        this.consume("RPAREN");
        return { type: "FUNCTION", name, args: "*", text: `${name}(*)` };
      }

      const args: ExpressionNode[] = [];
      if (!this.check("RPAREN")) {
        do {
          args.push(this.parseExpression());
        } while (this.match("COMMA"));
      }
      this.consume("RPAREN");

      const argsText = args.map((arg) => arg.text).join(",");
      return { type: "FUNCTION", name, args, text: `${name}(${argsText})` };
    }

    // Check for table.column syntax
    if (this.check("DOT")) {
      this.advance();
      const column = this.consume("IDENTIFIER").value;
      return { type: "QUALIFIED", table: name, column, text: `${name}.${column}` };
    }

    return { type: "IDENTIFIER", name, text: name };
  }

  // Recovery

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new ParseError(`nesting deeper than ${MAX_NESTING_DEPTH} levels`, this.peek());
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  /**
   * Skip ahead to the next clause keyword, always moving past `start`.
   */
  private synchronize(start: number): void {
    if (this.current <= start) {
      this.current = start;
      this.advance();
    }

    while (!this.isAtEnd() && this.clauseRank(this.peek()) === -1) {
      this.advance();
    }
  }

  private report(message: string, token: Token): void {
    this.errors.push({ line: token.line, column: token.column, message });
  }

  private unexpected(expected: string): ParseError {
    const token = this.peek();
    return new ParseError(`mismatched input '${token.text}' expecting ${expected}`, token);
  }

  // Token helpers

  private check(type: TokenType, value?: string): boolean {
    const token = this.peek();
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchKeyword(value: string): boolean {
    if (this.check("KEYWORD", value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consume(type: TokenType, value?: string): Token {
    if (this.check(type, value)) return this.advance();
    throw this.unexpected(value !== undefined ? `'${value}'` : type);
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}
