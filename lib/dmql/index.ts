export { parseQuery, validateQuery, formatSyntaxError } from "./parseQuery";
export { translateToSQL, resolveTableName, renderCondition, renderLiteral, DATABASE_SEPARATOR } from "./translator";
export { executeDMQL, executeDMQLQuery } from "./engine";
export type { ExecutionResult, ExecutionOptions } from "./engine";
export { Lexer, KEYWORDS } from "./lexer";
export { Parser } from "./parser";
export { DMQLQueryReducer } from "./reducer";
export { extractCondition, toLiteral } from "./conditions";
export { QueryBuilder, DEFAULT_DISPLAY_TYPE } from "./query";
export type {
  DMQLQuery,
  Condition,
  Literal,
  LogicalOperator,
  MiningOperation,
  MiningOperationType,
  MiningParameters,
  InterestMeasure,
  OrderByItem,
} from "./query";
export type {
  Row,
  TableResolver,
  DatabaseContext,
  MiningCollaborator,
  MiningRequest,
  MiningOutcome,
  VisualizationCollaborator,
  VisualizationRequest,
} from "./database";
export type { ExecutionLimits } from "./limits";
export { DEFAULT_LIMITS, PERMISSIVE_LIMITS, STRICT_LIMITS } from "./limits";
export type * from "./types";
