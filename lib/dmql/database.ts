/**
 * Collaborator interfaces for the DMQL engine.
 * Any storage, mining or charting backend can implement these to run DMQL queries.
 */

import type { InterestMeasure, MiningOperationType, MiningParameters } from "./query";

export type Row = Record<string, unknown>;

/**
 * Existence check used by the SQL translator to resolve table names
 */
export interface TableResolver {
  tableExists(name: string): boolean;
}

/**
 * Main database context interface
 */
export interface DatabaseContext extends TableResolver {
  /**
   * Run a SQL statement and return its rows
   * @throws Error with the storage engine's message when the statement fails
   */
  run(sql: string): Promise<Row[]>;
}

export interface MiningRequest {
  table: Row[];
  operationType: MiningOperationType;
  parameters: MiningParameters;
  interestMeasures?: InterestMeasure;
}

export interface MiningOutcome {
  /** Input rows, possibly augmented (e.g. with a cluster label column) */
  table: Row[];
  result: unknown;
}

/**
 * Runs the analytic behind a MINE clause. Parameters are passed through untouched.
 */
export interface MiningCollaborator {
  mine(request: MiningRequest): Promise<MiningOutcome>;
}

export interface VisualizationRequest {
  table: Row[];
  displayType: string;
}

/**
 * Renders the rows for a DISPLAY AS clause
 */
export interface VisualizationCollaborator {
  render(request: VisualizationRequest): Promise<unknown>;
}
