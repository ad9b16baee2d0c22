/**
 * Configuration for DMQL query execution limits
 * These limits help prevent abuse and excessive resource usage
 */

export interface ExecutionLimits {
  /**
   * Maximum number of rows returned by a query
   * Rows beyond this are dropped after mining has run on the full result
   * Default: 1000
   */
  maxRows: number;

  /**
   * Maximum length of DMQL source text, in characters
   * Longer queries are rejected before parsing
   * Default: 10000
   */
  maxQueryLength: number;
}

/**
 * Default limits - safe for production use
 */
export const DEFAULT_LIMITS: ExecutionLimits = {
  maxRows: 1000,
  maxQueryLength: 10000,
};

/**
 * Permissive limits - for development/testing
 * WARNING: Not recommended for public/production deployment
 */
export const PERMISSIVE_LIMITS: ExecutionLimits = {
  maxRows: 10000,
  maxQueryLength: 100000,
};

/**
 * Strict limits - for high-security/high-load environments
 */
export const STRICT_LIMITS: ExecutionLimits = {
  maxRows: 100,
  maxQueryLength: 2000,
};
