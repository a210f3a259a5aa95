/** A single bound value. Vectors are lists of numbers. */
export type ParamScalar = string | number | boolean;
export type ParamValue = ParamScalar | readonly ParamScalar[];

/**
 * Declarative filter expression, as received from callers (JSON-shaped).
 *
 * Reserved keys `$and` / `$or` hold lists of sub-expressions; every other key
 * is `field` or `field__operator`.
 */
export interface FilterExpression {
  [key: string]: FilterValue;
}

export type FilterValue =
  | ParamScalar
  | null
  | readonly (ParamScalar | null)[]
  | readonly FilterExpression[]
  | FilterExpression;

export interface SimilarityRequest {
  vector: readonly number[];
  /** Minimum number of candidates to request from a vector index. */
  k: number;
  /**
   * Candidates must score strictly above this value. Scores are on the
   * cosine vector index scale, `(1 + cos) / 2` in [0, 1], whichever strategy
   * runs: 0.7 keeps candidates with a cosine above 0.4.
   */
  threshold: number;
  useIndex: boolean;
  orderBySimilarity: boolean;
}

export type AccessMode = 'read' | 'write';

/**
 * Finalized query ready for the execution boundary. Immutable.
 */
export interface QueryPlan {
  readonly text: string;
  readonly params: Readonly<Record<string, ParamValue>>;
  /** Names of params that must be bound as database integers. */
  readonly integerParams: readonly string[];
  readonly mode: AccessMode;
}

/** Decoded result row. Its shape belongs to the caller. */
export type QueryRecord = Record<string, unknown>;

export interface QueryExecutor {
  execute(plan: QueryPlan): Promise<QueryRecord[]>;
}

export interface IndexMetadataProvider {
  /** Vector dimensionality of the named index, or undefined when the index is unknown. */
  dimensionsFor(indexName: string): number | undefined;
}
