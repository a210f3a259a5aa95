import type { ClauseKind, QueryState } from './query/clause-state.js';

// ---------------------------------------------------------------------------
// Filter compilation
// ---------------------------------------------------------------------------

export class FilterError extends Error {
  override readonly name: string = 'FilterError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends FilterError {
  override readonly name = 'UnsupportedOperatorError';
  readonly kind = 'UnsupportedOperator';

  constructor(
    readonly field: string,
    readonly operator: string,
    message?: string,
  ) {
    super(message ?? `Unsupported filter operator "${operator}" on field "${field}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidFilterShapeError extends FilterError {
  override readonly name = 'InvalidFilterShapeError';
  readonly kind = 'InvalidShape';

  /**
   * @param path - location of the offending entry, e.g. `$or[1].topic_id__in`
   */
  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super(`Invalid filter at "${path}": ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ---------------------------------------------------------------------------
// Query construction
// ---------------------------------------------------------------------------

export class BuildError extends Error {
  override readonly name: string = 'BuildError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidClauseOrderError extends BuildError {
  override readonly name = 'InvalidClauseOrderError';
  readonly kind = 'InvalidClauseOrder';

  constructor(
    readonly from: QueryState,
    readonly attempted: ClauseKind,
  ) {
    super(`A ${attempted} clause cannot follow the ${from} stage`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AlreadyFinalizedError extends BuildError {
  override readonly name = 'AlreadyFinalizedError';
  readonly kind = 'AlreadyFinalized';

  constructor(readonly operation: string) {
    super(`Query has already been built; cannot call ${operation}()`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EmptyQueryError extends BuildError {
  override readonly name = 'EmptyQueryError';
  readonly kind = 'EmptyQuery';

  constructor() {
    super('Cannot build a query without clauses');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DimensionMismatchError extends BuildError {
  override readonly name = 'DimensionMismatchError';
  readonly kind = 'DimensionMismatch';

  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly indexName?: string,
  ) {
    super(
      `Query vector has ${actual} dimensions but ` +
      `${indexName !== undefined ? `index "${indexName}"` : 'the index'} expects ${expected}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidIdentifierError extends BuildError {
  override readonly name = 'InvalidIdentifierError';
  readonly kind = 'InvalidIdentifier';

  constructor(
    readonly identifier: string,
    readonly role: string,
  ) {
    super(`Invalid ${role} "${identifier}": must match /^[A-Za-z_][A-Za-z0-9_]*$/`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidSimilarityRequestError extends BuildError {
  override readonly name = 'InvalidSimilarityRequestError';
  readonly kind = 'InvalidSimilarityRequest';

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid similarity request: ${field} ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidPaginationError extends BuildError {
  override readonly name = 'InvalidPaginationError';
  readonly kind = 'InvalidPagination';

  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`Invalid pagination: ${field} ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnorderedPaginationError extends BuildError {
  override readonly name = 'UnorderedPaginationError';
  readonly kind = 'UnorderedPagination';

  constructor() {
    super('Pagination requires at least one ORDER BY key');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ---------------------------------------------------------------------------
// Execution boundary
// ---------------------------------------------------------------------------

export class QueryExecutionError extends Error {
  override readonly name = 'QueryExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
