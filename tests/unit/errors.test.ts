import { describe, it, expect } from 'vitest';
import {
  AlreadyFinalizedError,
  BuildError,
  DimensionMismatchError,
  EmptyQueryError,
  FilterError,
  InvalidClauseOrderError,
  InvalidFilterShapeError,
  InvalidIdentifierError,
  InvalidPaginationError,
  InvalidSimilarityRequestError,
  QueryExecutionError,
  UnorderedPaginationError,
  UnsupportedOperatorError,
} from '../../src/errors.js';

describe('filter errors', () => {
  it('UnsupportedOperatorError names the field and operator', () => {
    const err = new UnsupportedOperatorError('topic_id', 'regex');
    expect(err).toBeInstanceOf(FilterError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnsupportedOperatorError');
    expect(err.kind).toBe('UnsupportedOperator');
    expect(err.message).toBe('Unsupported filter operator "regex" on field "topic_id"');
  });

  it('UnsupportedOperatorError uses a custom message when provided', () => {
    expect(new UnsupportedOperatorError('$not', '$not', 'my message').message).toBe('my message');
  });

  it('InvalidFilterShapeError points at the offending entry', () => {
    const err = new InvalidFilterShapeError('$or[1].topic_id__in', 'expected a list');
    expect(err).toBeInstanceOf(FilterError);
    expect(err.message).toBe('Invalid filter at "$or[1].topic_id__in": expected a list');
    expect(err.path).toBe('$or[1].topic_id__in');
  });
});

describe('build errors', () => {
  it('all extend BuildError', () => {
    const errors: BuildError[] = [
      new InvalidClauseOrderError('filtering', 'retrieval'),
      new AlreadyFinalizedError('match'),
      new EmptyQueryError(),
      new DimensionMismatchError(1024, 1536, 'memory_embeddings'),
      new InvalidIdentifierError('a b', 'alias'),
      new InvalidSimilarityRequestError('k', 'must be a positive integer'),
      new InvalidPaginationError('limit', 'must be a positive integer'),
      new UnorderedPaginationError(),
    ];
    for (const err of errors) {
      expect(err).toBeInstanceOf(BuildError);
      expect(err).toBeInstanceOf(Error);
      expect(err.stack).toBeDefined();
    }
  });

  it('InvalidClauseOrderError names both stages', () => {
    const err = new InvalidClauseOrderError('return', 'filtering');
    expect(err.name).toBe('InvalidClauseOrderError');
    expect(err.message).toBe('A filtering clause cannot follow the return stage');
  });

  it('DimensionMismatchError reports both sizes', () => {
    expect(new DimensionMismatchError(1024, 1536, 'memory_embeddings').message)
      .toBe('Query vector has 1536 dimensions but index "memory_embeddings" expects 1024');
    expect(new DimensionMismatchError(3, 2).message).toBe('Query vector has 2 dimensions but the index expects 3');
  });

  it('AlreadyFinalizedError names the operation', () => {
    expect(new AlreadyFinalizedError('build').message).toBe('Query has already been built; cannot call build()');
  });

  it('InvalidIdentifierError names the role', () => {
    const err = new InvalidIdentifierError('a b', 'label');
    expect(err.kind).toBe('InvalidIdentifier');
    expect(err.message).toBe('Invalid label "a b": must match /^[A-Za-z_][A-Za-z0-9_]*$/');
  });
});

describe('QueryExecutionError', () => {
  it('keeps the driver error as cause', () => {
    const cause = new Error('connection refused');
    const err = new QueryExecutionError('Failed to execute read query: connection refused', cause);
    expect(err.name).toBe('QueryExecutionError');
    expect(err.cause).toBe(cause);
    expect(err).not.toBeInstanceOf(BuildError);
  });
});
