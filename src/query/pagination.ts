import type { ParamScalar, QueryRecord } from '../types.js';
import { InvalidPaginationError, UnorderedPaginationError } from '../errors.js';
import { toExpression, type CypherQueryBuilder, type OrderKey, type ProjectionInput } from './builder.js';
import { renderExpression, type Expression } from './expression.js';
import type { ParameterBag } from './params.js';
import { and, or, type Predicate } from './predicate.js';

/** Last-seen values of the order keys, one per key, in key order. */
export type Cursor = readonly ParamScalar[];

export interface PaginationOptions {
  orderBy: readonly OrderKey[];
  limit: number;
  /** Offset pagination. Cannot be combined with `cursor`. */
  skip?: number;
  /** Keyset pagination: only rows strictly after this position. */
  cursor?: Cursor;
  distinct?: boolean;
}

function isScalar(value: unknown): value is ParamScalar {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validate(options: PaginationOptions): void {
  if (options.orderBy.length === 0) {
    throw new UnorderedPaginationError();
  }
  if (!Number.isSafeInteger(options.limit) || options.limit <= 0) {
    throw new InvalidPaginationError('limit', `must be a positive integer, got ${String(options.limit)}`);
  }
  const { skip, cursor } = options;
  if (skip !== undefined && (!Number.isSafeInteger(skip) || skip < 0)) {
    throw new InvalidPaginationError('skip', `must be a non-negative integer, got ${String(skip)}`);
  }
  if (cursor === undefined) return;
  if (skip !== undefined) {
    throw new InvalidPaginationError('cursor', 'cannot be combined with skip');
  }
  if (cursor.length !== options.orderBy.length) {
    throw new InvalidPaginationError(
      'cursor',
      `has ${cursor.length} values but there are ${options.orderBy.length} order keys`,
    );
  }
  if (!cursor.every(isScalar)) {
    throw new InvalidPaginationError('cursor', 'values must be strings, finite numbers or booleans');
  }
}

/**
 * Lexicographic "strictly after" condition over the order keys:
 * `k1 > $a OR (k1 = $a AND k2 > $b) OR ...`, with `<` for descending keys.
 */
export function keysetPredicate(keys: readonly OrderKey[], cursor: Cursor, bag: ParameterBag): Predicate {
  const bound = keys.map((key, i) => {
    const value = cursor[i];
    if (value === undefined) {
      throw new InvalidPaginationError('cursor', `has no value for order key ${i}`);
    }
    return { key, subject: toExpression(key.expr), param: bag.add(value) };
  });

  const compare = (entry: (typeof bound)[number], op: '=' | '<' | '>'): Predicate =>
    entry.key.cast !== undefined
      ? { kind: 'comparison', subject: entry.subject, op, param: entry.param, cast: entry.key.cast }
      : { kind: 'comparison', subject: entry.subject, op, param: entry.param };

  return or(
    ...bound.map((entry, i) =>
      and(
        ...bound.slice(0, i).map((previous) => compare(previous, '=')),
        compare(entry, entry.key.direction === 'DESC' ? '<' : '>'),
      ),
    ),
  );
}

/**
 * Emits the tail of a paginated read: `RETURN`, a mandatory `ORDER BY` and
 * `SKIP/LIMIT`. With a cursor, `WITH *` and the keyset `WHERE` come first and
 * only `LIMIT` is emitted. Everything is validated before any clause is added.
 */
export function applyPagination(
  builder: CypherQueryBuilder,
  returnItems: readonly ProjectionInput[],
  options: PaginationOptions,
): CypherQueryBuilder {
  validate(options);

  if (options.cursor !== undefined) {
    builder.with(['*']).where(keysetPredicate(options.orderBy, options.cursor, builder.params));
  }

  builder.return(returnItems, { distinct: options.distinct === true }).orderBy(options.orderBy);

  if (options.cursor !== undefined) {
    return builder.paginate({ limit: options.limit });
  }
  return builder.paginate({ skip: options.skip ?? 0, limit: options.limit });
}

// ---------------------------------------------------------------------------
// Cursor tokens
// ---------------------------------------------------------------------------

/** A decoded cursor token. */
export interface CursorToken {
  values: Cursor;
  /** Rows the earlier pages returned in total. */
  consumed: number;
}

/** Opaque, URL-safe token for a cursor. */
export function encodeCursor(cursor: Cursor, consumed = 0): string {
  return Buffer.from(JSON.stringify({ v: cursor, n: consumed }), 'utf8').toString('base64url');
}

export function decodeCursor(token: string): CursorToken {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch (err) {
    throw new InvalidPaginationError('cursor', `is not a valid token (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isRecord(decoded)) {
    throw new InvalidPaginationError('cursor', 'is not a valid token');
  }
  const values = decoded['v'];
  if (!Array.isArray(values) || values.length === 0) {
    throw new InvalidPaginationError('cursor', 'is not a valid token');
  }
  const consumed = decoded['n'] ?? 0;
  if (typeof consumed !== 'number' || !Number.isSafeInteger(consumed) || consumed < 0) {
    throw new InvalidPaginationError('cursor', 'has an invalid row count');
  }
  const cursor: ParamScalar[] = [];
  for (const value of values) {
    if (!isScalar(value)) {
      throw new InvalidPaginationError('cursor', 'values must be strings, finite numbers or booleans');
    }
    cursor.push(value);
  }
  return { values: cursor, consumed };
}

function pathOf(expr: Expression): string[] {
  if (expr.kind === 'ref') return [expr.name];
  if (expr.kind === 'property') return [expr.alias, expr.field];
  throw new InvalidPaginationError('cursor', `cannot read order key ${renderExpression(expr)} from a record`);
}

/**
 * Builds the cursor that continues after `record`, reading each order key by
 * its path (`similarity`, `m.timestamp`) from the mapped result row.
 */
export function cursorFromRecord(record: QueryRecord, keys: readonly OrderKey[]): Cursor {
  return keys.map((key) => {
    const expr = toExpression(key.expr);
    let current: unknown = record;
    for (const segment of pathOf(expr)) {
      current = isRecord(current) ? current[segment] : undefined;
    }
    if (!isScalar(current)) {
      throw new InvalidPaginationError('cursor', `record has no usable value for ${renderExpression(expr)}`);
    }
    return current;
  });
}
