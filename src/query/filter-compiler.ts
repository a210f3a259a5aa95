import type { FilterExpression, FilterValue, ParamScalar } from '../types.js';
import { InvalidFilterShapeError, UnsupportedOperatorError } from '../errors.js';
import { ParameterBag } from './params.js';
import { assertIdentifier, isIdentifier, prop } from './expression.js';
import { and, or, TRUE, type ComparisonOp, type Predicate } from './predicate.js';

export interface CompiledFilter {
  predicate: Predicate;
  params: ParameterBag;
}

export interface CompileFilterOptions {
  /**
   * Fields stored as Cypher temporal values. Their filter values must be
   * ISO-8601 strings and are compared through datetime(). Defaults to
   * `['timestamp']`.
   */
  temporalFields?: readonly string[];
}

export const DEFAULT_TEMPORAL_FIELDS: readonly string[] = ['timestamp'];

const RANGE_OPS: Readonly<Record<'lt' | 'lte' | 'gt' | 'gte', ComparisonOp>> = {
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
};

const OPERATOR_SEPARATOR = '__';

function isPlainObject(value: unknown): value is FilterExpression {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ParamScalar {
  return typeof value === 'string'
    || typeof value === 'boolean'
    || (typeof value === 'number' && Number.isFinite(value));
}

function isScalarList(value: unknown): value is readonly ParamScalar[] {
  return Array.isArray(value) && value.every(isScalar);
}

function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

/**
 * Recursive compilation state. One instance per compileFilter() call; all
 * nested groups share the same bag so parameter names never collide.
 */
class FilterCompilation {
  constructor(
    private readonly alias: string,
    private readonly bag: ParameterBag,
    private readonly temporalFields: ReadonlySet<string>,
  ) {}

  expression(expr: unknown, path: string): Predicate {
    if (!isPlainObject(expr)) {
      throw new InvalidFilterShapeError(path === '' ? '$' : path, 'expected an object of field conditions');
    }
    const parts: Predicate[] = [];
    for (const [key, value] of Object.entries(expr)) {
      parts.push(this.entry(key, value, joinPath(path, key)));
    }
    return and(...parts);
  }

  private entry(key: string, value: FilterValue, path: string): Predicate {
    if (key === '$and' || key === '$or') {
      return this.group(key, value, path);
    }
    if (key.startsWith('$')) {
      throw new UnsupportedOperatorError(key, key, `Unsupported filter group "${key}" (expected $and or $or)`);
    }

    const separator = key.indexOf(OPERATOR_SEPARATOR);
    const field = separator === -1 ? key : key.slice(0, separator);
    const operator = separator === -1 ? undefined : key.slice(separator + OPERATOR_SEPARATOR.length);

    if (!isIdentifier(field)) {
      throw new InvalidFilterShapeError(path, `field "${field}" is not a plain identifier`);
    }
    if (this.temporalFields.has(field)) {
      return this.temporal(field, operator ?? 'eq', value, path);
    }
    if (operator === undefined) {
      return this.equality(field, value, path);
    }
    return this.operator(field, operator, value, path);
  }

  private group(key: '$and' | '$or', value: FilterValue, path: string): Predicate {
    if (!Array.isArray(value)) {
      throw new InvalidFilterShapeError(path, `${key} expects a list of filter objects`);
    }
    const members: unknown[] = [...value];
    const children = members.map((member, i) => this.expression(member, `${path}[${i}]`));
    // Empty groups collapse to their identity element (AND: true, OR: false)
    return key === '$and' ? and(...children) : or(...children);
  }

  // A DateTime compared with a string is null, so every row would be dropped
  private temporal(field: string, operator: string, value: FilterValue, path: string): Predicate {
    const subject = prop(this.alias, field);
    let op: ComparisonOp;
    switch (operator) {
      case 'eq':
        op = '=';
        break;
      case 'ne':
        op = '<>';
        break;
      case 'lt':
      case 'lte':
      case 'gt':
      case 'gte':
        op = RANGE_OPS[operator];
        break;
      case 'in':
      case 'overlap':
      case 'contains':
      case 'startswith':
      case 'endswith':
        throw new InvalidFilterShapeError(path, `${operator} is not supported on temporal field "${field}"`);
      default:
        throw new UnsupportedOperatorError(field, operator);
    }
    if (value === null && (op === '=' || op === '<>')) {
      return { kind: 'nullCheck', subject, negated: op === '<>' };
    }
    if (typeof value !== 'string') {
      throw new InvalidFilterShapeError(path, `temporal field "${field}" expects an ISO-8601 string`);
    }
    return { kind: 'comparison', subject, op, param: this.bag.add(value), cast: 'datetime' };
  }

  private equality(field: string, value: FilterValue, path: string): Predicate {
    const subject = prop(this.alias, field);
    if (value === null) {
      return { kind: 'nullCheck', subject, negated: false };
    }
    if (isScalar(value) || isScalarList(value)) {
      return { kind: 'comparison', subject, op: '=', param: this.bag.add(value) };
    }
    throw new InvalidFilterShapeError(path, 'equality expects a scalar, a list of scalars or null');
  }

  private operator(field: string, operator: string, value: FilterValue, path: string): Predicate {
    const subject = prop(this.alias, field);

    switch (operator) {
      case 'lt':
      case 'lte':
      case 'gt':
      case 'gte': {
        if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
          return { kind: 'comparison', subject, op: RANGE_OPS[operator], param: this.bag.add(value) };
        }
        throw new InvalidFilterShapeError(path, `${operator} expects a finite number or a string`);
      }
      case 'ne': {
        if (value === null) {
          return { kind: 'nullCheck', subject, negated: true };
        }
        if (!isScalar(value)) {
          throw new InvalidFilterShapeError(path, 'ne expects a scalar or null');
        }
        return { kind: 'comparison', subject, op: '<>', param: this.bag.add(value) };
      }
      case 'in':
      case 'overlap': {
        if (!isScalarList(value)) {
          throw new InvalidFilterShapeError(path, `${operator} expects a list of scalars`);
        }
        const param = this.bag.add(value);
        return operator === 'in'
          ? { kind: 'membership', subject, param }
          : { kind: 'overlap', subject, param };
      }
      case 'contains':
      case 'endswith': {
        if (typeof value !== 'string') {
          throw new InvalidFilterShapeError(path, `${operator} expects a string`);
        }
        const op: ComparisonOp = operator === 'contains' ? 'CONTAINS' : 'ENDS WITH';
        return { kind: 'comparison', subject, op, param: this.bag.add(value) };
      }
      case 'startswith': {
        if (typeof value !== 'string') {
          throw new InvalidFilterShapeError(path, 'startswith expects a string');
        }
        // left() counts code points, not UTF-16 units
        const lengthParam = this.bag.addInteger([...value].length);
        const valueParam = this.bag.add(value);
        return { kind: 'prefix', subject, lengthParam, valueParam };
      }
      default:
        throw new UnsupportedOperatorError(field, operator);
    }
  }
}

/**
 * Compiles a declarative filter expression into a predicate over `alias`.
 *
 * Every literal is bound in `params`; the predicate only references names.
 * Pass the bag of the query the predicate will be used in so that names
 * stay unique across the whole query.
 *
 * @example
 * compileFilter({ salience__gte: 0.8, $or: [{ topic_id: 3 }, { topic_id: 7 }] }, 'm')
 * // predicate: m.salience >= $p0 AND (m.topic_id = $p1 OR m.topic_id = $p2)
 */
export function compileFilter(
  expr: FilterExpression | null | undefined,
  alias: string = 'm',
  params: ParameterBag = new ParameterBag(),
  options: CompileFilterOptions = {},
): CompiledFilter {
  assertIdentifier(alias, 'alias');
  if (expr === null || expr === undefined) {
    return { predicate: TRUE, params };
  }
  const temporal = new Set(options.temporalFields ?? DEFAULT_TEMPORAL_FIELDS);
  const predicate = new FilterCompilation(alias, params, temporal).expression(expr, '');
  return { predicate, params };
}
