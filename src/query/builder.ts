import type { FilterExpression, ParamScalar, ParamValue, QueryPlan } from '../types.js';
import { AlreadyFinalizedError, BuildError, EmptyQueryError, InvalidPaginationError } from '../errors.js';
import { KEYWORD_KIND, transition, type ClauseKeyword, type QueryState } from './clause-state.js';
import { assertIdentifier, param, parsePath, renderExpression, type Expression } from './expression.js';
import { compileFilter, type CompileFilterOptions } from './filter-compiler.js';
import { ParameterBag } from './params.js';
import { renderPattern, type PatternInput } from './pattern.js';
import { and, or, renderPredicate, type Predicate } from './predicate.js';

export interface ProjectionItem {
  expr: Expression | string;
  as?: string;
}

/** `'m'`, `'m.content'`, `'*'`, an expression, or an aliased item. */
export type ProjectionInput = string | Expression | ProjectionItem;

export type SortDirection = 'ASC' | 'DESC';

export interface OrderKey {
  expr: Expression | string;
  direction?: SortDirection;
  /** How cursor values for this key are bound when paginating by cursor. */
  cast?: 'datetime';
}

export interface PageWindow {
  skip?: number;
  limit?: number;
}

interface Clause {
  keyword: ClauseKeyword;
  text: string;
  /** Kept for WHERE clauses so andWhere()/orWhere() can extend them. */
  predicate?: Predicate;
}

function isProjectionItem(input: ProjectionInput): input is ProjectionItem {
  return typeof input === 'object' && 'expr' in input;
}

export function toExpression(input: Expression | string): Expression {
  return typeof input === 'string' ? parsePath(input) : input;
}

function renderItem(input: ProjectionInput): string {
  if (isProjectionItem(input)) {
    const text = renderExpression(toExpression(input.expr));
    return input.as !== undefined ? `${text} AS ${assertIdentifier(input.as, 'alias')}` : text;
  }
  return renderExpression(toExpression(input));
}

function isScalarList(value: readonly ParamScalar[] | Expression): value is readonly ParamScalar[] {
  return Array.isArray(value);
}

function isExpression(value: ParamValue | Expression): value is Expression {
  return typeof value === 'object' && !Array.isArray(value);
}

export function renderOrderKey(key: OrderKey): string {
  return `${renderExpression(toExpression(key.expr))} ${key.direction ?? 'ASC'}`;
}

/**
 * Mutable, single-use Cypher builder. Every clause method validates the
 * clause order, renders a template whose only variable parts are checked
 * identifiers and parameter references, and returns `this`.
 *
 * @example
 * const plan = cypher
 *   .match({ alias: 'm', labels: 'Memory' })
 *   .whereFilter({ salience__gte: 0.5 })
 *   .return(['m'])
 *   .orderBy([{ expr: 'm.timestamp', direction: 'DESC' }])
 *   .paginate({ skip: 0, limit: 20 })
 *   .build();
 */
export class CypherQueryBuilder {
  readonly params: ParameterBag;
  private readonly clauses: Clause[] = [];
  private current: QueryState = 'initial';
  private finalized = false;

  constructor(params: ParameterBag = new ParameterBag()) {
    this.params = params;
  }

  get state(): QueryState {
    return this.current;
  }

  get keywords(): ClauseKeyword[] {
    return this.clauses.map((c) => c.keyword);
  }

  /** Binds a value and returns a reference to it for use in expressions. */
  bind(value: ParamValue): Expression {
    this.ensureOpen('bind');
    return param(this.params.add(value));
  }

  /** Binds a value the driver must send as an integer. */
  bindInteger(value: number): Expression {
    this.ensureOpen('bindInteger');
    return param(this.params.addInteger(value));
  }

  // -------------------------------------------------------------------------
  // Retrieval
  // -------------------------------------------------------------------------

  match(pattern: PatternInput): this {
    return this.emit('MATCH', () => `MATCH ${renderPattern(pattern, this.params)}`);
  }

  optionalMatch(pattern: PatternInput): this {
    return this.emit('OPTIONAL MATCH', () => `OPTIONAL MATCH ${renderPattern(pattern, this.params)}`);
  }

  /**
   * `CALL proc(args) YIELD col AS alias, ...`. `yields` maps each yielded
   * column to the variable it is bound to.
   */
  call(procedure: string, args: readonly Expression[], yields: Readonly<Record<string, string>> = {}): this {
    return this.emit('CALL', () => {
      const name = procedure.split('.').map((part) => assertIdentifier(part, 'procedure name')).join('.');
      const argText = args.map(renderExpression).join(', ');
      const yieldItems = Object.entries(yields).map(([column, alias]) => {
        assertIdentifier(column, 'yield column');
        assertIdentifier(alias, 'alias');
        return column === alias ? column : `${column} AS ${alias}`;
      });
      const yieldText = yieldItems.length > 0 ? ` YIELD ${yieldItems.join(', ')}` : '';
      return `CALL ${name}(${argText})${yieldText}`;
    });
  }

  unwind(values: readonly ParamScalar[] | Expression, as: string): this {
    return this.emit('UNWIND', () => {
      const source = isScalarList(values) ? param(this.params.add(values)) : values;
      return `UNWIND ${renderExpression(source)} AS ${assertIdentifier(as, 'alias')}`;
    });
  }

  // -------------------------------------------------------------------------
  // Filtering
  // -------------------------------------------------------------------------

  where(predicate: Predicate): this {
    return this.emit('WHERE', () => `WHERE ${renderPredicate(predicate)}`, predicate);
  }

  /** Compiles `expr` against this query's parameter bag and emits WHERE. */
  whereFilter(
    expr: FilterExpression | null | undefined,
    alias: string = 'm',
    options: CompileFilterOptions = {},
  ): this {
    this.ensureOpen('whereFilter');
    // Rejected before anything is bound
    transition(this.current, 'filtering');
    return this.atomically(() => {
      const { predicate } = compileFilter(expr, alias, this.params, options);
      return this.where(predicate);
    });
  }

  /** ANDs into the WHERE clause emitted just before, or starts a new one. */
  andWhere(predicate: Predicate): this {
    return this.extendWhere(predicate, and, 'andWhere');
  }

  /** ORs into the WHERE clause emitted just before, or starts a new one. */
  orWhere(predicate: Predicate): this {
    return this.extendWhere(predicate, or, 'orWhere');
  }

  // -------------------------------------------------------------------------
  // Projection
  // -------------------------------------------------------------------------

  with(items: readonly ProjectionInput[], options: { distinct?: boolean } = {}): this {
    return this.emit('WITH', () => `WITH ${options.distinct === true ? 'DISTINCT ' : ''}${this.items(items)}`);
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  create(pattern: PatternInput): this {
    return this.emit('CREATE', () => `CREATE ${renderPattern(pattern, this.params)}`);
  }

  merge(pattern: PatternInput): this {
    return this.emit('MERGE', () => `MERGE ${renderPattern(pattern, this.params)}`);
  }

  /** `SET a.k1 = $p, a.k2 = datetime()`; plain values are bound, expressions are rendered. */
  setProperties(alias: string, properties: Readonly<Record<string, ParamValue | Expression>>): this {
    return this.emit('SET', () => {
      const target = assertIdentifier(alias, 'alias');
      const assignments = Object.entries(properties).map(([field, value]) => {
        const rhs = isExpression(value) ? value : param(this.params.add(value));
        return `${target}.${assertIdentifier(field, 'property')} = ${renderExpression(rhs)}`;
      });
      if (assignments.length === 0) {
        throw new BuildError('SET needs at least one property');
      }
      return `SET ${assignments.join(', ')}`;
    });
  }

  setProperty(alias: string, field: string, value: ParamValue | Expression): this {
    return this.setProperties(alias, { [field]: value });
  }

  remove(alias: string, field: string): this {
    return this.emit('REMOVE', () =>
      `REMOVE ${assertIdentifier(alias, 'alias')}.${assertIdentifier(field, 'property')}`);
  }

  delete(alias: string, options: { detach?: boolean } = {}): this {
    const keyword: ClauseKeyword = options.detach === true ? 'DETACH DELETE' : 'DELETE';
    return this.emit(keyword, () => `${keyword} ${assertIdentifier(alias, 'alias')}`);
  }

  // -------------------------------------------------------------------------
  // Return, ordering, paging
  // -------------------------------------------------------------------------

  return(items: readonly ProjectionInput[], options: { distinct?: boolean } = {}): this {
    return this.emit('RETURN', () => `RETURN ${options.distinct === true ? 'DISTINCT ' : ''}${this.items(items)}`);
  }

  orderBy(keys: readonly OrderKey[]): this {
    return this.emit('ORDER BY', () => {
      if (keys.length === 0) {
        throw new InvalidPaginationError('orderBy', 'needs at least one key');
      }
      return `ORDER BY ${keys.map(renderOrderKey).join(', ')}`;
    });
  }

  /** `SKIP $a LIMIT $b`, both bound as integers. */
  paginate(window: PageWindow): this {
    return this.emit('SKIP/LIMIT', () => {
      const { skip, limit } = window;
      if (skip === undefined && limit === undefined) {
        throw new InvalidPaginationError('window', 'needs skip or limit');
      }
      if (skip !== undefined && (!Number.isSafeInteger(skip) || skip < 0)) {
        throw new InvalidPaginationError('skip', `must be a non-negative integer, got ${String(skip)}`);
      }
      if (limit !== undefined && (!Number.isSafeInteger(limit) || limit <= 0)) {
        throw new InvalidPaginationError('limit', `must be a positive integer, got ${String(limit)}`);
      }
      const parts: string[] = [];
      if (skip !== undefined) parts.push(`SKIP $${this.params.addInteger(skip)}`);
      if (limit !== undefined) parts.push(`LIMIT $${this.params.addInteger(limit)}`);
      return parts.join(' ');
    });
  }

  limit(count: number): this {
    return this.paginate({ limit: count });
  }

  // -------------------------------------------------------------------------
  // Finalization
  // -------------------------------------------------------------------------

  build(): QueryPlan {
    this.ensureOpen('build');
    if (this.clauses.length === 0) {
      throw new EmptyQueryError();
    }
    this.current = transition(this.current, 'terminal');
    this.finalized = true;

    const mode = this.clauses.some((c) => KEYWORD_KIND[c.keyword] === 'mutation') ? 'write' : 'read';
    return Object.freeze({
      text: this.clauses.map((c) => c.text).join('\n'),
      params: this.params.toObject(),
      integerParams: Object.freeze(this.params.integerNames()),
      mode,
    });
  }

  private emit(keyword: ClauseKeyword, render: () => string, predicate?: Predicate): this {
    this.ensureOpen(keyword);
    const next = transition(this.current, KEYWORD_KIND[keyword]);
    const text = this.atomically(render);
    this.clauses.push(predicate !== undefined ? { keyword, text, predicate } : { keyword, text });
    this.current = next;
    return this;
  }

  /** Runs `fn`, dropping every parameter it bound if it throws. */
  private atomically<T>(fn: () => T): T {
    const mark = this.params.mark();
    try {
      return fn();
    } catch (err) {
      this.params.rollback(mark);
      throw err;
    }
  }

  private extendWhere(
    predicate: Predicate,
    combine: (...parts: Predicate[]) => Predicate,
    operation: string,
  ): this {
    this.ensureOpen(operation);
    const last = this.clauses[this.clauses.length - 1];
    if (last === undefined || last.keyword !== 'WHERE' || last.predicate === undefined) {
      return this.where(predicate);
    }
    const merged = combine(last.predicate, predicate);
    this.clauses[this.clauses.length - 1] = {
      keyword: 'WHERE',
      text: `WHERE ${renderPredicate(merged)}`,
      predicate: merged,
    };
    return this;
  }

  private items(items: readonly ProjectionInput[]): string {
    if (items.length === 0) {
      throw new BuildError('A projection needs at least one item');
    }
    return items.map(renderItem).join(', ');
  }

  private ensureOpen(operation: string): void {
    if (this.finalized) {
      throw new AlreadyFinalizedError(operation);
    }
  }
}
