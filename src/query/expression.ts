import { BuildError, InvalidIdentifierError } from '../errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Throws unless `name` is a plain Cypher identifier. Identifiers are the only
 * caller-influenced text that reaches a query; values always go through params.
 */
export function assertIdentifier(name: string, role: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new InvalidIdentifierError(name, role);
  }
  return name;
}

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export type FunctionName =
  | 'count'
  | 'collect'
  | 'avg'
  | 'sum'
  | 'min'
  | 'max'
  | 'size'
  | 'coalesce'
  | 'labels'
  | 'type'
  | 'elementId'
  | 'datetime';

export type ArithmeticOp = '+' | '-' | '*' | '/';

export type Expression =
  | { kind: 'ref'; name: string }
  | { kind: 'property'; alias: string; field: string }
  | { kind: 'param'; name: string }
  | { kind: 'call'; fn: FunctionName; args: readonly Expression[]; distinct: boolean }
  | { kind: 'innerProduct'; left: Expression; right: Expression }
  | { kind: 'number'; value: number }
  | { kind: 'arithmetic'; op: ArithmeticOp; left: Expression; right: Expression }
  | { kind: 'all' };

export function ref(name: string): Expression {
  return { kind: 'ref', name: assertIdentifier(name, 'variable') };
}

export function prop(alias: string, field: string): Expression {
  return {
    kind: 'property',
    alias: assertIdentifier(alias, 'alias'),
    field: assertIdentifier(field, 'property'),
  };
}

export function param(name: string): Expression {
  return { kind: 'param', name: assertIdentifier(name, 'parameter') };
}

export function call(fn: FunctionName, ...args: Expression[]): Expression {
  return { kind: 'call', fn, args, distinct: false };
}

export function countOf(arg: Expression, options: { distinct?: boolean } = {}): Expression {
  return { kind: 'call', fn: 'count', args: [arg], distinct: options.distinct ?? false };
}

/** Dot product of two equal-length numeric lists, computed in-query. */
export function innerProduct(left: Expression, right: Expression): Expression {
  return { kind: 'innerProduct', left, right };
}

/** Numeric constant written into the text. Caller-supplied values belong in params. */
export function num(value: number): Expression {
  if (!Number.isFinite(value)) {
    throw new BuildError(`Numeric constant must be finite, got ${String(value)}`);
  }
  return { kind: 'number', value };
}

export function arithmetic(left: Expression, op: ArithmeticOp, right: Expression): Expression {
  return { kind: 'arithmetic', op, left, right };
}

/**
 * Inner product of unit vectors rescaled to the score a cosine vector index
 * reports: `(1 + dot) / 2`.
 */
export function cosineScore(left: Expression, right: Expression): Expression {
  return arithmetic(arithmetic(num(1), '+', innerProduct(left, right)), '/', num(2));
}

/**
 * Parses the shorthand accepted wherever an expression is expected:
 * `*`, `alias` or `alias.field`.
 */
export function parsePath(path: string): Expression {
  if (path === '*') return { kind: 'all' };
  const parts = path.split('.');
  if (parts.length === 1) return ref(path);
  if (parts.length === 2) {
    const [alias = '', field = ''] = parts;
    return prop(alias, field);
  }
  throw new InvalidIdentifierError(path, 'expression path');
}

export function renderExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'ref':
      return expr.name;
    case 'property':
      return `${expr.alias}.${expr.field}`;
    case 'param':
      return `$${expr.name}`;
    case 'all':
      return '*';
    case 'call': {
      const args = expr.args.map(renderExpression).join(', ');
      return `${expr.fn}(${expr.distinct ? 'DISTINCT ' : ''}${args})`;
    }
    case 'innerProduct': {
      const left = renderExpression(expr.left);
      const right = renderExpression(expr.right);
      return `reduce(dot = 0.0, i IN range(0, size(${left}) - 1) | dot + ${left}[i] * ${right}[i])`;
    }
    case 'number':
      return String(expr.value);
    case 'arithmetic':
      return `${operand(expr.left)} ${expr.op} ${operand(expr.right)}`;
  }
}

function operand(expr: Expression): string {
  return expr.kind === 'arithmetic' ? `(${renderExpression(expr)})` : renderExpression(expr);
}
