import { assertIdentifier, renderExpression, type Expression } from './expression.js';

export type ComparisonOp = '=' | '<>' | '<' | '<=' | '>' | '>=' | 'CONTAINS' | 'ENDS WITH';

export type GroupOp = 'AND' | 'OR';

/**
 * Compiled filter tree. Nodes reference values only by parameter name;
 * `subject` is always a variable or property expression.
 */
export type Predicate =
  | {
      kind: 'comparison';
      subject: Expression;
      op: ComparisonOp;
      param: string;
      /** Wraps the bound value before comparing, e.g. `datetime($p3)`. */
      cast?: 'datetime';
    }
  | { kind: 'membership'; subject: Expression; param: string }
  | { kind: 'overlap'; subject: Expression; param: string }
  | { kind: 'prefix'; subject: Expression; lengthParam: string; valueParam: string }
  | { kind: 'nullCheck'; subject: Expression; negated: boolean }
  | { kind: 'hasLabels'; alias: string; labels: readonly string[] }
  | { kind: 'group'; op: GroupOp; children: readonly Predicate[] }
  | { kind: 'constant'; value: boolean };

export const TRUE: Predicate = { kind: 'constant', value: true };
export const FALSE: Predicate = { kind: 'constant', value: false };

function combine(op: GroupOp, parts: readonly Predicate[]): Predicate {
  const identity = op === 'AND';
  const children: Predicate[] = [];

  for (const part of parts) {
    if (part.kind === 'constant') {
      if (part.value === identity) continue;
      // Absorbing element: false under AND, true under OR
      return part;
    }
    if (part.kind === 'group' && part.op === op) {
      // Flat accumulation: same-operator groups are merged
      children.push(...part.children);
    } else {
      children.push(part);
    }
  }

  if (children.length === 0) return identity ? TRUE : FALSE;
  if (children.length === 1) return children[0] ?? TRUE;
  return { kind: 'group', op, children };
}

/** Conjunction. `and()` is `true`; `false` operands absorb the rest. */
export function and(...parts: Predicate[]): Predicate {
  return combine('AND', parts);
}

/** Disjunction. `or()` is `false`; `true` operands absorb the rest. */
export function or(...parts: Predicate[]): Predicate {
  return combine('OR', parts);
}

/** `alias:A:B`; every label is checked as an identifier. */
export function hasLabels(alias: string, labels: readonly string[]): Predicate {
  if (labels.length === 0) return TRUE;
  return {
    kind: 'hasLabels',
    alias: assertIdentifier(alias, 'alias'),
    labels: labels.map((l) => assertIdentifier(l, 'label')),
  };
}

export function isTrue(p: Predicate): boolean {
  return p.kind === 'constant' && p.value;
}

function renderNode(p: Predicate, nested: boolean): string {
  switch (p.kind) {
    case 'constant':
      return p.value ? 'true' : 'false';
    case 'comparison': {
      const ref = p.cast === 'datetime' ? `datetime($${p.param})` : `$${p.param}`;
      return `${renderExpression(p.subject)} ${p.op} ${ref}`;
    }
    case 'membership':
      return `${renderExpression(p.subject)} IN $${p.param}`;
    case 'overlap':
      return `ANY(x IN $${p.param} WHERE x IN ${renderExpression(p.subject)})`;
    case 'prefix':
      return `left(${renderExpression(p.subject)}, $${p.lengthParam}) = $${p.valueParam}`;
    case 'nullCheck':
      return `${renderExpression(p.subject)} IS ${p.negated ? 'NOT NULL' : 'NULL'}`;
    case 'hasLabels':
      return `${p.alias}:${p.labels.join(':')}`;
    case 'group': {
      if (p.children.length === 0) return p.op === 'AND' ? 'true' : 'false';
      const body = p.children.map((c) => renderNode(c, true)).join(` ${p.op} `);
      return nested && p.children.length > 1 ? `(${body})` : body;
    }
  }
}

/** Renders a predicate as WHERE-clause text (without the keyword). */
export function renderPredicate(p: Predicate): string {
  return renderNode(p, false);
}

/** Every parameter name the predicate references, in render order. */
export function predicateParams(p: Predicate): string[] {
  switch (p.kind) {
    case 'constant':
    case 'nullCheck':
    case 'hasLabels':
      return [];
    case 'comparison':
    case 'membership':
    case 'overlap':
      return [p.param];
    case 'prefix':
      return [p.lengthParam, p.valueParam];
    case 'group':
      return p.children.flatMap(predicateParams);
  }
}
