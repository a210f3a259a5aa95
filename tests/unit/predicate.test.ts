import { describe, it, expect } from 'vitest';
import { prop } from '../../src/query/expression.js';
import {
  and,
  FALSE,
  hasLabels,
  isTrue,
  or,
  predicateParams,
  renderPredicate,
  TRUE,
  type Predicate,
} from '../../src/query/predicate.js';
import { InvalidIdentifierError } from '../../src/errors.js';

const eq = (field: string, param: string): Predicate => ({
  kind: 'comparison',
  subject: prop('m', field),
  op: '=',
  param,
});

const a = eq('a', 'p0');
const b = eq('b', 'p1');
const c = eq('c', 'p2');

describe('and() / or()', () => {
  it('empty AND is true and empty OR is false', () => {
    expect(and()).toEqual(TRUE);
    expect(or()).toEqual(FALSE);
  });

  it('drops identity elements', () => {
    expect(and(TRUE, a)).toBe(a);
    expect(or(FALSE, a)).toBe(a);
  });

  it('short-circuits on the absorbing element', () => {
    expect(and(a, FALSE, b)).toEqual(FALSE);
    expect(or(a, TRUE, b)).toEqual(TRUE);
  });

  it('unwraps a single child', () => {
    expect(and(a)).toBe(a);
    expect(or(a)).toBe(a);
  });

  it('flattens nested groups of the same operator', () => {
    expect(and(a, and(b, c))).toEqual({ kind: 'group', op: 'AND', children: [a, b, c] });
  });

  it('keeps groups of the other operator nested', () => {
    const p = and(a, or(b, c));
    expect(p).toEqual({
      kind: 'group',
      op: 'AND',
      children: [a, { kind: 'group', op: 'OR', children: [b, c] }],
    });
  });

  it('isTrue() only matches the true constant', () => {
    expect(isTrue(TRUE)).toBe(true);
    expect(isTrue(FALSE)).toBe(false);
    expect(isTrue(a)).toBe(false);
  });
});

describe('renderPredicate()', () => {
  it('parenthesises nested groups only', () => {
    expect(renderPredicate(and(a, or(b, c)))).toBe('m.a = $p0 AND (m.b = $p1 OR m.c = $p2)');
    expect(renderPredicate(or(a, b))).toBe('m.a = $p0 OR m.b = $p1');
  });

  it('renders constants', () => {
    expect(renderPredicate(TRUE)).toBe('true');
    expect(renderPredicate(FALSE)).toBe('false');
  });

  it('renders membership and overlap', () => {
    expect(renderPredicate({ kind: 'membership', subject: prop('m', 'topic_id'), param: 'p0' }))
      .toBe('m.topic_id IN $p0');
    expect(renderPredicate({ kind: 'overlap', subject: prop('m', 'tags'), param: 'p0' }))
      .toBe('ANY(x IN $p0 WHERE x IN m.tags)');
  });

  it('renders prefix checks with a bound length', () => {
    expect(renderPredicate({ kind: 'prefix', subject: prop('m', 'name'), lengthParam: 'p0', valueParam: 'p1' }))
      .toBe('left(m.name, $p0) = $p1');
  });

  it('renders null checks', () => {
    expect(renderPredicate({ kind: 'nullCheck', subject: prop('m', 'topic_id'), negated: false }))
      .toBe('m.topic_id IS NULL');
    expect(renderPredicate({ kind: 'nullCheck', subject: prop('m', 'topic_id'), negated: true }))
      .toBe('m.topic_id IS NOT NULL');
  });

  it('wraps cast comparisons in datetime()', () => {
    expect(renderPredicate({
      kind: 'comparison',
      subject: prop('m', 'timestamp'),
      op: '<',
      param: 'p0',
      cast: 'datetime',
    })).toBe('m.timestamp < datetime($p0)');
  });

  it('renders label tests', () => {
    expect(renderPredicate(hasLabels('m', ['Episodic', 'Pinned']))).toBe('m:Episodic:Pinned');
  });
});

describe('hasLabels()', () => {
  it('is true for an empty label list', () => {
    expect(hasLabels('m', [])).toEqual(TRUE);
  });

  it('rejects labels that are not identifiers', () => {
    expect(() => hasLabels('m', ['Memory) DETACH DELETE (x'])).toThrow(InvalidIdentifierError);
  });
});

describe('predicateParams()', () => {
  it('lists referenced names in render order', () => {
    const p = and(a, { kind: 'prefix', subject: prop('m', 'name'), lengthParam: 'p3', valueParam: 'p4' });
    expect(predicateParams(p)).toEqual(['p0', 'p3', 'p4']);
  });

  it('is empty for constants, null checks and label tests', () => {
    expect(predicateParams(TRUE)).toEqual([]);
    expect(predicateParams({ kind: 'nullCheck', subject: prop('m', 'a'), negated: true })).toEqual([]);
    expect(predicateParams(hasLabels('m', ['Pinned']))).toEqual([]);
  });
});
