import { describe, it, expect } from 'vitest';
import { compileFilter } from '../../src/query/filter-compiler.js';
import { ParameterBag } from '../../src/query/params.js';
import { FALSE, renderPredicate, TRUE } from '../../src/query/predicate.js';
import {
  FilterError,
  InvalidFilterShapeError,
  InvalidIdentifierError,
  UnsupportedOperatorError,
} from '../../src/errors.js';
import type { FilterExpression } from '../../src/types.js';

function compile(expr: FilterExpression, alias = 'm') {
  const { predicate, params } = compileFilter(expr, alias);
  return { text: renderPredicate(predicate), params: params.toObject(), predicate, bag: params };
}

describe('compileFilter()', () => {
  it('combines a range condition with an OR group', () => {
    const { text, params, predicate } = compile({
      salience__gte: 0.8,
      $or: [{ topic_id: 3 }, { topic_id: 7 }],
    });
    expect(text).toBe('m.salience >= $p0 AND (m.topic_id = $p1 OR m.topic_id = $p2)');
    expect(params).toEqual({ p0: 0.8, p1: 3, p2: 7 });
    expect(predicate.kind).toBe('group');
  });

  it('compiles overlap to a single node with one list parameter', () => {
    const { text, params, predicate } = compile({ tags__overlap: ['a', 'b'] });
    expect(predicate).toEqual({
      kind: 'overlap',
      subject: { kind: 'property', alias: 'm', field: 'tags' },
      param: 'p0',
    });
    expect(params).toEqual({ p0: ['a', 'b'] });
    expect(text).toBe('ANY(x IN $p0 WHERE x IN m.tags)');
  });

  it('compiles absent and empty expressions to true', () => {
    expect(compileFilter(null).predicate).toEqual(TRUE);
    expect(compileFilter(undefined).predicate).toEqual(TRUE);
    expect(compileFilter({}).predicate).toEqual(TRUE);
  });

  it('compiles empty groups to their identity element', () => {
    expect(compileFilter({ $and: [] }).predicate).toEqual(TRUE);
    expect(compileFilter({ $or: [] }).predicate).toEqual(FALSE);
  });

  it('a one-member $and is the member itself', () => {
    expect(compile({ $and: [{ a: 1 }] }).text).toBe(compile({ a: 1 }).text);
  });

  it('ANDs sibling keys in key order', () => {
    expect(compile({ b: 1, a: 2 }).text).toBe('m.b = $p0 AND m.a = $p1');
  });

  it('equality with null is IS NULL', () => {
    const { text, params } = compile({ topic_id: null });
    expect(text).toBe('m.topic_id IS NULL');
    expect(params).toEqual({});
  });

  it('ne handles null and scalars', () => {
    expect(compile({ topic_id__ne: null }).text).toBe('m.topic_id IS NOT NULL');
    expect(compile({ status__ne: 'done' }).text).toBe('m.status <> $p0');
  });

  it('maps range operators', () => {
    expect(compile({ age__lt: 5, age__lte: 6, age__gt: 1 }).text)
      .toBe('m.age < $p0 AND m.age <= $p1 AND m.age > $p2');
  });

  it('accepts strings for range operators', () => {
    const { text, params } = compile({ title__gte: 'b' });
    expect(text).toBe('m.title >= $p0');
    expect(params).toEqual({ p0: 'b' });
  });

  describe('temporal fields', () => {
    it('compares timestamps through datetime()', () => {
      const { text, params } = compile({ timestamp__gte: '2024-01-01T00:00:00Z', timestamp__lt: '2024-02-01T00:00:00Z' });
      expect(text).toBe('m.timestamp >= datetime($p0) AND m.timestamp < datetime($p1)');
      expect(params).toEqual({ p0: '2024-01-01T00:00:00Z', p1: '2024-02-01T00:00:00Z' });
    });

    it('casts equality and ne, and keeps null checks', () => {
      expect(compile({ timestamp: '2024-01-01T00:00:00Z' }).text).toBe('m.timestamp = datetime($p0)');
      expect(compile({ timestamp__ne: '2024-01-01T00:00:00Z' }).text).toBe('m.timestamp <> datetime($p0)');
      expect(compile({ timestamp: null }).text).toBe('m.timestamp IS NULL');
      expect(compile({ timestamp__ne: null }).text).toBe('m.timestamp IS NOT NULL');
    });

    it('honours configured temporal fields', () => {
      const { predicate } = compileFilter({ created_at__gt: '2024-01-01T00:00:00Z', timestamp__gt: 'x' }, 'm', new ParameterBag(), {
        temporalFields: ['created_at'],
      });
      expect(renderPredicate(predicate)).toBe('m.created_at > datetime($p0) AND m.timestamp > $p1');
    });

    it('rejects values and operators that cannot compare with a datetime', () => {
      expect(() => compile({ timestamp__gte: 1714521600 })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ timestamp__in: ['2024-01-01T00:00:00Z'] })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ timestamp__contains: '2024' })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ timestamp__regex: '2024' })).toThrow(UnsupportedOperatorError);
    });
  });

  it('compiles in to membership', () => {
    const { text, params } = compile({ topic_id__in: [1, 2] });
    expect(text).toBe('m.topic_id IN $p0');
    expect(params).toEqual({ p0: [1, 2] });
  });

  it('compiles contains and endswith', () => {
    expect(compile({ content__contains: 'rain' }).text).toBe('m.content CONTAINS $p0');
    expect(compile({ name__endswith: '.md' }).text).toBe('m.name ENDS WITH $p0');
  });

  it('binds the prefix length as an integer before the prefix', () => {
    const { text, params, bag } = compile({ name__startswith: 'ab' });
    expect(text).toBe('left(m.name, $p0) = $p1');
    expect(params).toEqual({ p0: 2, p1: 'ab' });
    expect(bag.integerNames()).toEqual(['p0']);
  });

  it('counts the prefix length in code points', () => {
    const { params } = compile({ name__startswith: '\u{1F600}a' });
    expect(params).toEqual({ p0: 2, p1: '\u{1F600}a' });
  });

  it('treats a list value without operator as equality', () => {
    expect(compile({ tags: ['a'] }).text).toBe('m.tags = $p0');
  });

  it('uses the given alias', () => {
    expect(compile({ a: 1 }, 'node').text).toBe('node.a = $p0');
  });

  it('allocates after names already in a shared bag', () => {
    const bag = new ParameterBag();
    bag.add('pre');
    const { predicate } = compileFilter({ a: 1 }, 'm', bag);
    expect(renderPredicate(predicate)).toBe('m.a = $p1');
  });

  it('shares one name between identical scalars', () => {
    const { text, params } = compile({ $or: [{ topic_id: 3 }, { topic_id: 3 }] });
    expect(text).toBe('m.topic_id = $p0 OR m.topic_id = $p0');
    expect(params).toEqual({ p0: 3 });
  });

  describe('injection safety', () => {
    it('never puts values into the text', () => {
      const hostile = "x' OR 1=1 MATCH (n) DETACH DELETE n //";
      const { text, params } = compile({ content: hostile });
      expect(text).toBe('m.content = $p0');
      expect(params).toEqual({ p0: hostile });
    });

    it('rejects field names that are not identifiers', () => {
      expect(() => compile({ 'a) OR (1=1': 1 })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ 'bad field': 1 })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ __lt: 1 })).toThrow(InvalidFilterShapeError);
    });

    it('rejects aliases that are not identifiers', () => {
      expect(() => compileFilter({ a: 1 }, 'm; DROP')).toThrow(InvalidIdentifierError);
    });
  });

  describe('errors', () => {
    it('rejects unknown operators', () => {
      try {
        compile({ name__regex: '.*' });
        expect.fail('expected UnsupportedOperatorError');
      } catch (err) {
        expect(err).toBeInstanceOf(UnsupportedOperatorError);
        expect(err).toBeInstanceOf(FilterError);
        const e = err as UnsupportedOperatorError;
        expect(e.field).toBe('name');
        expect(e.operator).toBe('regex');
        expect(e.kind).toBe('UnsupportedOperator');
      }
    });

    it('splits the key at the first separator only', () => {
      expect(() => compile({ a__b__c: 1 })).toThrow(UnsupportedOperatorError);
    });

    it('rejects unknown $ keys', () => {
      try {
        compile({ $not: [{ a: 1 }] });
        expect.fail('expected UnsupportedOperatorError');
      } catch (err) {
        expect(err).toBeInstanceOf(UnsupportedOperatorError);
        expect((err as UnsupportedOperatorError).operator).toBe('$not');
      }
    });

    it('rejects a group that is not a list', () => {
      try {
        compile({ $or: { a: 1 } });
        expect.fail('expected InvalidFilterShapeError');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidFilterShapeError);
        expect((err as InvalidFilterShapeError).path).toBe('$or');
      }
    });

    it('reports the path of a bad group member', () => {
      try {
        compile({ $or: [1] });
        expect.fail('expected InvalidFilterShapeError');
      } catch (err) {
        expect((err as InvalidFilterShapeError).path).toBe('$or[0]');
      }
    });

    it('reports the path of a bad nested condition', () => {
      try {
        compile({ $or: [{ a: 1 }, { b__in: 'x' }] });
        expect.fail('expected InvalidFilterShapeError');
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidFilterShapeError);
        expect((err as InvalidFilterShapeError).path).toBe('$or[1].b__in');
        expect((err as InvalidFilterShapeError).kind).toBe('InvalidShape');
      }
    });

    it('rejects a top-level value that is not an object', () => {
      try {
        compileFilter([] as unknown as FilterExpression);
        expect.fail('expected InvalidFilterShapeError');
      } catch (err) {
        expect((err as InvalidFilterShapeError).path).toBe('$');
      }
    });

    it('rejects values of the wrong type for the operator', () => {
      expect(() => compile({ a: { b: 1 } })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ age__lt: null })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ age__gt: Number.NaN })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ age__gte: true })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ x__in: [1, null] })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ tags__overlap: 'a' })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ content__contains: 3 })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ name__startswith: ['a'] })).toThrow(InvalidFilterShapeError);
      expect(() => compile({ status__ne: ['a'] })).toThrow(InvalidFilterShapeError);
    });
  });
});
