import { describe, it, expect } from 'vitest';
import neo4j from 'neo4j-driver';
import { mapRecord, mapValue } from '../../src/store/record-mapper.js';

describe('mapValue()', () => {
  it('turns integers into numbers', () => {
    expect(mapValue(neo4j.int(42))).toBe(42);
  });

  it('keeps integers outside the safe range exact', () => {
    expect(mapValue(neo4j.int('9007199254740993'))).toBe(9007199254740993n);
  });

  it('maps nodes and relationships to their properties', () => {
    const node = new neo4j.types.Node(neo4j.int(1), ['Memory'], { id: 'a', tags: ['x'] }, 'e1');
    const rel = new neo4j.types.Relationship(neo4j.int(2), neo4j.int(1), neo4j.int(3), 'RELATES_TO', {
      weight: neo4j.int(1),
    });
    expect(mapValue(node)).toEqual({ id: 'a', tags: ['x'] });
    expect(mapValue(rel)).toEqual({ weight: 1 });
  });

  it('maps paths to their nodes in order', () => {
    const a = new neo4j.types.Node(neo4j.int(1), ['Memory'], { id: 'a' });
    const b = new neo4j.types.Node(neo4j.int(2), ['Memory'], { id: 'b' });
    const c = new neo4j.types.Node(neo4j.int(3), ['Memory'], { id: 'c' });
    const ab = new neo4j.types.Relationship(neo4j.int(10), neo4j.int(1), neo4j.int(2), 'R', {});
    const bc = new neo4j.types.Relationship(neo4j.int(11), neo4j.int(2), neo4j.int(3), 'R', {});
    const path = new neo4j.types.Path(a, c, [
      new neo4j.types.PathSegment(a, ab, b),
      new neo4j.types.PathSegment(b, bc, c),
    ]);
    expect(mapValue(path)).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
  });

  it('renders temporal values as ISO strings', () => {
    expect(mapValue(new neo4j.types.Date(2024, 5, 1))).toBe('2024-05-01');
  });

  it('maps points', () => {
    expect(mapValue(new neo4j.types.Point(neo4j.int(7203), 1, 2))).toEqual({ srid: 7203, x: 1, y: 2 });
  });

  it('recurses into lists and maps', () => {
    expect(mapValue({ a: [neo4j.int(1), null], b: { c: neo4j.int(2) } })).toEqual({ a: [1, null], b: { c: 2 } });
  });

  it('passes plain values through and nulls undefined', () => {
    expect(mapValue('x')).toBe('x');
    expect(mapValue(0.5)).toBe(0.5);
    expect(mapValue(undefined)).toBeNull();
  });
});

describe('mapRecord()', () => {
  it('maps every column', () => {
    const record = new neo4j.types.Record(['count', 'name'], [neo4j.int(7), 'memory_embeddings']);
    expect(mapRecord(record)).toEqual({ count: 7, name: 'memory_embeddings' });
  });
});
