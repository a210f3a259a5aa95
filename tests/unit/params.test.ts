import { describe, it, expect } from 'vitest';
import { ParameterBag } from '../../src/query/params.js';
import { BuildError } from '../../src/errors.js';

describe('ParameterBag', () => {
  it('allocates p0, p1, ... in order', () => {
    const bag = new ParameterBag();
    expect(bag.add('a')).toBe('p0');
    expect(bag.add(1)).toBe('p1');
    expect(bag.add(true)).toBe('p2');
    expect(bag.size).toBe(3);
  });

  it('reuses the name of an identical scalar', () => {
    const bag = new ParameterBag();
    expect(bag.add('a')).toBe('p0');
    expect(bag.add('a')).toBe('p0');
    expect(bag.size).toBe(1);
  });

  it('keeps values of different types apart', () => {
    const bag = new ParameterBag();
    expect(bag.add(1)).toBe('p0');
    expect(bag.add('1')).toBe('p1');
  });

  it('allocates a fresh name for every scalar when dedupe is off', () => {
    const bag = new ParameterBag({ dedupe: false });
    expect(bag.add('a')).toBe('p0');
    expect(bag.add('a')).toBe('p1');
  });

  it('always allocates a fresh name for lists', () => {
    const bag = new ParameterBag();
    expect(bag.add([1, 2])).toBe('p0');
    expect(bag.add([1, 2])).toBe('p1');
  });

  it('copies lists so later mutation does not leak in', () => {
    const bag = new ParameterBag();
    const tags = ['a'];
    bag.add(tags);
    tags.push('b');
    expect(bag.get('p0')).toEqual(['a']);
  });

  it('marks integer parameters separately from plain numbers', () => {
    const bag = new ParameterBag();
    expect(bag.addInteger(5)).toBe('p0');
    expect(bag.add(5)).toBe('p1');
    expect(bag.addInteger(5)).toBe('p0');
    expect(bag.integerNames()).toEqual(['p0']);
  });

  it('rejects non-finite numbers', () => {
    const bag = new ParameterBag();
    expect(() => bag.add(Number.NaN)).toThrow(BuildError);
    expect(() => bag.add([1, Number.POSITIVE_INFINITY])).toThrow(BuildError);
  });

  it('rejects non-integer values for addInteger', () => {
    const bag = new ParameterBag();
    expect(() => bag.addInteger(1.5)).toThrow(BuildError);
    expect(bag.size).toBe(0);
  });

  it('has() and get() look values up by name', () => {
    const bag = new ParameterBag();
    bag.add('x');
    expect(bag.has('p0')).toBe(true);
    expect(bag.has('p1')).toBe(false);
    expect(bag.get('p1')).toBeUndefined();
  });

  it('toObject() returns a frozen copy', () => {
    const bag = new ParameterBag();
    bag.add('a');
    bag.add([0.1, 0.2]);
    const params = bag.toObject();
    expect(params).toEqual({ p0: 'a', p1: [0.1, 0.2] });
    expect(Object.isFrozen(params)).toBe(true);
  });

  it('rollback() forgets names allocated after the mark', () => {
    const bag = new ParameterBag();
    bag.add('kept');
    const mark = bag.mark();
    bag.add('dropped');
    bag.addInteger(5);
    bag.rollback(mark);

    expect(bag.toObject()).toEqual({ p0: 'kept' });
    expect(bag.integerNames()).toEqual([]);
    expect(bag.add('dropped')).toBe('p1');
    expect(bag.add('kept')).toBe('p0');
  });
});
