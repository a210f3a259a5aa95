import type { ParamScalar, ParamValue } from '../types.js';
import { BuildError } from '../errors.js';

export function isList(value: ParamValue): value is readonly ParamScalar[] {
  return Array.isArray(value);
}

export interface ParameterBagOptions {
  /** Reuse one name for identical scalar values. Defaults to true. */
  dedupe?: boolean;
}

/**
 * Ordered, uniquely-keyed store for every literal a query references.
 * Names are allocated from a monotonic counter: p0, p1, ...
 */
export class ParameterBag {
  private readonly values = new Map<string, ParamValue>();
  private readonly integers = new Set<string>();
  private readonly scalarIndex = new Map<string, string>();
  private readonly dedupe: boolean;
  private counter = 0;

  constructor(options: ParameterBagOptions = {}) {
    this.dedupe = options.dedupe ?? true;
  }

  get size(): number {
    return this.values.size;
  }

  /** Stores a value and returns the parameter name that references it. */
  add(value: ParamValue): string {
    if (isList(value)) {
      if (value.some((item) => typeof item === 'number' && !Number.isFinite(item))) {
        throw new BuildError('List parameter must not contain non-finite numbers');
      }
      // Lists are copied so later caller mutation cannot change a bound value
      return this.allocate([...value], false);
    }
    return this.addScalar(value, false);
  }

  /** Stores a value that the driver must bind as an integer. */
  addInteger(value: number): string {
    if (!Number.isSafeInteger(value)) {
      throw new BuildError(`Integer parameter must be a safe integer, got ${String(value)}`);
    }
    return this.addScalar(value, true);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): ParamValue | undefined {
    return this.values.get(name);
  }

  /** Position to return to with rollback(). */
  mark(): number {
    return this.counter;
  }

  /** Forgets every name allocated since `mark`; those names are reused. */
  rollback(mark: number): void {
    if (mark >= this.counter) return;
    for (let i = mark; i < this.counter; i++) {
      const name = `p${i}`;
      this.values.delete(name);
      this.integers.delete(name);
    }
    for (const [key, name] of this.scalarIndex) {
      if (!this.values.has(name)) {
        this.scalarIndex.delete(key);
      }
    }
    this.counter = mark;
  }

  integerNames(): string[] {
    return [...this.integers];
  }

  toObject(): Readonly<Record<string, ParamValue>> {
    return Object.freeze(Object.fromEntries(this.values));
  }

  private addScalar(value: ParamScalar, integer: boolean): string {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new BuildError(`Parameter value must be finite, got ${String(value)}`);
    }
    if (!this.dedupe) {
      return this.allocate(value, integer);
    }
    const key = `${typeof value}:${integer ? 'i' : 'v'}:${String(value)}`;
    const existing = this.scalarIndex.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const name = this.allocate(value, integer);
    this.scalarIndex.set(key, name);
    return name;
  }

  private allocate(value: ParamValue, integer: boolean): string {
    const name = `p${this.counter}`;
    this.counter += 1;
    this.values.set(name, value);
    if (integer) {
      this.integers.add(name);
    }
    return name;
  }
}
