import type { ParamValue } from '../types.js';
import { BuildError } from '../errors.js';
import { assertIdentifier } from './expression.js';
import type { ParameterBag } from './params.js';

export type Direction = 'out' | 'in' | 'both';

export interface NodeSpec {
  alias?: string;
  labels?: string | readonly string[];
  /** Matched by equality; every value becomes a parameter. */
  properties?: Readonly<Record<string, ParamValue>>;
}

export interface RelationshipSpec {
  alias?: string;
  types?: string | readonly string[];
  direction?: Direction;
  /** Variable-length bounds. Cypher does not accept parameters here. */
  minHops?: number;
  maxHops?: number;
  properties?: Readonly<Record<string, ParamValue>>;
}

type Segment =
  | { kind: 'node'; text: string }
  | { kind: 'rel'; text: string; direction: Direction };

function toList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : value;
}

function assertHops(value: number | undefined, name: string): void {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
    throw new BuildError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
}

/**
 * Builds `(a:Label {k: $p})-[:TYPE*1..2]->(b)` style path patterns. Property
 * values are added to the owning query's parameter bag.
 */
export class PatternBuilder {
  private readonly segments: Segment[] = [];

  constructor(private readonly bag: ParameterBag) {}

  node(spec: NodeSpec = {}): this {
    const last = this.segments[this.segments.length - 1];
    if (last !== undefined && last.kind === 'node') {
      throw new BuildError('Two node patterns must be joined by a relationship');
    }
    const alias = spec.alias !== undefined ? assertIdentifier(spec.alias, 'alias') : '';
    const labels = toList(spec.labels).map((l) => `:${assertIdentifier(l, 'label')}`).join('');
    this.segments.push({ kind: 'node', text: `(${alias}${labels}${this.properties(spec.properties)})` });
    return this;
  }

  /** Appends a relationship; must be followed by node(). */
  rel(spec: RelationshipSpec = {}): this {
    const last = this.segments[this.segments.length - 1];
    if (last === undefined || last.kind !== 'node') {
      throw new BuildError('A relationship pattern must follow a node pattern');
    }
    assertHops(spec.minHops, 'minHops');
    assertHops(spec.maxHops, 'maxHops');

    const alias = spec.alias !== undefined ? assertIdentifier(spec.alias, 'alias') : '';
    const types = toList(spec.types).map((t) => assertIdentifier(t, 'relationship type'));
    const typeText = types.length > 0 ? `:${types.join('|')}` : '';

    let hops = '';
    if (spec.minHops !== undefined || spec.maxHops !== undefined) {
      hops = `*${spec.minHops ?? ''}..${spec.maxHops ?? ''}`;
    }

    this.segments.push({
      kind: 'rel',
      text: `[${alias}${typeText}${hops}${this.properties(spec.properties)}]`,
      direction: spec.direction ?? 'out',
    });
    return this;
  }

  /** Shorthand for rel({ types, direction: 'out' }). */
  to(types: string | readonly string[], spec: Omit<RelationshipSpec, 'types' | 'direction'> = {}): this {
    return this.rel({ ...spec, types, direction: 'out' });
  }

  /** Shorthand for rel({ types, direction: 'in' }). */
  from(types: string | readonly string[], spec: Omit<RelationshipSpec, 'types' | 'direction'> = {}): this {
    return this.rel({ ...spec, types, direction: 'in' });
  }

  build(): string {
    const last = this.segments[this.segments.length - 1];
    if (last === undefined) {
      throw new BuildError('Pattern is empty');
    }
    if (last.kind !== 'node') {
      throw new BuildError('A pattern must end with a node');
    }
    return this.segments
      .map((s) => {
        if (s.kind === 'node') return s.text;
        if (s.direction === 'out') return `-${s.text}->`;
        if (s.direction === 'in') return `<-${s.text}-`;
        return `-${s.text}-`;
      })
      .join('');
  }

  private properties(props: Readonly<Record<string, ParamValue>> | undefined): string {
    if (props === undefined) return '';
    const entries = Object.entries(props);
    if (entries.length === 0) return '';
    const body = entries
      .map(([key, value]) => `${assertIdentifier(key, 'property')}: $${this.bag.add(value)}`)
      .join(', ');
    return ` {${body}}`;
  }
}

export type PatternInput = NodeSpec | ((p: PatternBuilder) => PatternBuilder);

export function renderPattern(input: PatternInput, bag: ParameterBag): string {
  const builder = new PatternBuilder(bag);
  return typeof input === 'function' ? input(builder).build() : builder.node(input).build();
}
