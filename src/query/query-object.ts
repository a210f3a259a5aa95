import type { ParamScalar } from '../types.js';
import { CypherQueryBuilder } from './builder.js';
import type { Expression } from './expression.js';
import type { PatternInput } from './pattern.js';

/**
 * Entry point for the query DSL. Every call starts a fresh builder with its
 * own parameter bag; builders are never shared between queries.
 *
 * @example
 * cypher
 *   .match({ alias: 'm', labels: ['Memory'] })
 *   .whereFilter({ topic_id__in: [3, 7] })
 *   .return(['m'])
 *   .build()
 */
export const cypher = {
  builder(): CypherQueryBuilder {
    return new CypherQueryBuilder();
  },
  match(pattern: PatternInput): CypherQueryBuilder {
    return cypher.builder().match(pattern);
  },
  optionalMatch(pattern: PatternInput): CypherQueryBuilder {
    return cypher.builder().optionalMatch(pattern);
  },
  call(procedure: string, args: (b: CypherQueryBuilder) => readonly Expression[], yields?: Readonly<Record<string, string>>): CypherQueryBuilder {
    const b = cypher.builder();
    return b.call(procedure, args(b), yields);
  },
  unwind(values: readonly ParamScalar[], as: string): CypherQueryBuilder {
    return cypher.builder().unwind(values, as);
  },
  create(pattern: PatternInput): CypherQueryBuilder {
    return cypher.builder().create(pattern);
  },
  merge(pattern: PatternInput): CypherQueryBuilder {
    return cypher.builder().merge(pattern);
  },
};
