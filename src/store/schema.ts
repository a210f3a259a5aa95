import type { QueryExecutor, QueryPlan } from '../types.js';
import { BuildError } from '../errors.js';
import { assertIdentifier } from '../query/expression.js';
import { DEFAULT_SIMILARITY_CONFIG } from '../query/similarity-planner.js';

export type SimilarityFunction = 'cosine' | 'euclidean';

export interface VectorIndexOptions {
  indexName?: string;
  label?: string;
  embeddingProperty?: string;
  similarityFunction?: SimilarityFunction;
}

// Schema statements take no parameters in these positions; every interpolated
// part is an identifier or a validated integer.

function schemaPlan(text: string): QueryPlan {
  return { text, params: {}, integerParams: [], mode: 'write' };
}

export function createVectorIndexQuery(dimensions: number, options: VectorIndexOptions = {}): QueryPlan {
  if (!Number.isSafeInteger(dimensions) || dimensions <= 0) {
    throw new BuildError(`Vector index dimensions must be a positive integer, got ${String(dimensions)}`);
  }
  const name = assertIdentifier(options.indexName ?? DEFAULT_SIMILARITY_CONFIG.indexName, 'index name');
  const label = assertIdentifier(options.label ?? DEFAULT_SIMILARITY_CONFIG.label, 'label');
  const property = assertIdentifier(options.embeddingProperty ?? DEFAULT_SIMILARITY_CONFIG.embeddingProperty, 'property');
  const fn = options.similarityFunction ?? 'cosine';

  return schemaPlan(`
CREATE VECTOR INDEX ${name} IF NOT EXISTS
  FOR (n:${label}) ON (n.${property})
  OPTIONS {indexConfig: {
    \`vector.dimensions\`: ${dimensions},
    \`vector.similarity_function\`: '${fn}'
  }}
`.trim());
}

export function createIdConstraintQuery(label: string = DEFAULT_SIMILARITY_CONFIG.label, idProperty: string = DEFAULT_SIMILARITY_CONFIG.idProperty): QueryPlan {
  const l = assertIdentifier(label, 'label');
  const p = assertIdentifier(idProperty, 'property');
  return schemaPlan(`CREATE CONSTRAINT ${l.toLowerCase()}_${p}_unique IF NOT EXISTS FOR (n:${l}) REQUIRE n.${p} IS UNIQUE`);
}

export interface SchemaOptions extends VectorIndexOptions {
  /** Property the uniqueness constraint covers. */
  idProperty?: string;
}

/** Idempotent: id uniqueness constraint, then the vector index. */
export async function applySchema(
  executor: QueryExecutor,
  dimensions: number,
  options: SchemaOptions = {},
): Promise<void> {
  await executor.execute(createIdConstraintQuery(options.label, options.idProperty));
  await executor.execute(createVectorIndexQuery(dimensions, options));
}
