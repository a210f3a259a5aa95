import type { IndexMetadataProvider, SimilarityRequest } from '../types.js';
import { DimensionMismatchError, InvalidPaginationError, InvalidSimilarityRequestError } from '../errors.js';
import type { CypherQueryBuilder, OrderKey } from './builder.js';
import { assertIdentifier, call, cosineScore, prop, ref } from './expression.js';
import { and, hasLabels, TRUE, type Predicate } from './predicate.js';

export interface SimilarityConfig {
  /** Vector index consulted by the index strategy. */
  indexName: string;
  /** Label scanned by the exact strategy. */
  label: string;
  alias: string;
  embeddingProperty: string;
  similarityAlias: string;
  /** Secondary sort key; most recent first. */
  recencyProperty: string;
  /** Final sort key; makes the order total. */
  idProperty: string;
  beamFloor: number;
  beamMultiplier: number;
}

export const DEFAULT_SIMILARITY_CONFIG: Readonly<SimilarityConfig> = Object.freeze({
  indexName: 'memory_embeddings',
  label: 'Memory',
  alias: 'm',
  embeddingProperty: 'embedding',
  similarityAlias: 'similarity',
  recencyProperty: 'timestamp',
  idProperty: 'id',
  beamFloor: 50,
  beamMultiplier: 3,
});

export function resolveSimilarityConfig(overrides: Partial<SimilarityConfig> = {}): SimilarityConfig {
  const config = { ...DEFAULT_SIMILARITY_CONFIG, ...overrides };
  // Overrides may widen the beam, never narrow it
  if (!Number.isSafeInteger(config.beamFloor) || config.beamFloor < DEFAULT_SIMILARITY_CONFIG.beamFloor) {
    throw new InvalidSimilarityRequestError(
      'beamFloor',
      `must be an integer of at least ${DEFAULT_SIMILARITY_CONFIG.beamFloor}, got ${String(config.beamFloor)}`,
    );
  }
  if (!Number.isSafeInteger(config.beamMultiplier) || config.beamMultiplier < DEFAULT_SIMILARITY_CONFIG.beamMultiplier) {
    throw new InvalidSimilarityRequestError(
      'beamMultiplier',
      `must be an integer of at least ${DEFAULT_SIMILARITY_CONFIG.beamMultiplier}, got ${String(config.beamMultiplier)}`,
    );
  }
  assertIdentifier(config.label, 'label');
  assertIdentifier(config.alias, 'alias');
  assertIdentifier(config.embeddingProperty, 'property');
  assertIdentifier(config.similarityAlias, 'alias');
  assertIdentifier(config.recencyProperty, 'property');
  assertIdentifier(config.idProperty, 'property');
  return config;
}

export type SimilarityStrategy = 'index' | 'exact';

export interface SimilarityPlanOptions {
  /** Structural filter, compiled against the same builder's parameter bag. */
  structural?: Predicate;
  /** Labels candidates must carry in addition to the configured one. */
  labels?: readonly string[];
  /** Page size the caller will request. */
  limit: number;
  /** Rows the caller will skip before the page. */
  skip?: number;
  /**
   * Rows earlier cursor pages already returned. The index is asked for the
   * top candidates again on every page, so the beam must cover them too.
   */
  consumed?: number;
  metadata: IndexMetadataProvider;
  config?: Partial<SimilarityConfig>;
}

export interface SimilarityPlan {
  strategy: SimilarityStrategy;
  /** Candidates requested from the vector index (index strategy only). */
  beamWidth: number;
  /** Deterministic ordering for the result rows. */
  orderKeys: OrderKey[];
  /** Variables in scope after the similarity stage. */
  variables: [node: string, similarity: string];
}

/**
 * Number of index candidates to request. Widened past the page window so
 * that threshold and structural filtering applied afterwards do not starve
 * the page.
 */
export function beamWidth(k: number, requestedLimit: number, config: Pick<SimilarityConfig, 'beamFloor' | 'beamMultiplier'> = DEFAULT_SIMILARITY_CONFIG): number {
  return Math.max(k, config.beamMultiplier * requestedLimit, config.beamFloor);
}

export function similarityOrderKeys(orderBySimilarity: boolean, config: SimilarityConfig): OrderKey[] {
  const tieBreakers: OrderKey[] = [
    { expr: prop(config.alias, config.recencyProperty), direction: 'DESC', cast: 'datetime' },
    { expr: prop(config.alias, config.idProperty), direction: 'ASC' },
  ];
  if (!orderBySimilarity) return tieBreakers;
  return [{ expr: ref(config.similarityAlias), direction: 'DESC' }, ...tieBreakers];
}

function validateRequest(request: SimilarityRequest, limit: number, skip: number, consumed: number): void {
  if (request.vector.length === 0) {
    throw new InvalidSimilarityRequestError('vector', 'must not be empty');
  }
  if (!request.vector.every((x) => typeof x === 'number' && Number.isFinite(x))) {
    throw new InvalidSimilarityRequestError('vector', 'must contain only finite numbers');
  }
  if (!Number.isSafeInteger(request.k) || request.k <= 0) {
    throw new InvalidSimilarityRequestError('k', `must be a positive integer, got ${String(request.k)}`);
  }
  if (!Number.isFinite(request.threshold)) {
    throw new InvalidSimilarityRequestError('threshold', `must be a finite number, got ${String(request.threshold)}`);
  }
  if (!Number.isSafeInteger(limit) || limit <= 0) {
    throw new InvalidPaginationError('limit', `must be a positive integer, got ${String(limit)}`);
  }
  if (!Number.isSafeInteger(skip) || skip < 0) {
    throw new InvalidPaginationError('skip', `must be a non-negative integer, got ${String(skip)}`);
  }
  if (!Number.isSafeInteger(consumed) || consumed < 0) {
    throw new InvalidPaginationError('consumed', `must be a non-negative integer, got ${String(consumed)}`);
  }
}

/**
 * Emits the retrieval and filtering stages of a similarity search onto
 * `builder` and reports how the rows must be ordered.
 *
 * With an index: `CALL db.index.vector.queryNodes(...) YIELD node AS m, score AS similarity`.
 * Without one: a label scan over embeddings of the query's length plus an
 * in-query inner product. Stored and query vectors are expected to be unit
 * length, so the inner product is the cosine; it is rescaled to `(1 + cos) / 2`
 * to match the score of a cosine index. Both end in `WHERE similarity > $threshold AND <structural>`; extra labels
 * are part of the MATCH for the scan and a label test after the index call.
 *
 * All validation, including the dimension check, happens before anything is
 * emitted.
 */
export function planSimilarity(
  builder: CypherQueryBuilder,
  request: SimilarityRequest,
  options: SimilarityPlanOptions,
): SimilarityPlan {
  const config = resolveSimilarityConfig(options.config);
  const skip = options.skip ?? 0;
  const consumed = options.consumed ?? 0;
  validateRequest(request, options.limit, skip, consumed);

  const expected = options.metadata.dimensionsFor(config.indexName);
  if (expected !== undefined && expected !== request.vector.length) {
    throw new DimensionMismatchError(expected, request.vector.length, config.indexName);
  }

  const strategy: SimilarityStrategy = request.useIndex && expected !== undefined ? 'index' : 'exact';
  const beam = beamWidth(request.k, consumed + skip + options.limit, config);
  const similarity = ref(config.similarityAlias);
  const structural = options.structural ?? TRUE;
  const extraLabels = (options.labels ?? [])
    .map((l) => assertIdentifier(l, 'label'))
    .filter((l) => l !== config.label);

  let labelFilter: Predicate = TRUE;
  if (strategy === 'index') {
    builder.call(
      'db.index.vector.queryNodes',
      [builder.bind(config.indexName), builder.bindInteger(beam), builder.bind(request.vector)],
      { node: config.alias, score: config.similarityAlias },
    );
    labelFilter = hasLabels(config.alias, extraLabels);
  } else {
    const embedding = prop(config.alias, config.embeddingProperty);
    builder.match({ alias: config.alias, labels: [config.label, ...extraLabels] });
    builder.where(and(
      { kind: 'nullCheck', subject: embedding, negated: true },
      {
        kind: 'comparison',
        subject: call('size', embedding),
        op: '=',
        param: builder.params.addInteger(request.vector.length),
      },
    ));
    builder.with([
      config.alias,
      { expr: cosineScore(embedding, builder.bind(request.vector)), as: config.similarityAlias },
    ]);
  }

  const threshold: Predicate = {
    kind: 'comparison',
    subject: similarity,
    op: '>',
    param: builder.params.add(request.threshold),
  };
  builder.where(and(threshold, labelFilter, structural));

  return {
    strategy,
    beamWidth: beam,
    orderKeys: similarityOrderKeys(request.orderBySimilarity, config),
    variables: [config.alias, config.similarityAlias],
  };
}
