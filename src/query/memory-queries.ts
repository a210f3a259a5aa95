import type {
  FilterExpression,
  IndexMetadataProvider,
  ParamScalar,
  ParamValue,
  QueryPlan,
  SimilarityRequest,
} from '../types.js';
import { BuildError, InvalidPaginationError } from '../errors.js';
import type { OrderKey } from './builder.js';
import { arithmetic, assertIdentifier, call, countOf, num, prop, ref, type Expression } from './expression.js';
import { compileFilter, type CompileFilterOptions } from './filter-compiler.js';
import { applyPagination, type Cursor } from './pagination.js';
import type { Direction } from './pattern.js';
import { isTrue, type Predicate } from './predicate.js';
import { cypher } from './query-object.js';
import {
  planSimilarity,
  resolveSimilarityConfig,
  similarityOrderKeys,
  type SimilarityConfig,
  type SimilarityStrategy,
} from './similarity-planner.js';

interface PageRequest {
  limit: number;
  skip?: number;
  cursor?: Cursor;
}

interface Scoped {
  /** Labels required in addition to the configured memory label. */
  labels?: readonly string[];
  filter?: FilterExpression | null;
  config?: Partial<SimilarityConfig>;
}

export interface PagedQuery {
  plan: QueryPlan;
  /** Keys the rows are ordered by; feed them to cursorFromRecord() for the next page. */
  orderKeys: OrderKey[];
}

function memoryLabels(config: SimilarityConfig, extra: readonly string[] = []): string[] {
  return [config.label, ...extra.filter((l) => l !== config.label)];
}

function temporalOf(config: SimilarityConfig): CompileFilterOptions {
  return { temporalFields: [config.recencyProperty] };
}

function windowOf(options: PageRequest): { limit: number; skip?: number; cursor?: Cursor } {
  return {
    limit: options.limit,
    ...(options.skip !== undefined ? { skip: options.skip } : {}),
    ...(options.cursor !== undefined ? { cursor: options.cursor } : {}),
  };
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export interface SimilaritySearchOptions extends Scoped, PageRequest {
  request: SimilarityRequest;
  metadata: IndexMetadataProvider;
  /** Rows earlier cursor pages returned; widens the index beam. */
  consumed?: number;
}

export interface SimilaritySearchQuery extends PagedQuery {
  strategy: SimilarityStrategy;
  beamWidth: number;
}

/**
 * Vector search over memories, restricted by `filter`, returning `m` and
 * `similarity` per row.
 */
export function similaritySearch(options: SimilaritySearchOptions): SimilaritySearchQuery {
  const config = resolveSimilarityConfig(options.config);
  const builder = cypher.builder();
  const { predicate } = compileFilter(options.filter, config.alias, builder.params, temporalOf(config));

  const planned = planSimilarity(builder, options.request, {
    structural: predicate,
    labels: options.labels ?? [],
    limit: options.limit,
    ...(options.skip !== undefined ? { skip: options.skip } : {}),
    ...(options.consumed !== undefined ? { consumed: options.consumed } : {}),
    metadata: options.metadata,
    config,
  });

  applyPagination(builder, [config.alias, config.similarityAlias], {
    orderBy: planned.orderKeys,
    ...windowOf(options),
  });

  return {
    plan: builder.build(),
    orderKeys: planned.orderKeys,
    strategy: planned.strategy,
    beamWidth: planned.beamWidth,
  };
}

export interface FilteredRecallOptions extends Scoped, PageRequest {}

/** Most recent memories first, restricted by `filter`. */
export function filteredRecall(options: FilteredRecallOptions): PagedQuery {
  const config = resolveSimilarityConfig(options.config);
  const builder = cypher.match({ alias: config.alias, labels: memoryLabels(config, options.labels) });
  const { predicate } = compileFilter(options.filter, config.alias, builder.params, temporalOf(config));
  if (!isTrue(predicate)) {
    builder.where(predicate);
  }

  const orderKeys = similarityOrderKeys(false, config);
  applyPagination(builder, [config.alias], { orderBy: orderKeys, ...windowOf(options) });
  return { plan: builder.build(), orderKeys };
}

export function countMemories(options: Scoped = {}): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  const builder = cypher.match({ alias: config.alias, labels: memoryLabels(config, options.labels) });
  const { predicate } = compileFilter(options.filter, config.alias, builder.params, temporalOf(config));
  if (!isTrue(predicate)) {
    builder.where(predicate);
  }
  return builder
    .return([{ expr: countOf(ref(config.alias)), as: 'count' }])
    .build();
}

export interface MemoryByIdOptions {
  id: string;
  labels?: readonly string[];
  config?: Partial<SimilarityConfig>;
}

export function getMemory(options: MemoryByIdOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  return cypher
    .match({
      alias: config.alias,
      labels: memoryLabels(config, options.labels),
      properties: { [config.idProperty]: options.id },
    })
    .return([config.alias])
    .limit(1)
    .build();
}

export interface RelatedMemoriesOptions {
  id: string;
  relationshipTypes?: readonly string[];
  /** Maximum number of hops. Defaults to 1. */
  depth?: number;
  direction?: Direction;
  limit: number;
  skip?: number;
  config?: Partial<SimilarityConfig>;
  /** Variable bound to each neighbour. Defaults to `related`. */
  relatedAlias?: string;
}

/**
 * Distinct memories reachable from one memory within `depth` hops over the
 * given relationship types, most recent first. The start memory is excluded.
 */
export function relatedMemories(options: RelatedMemoriesOptions): PagedQuery {
  const config = resolveSimilarityConfig(options.config);
  const depth = options.depth ?? 1;
  if (!Number.isSafeInteger(depth) || depth < 1) {
    throw new InvalidPaginationError('depth', `must be a positive integer, got ${String(depth)}`);
  }
  const related = assertIdentifier(options.relatedAlias ?? 'related', 'alias');
  if (related === config.alias) {
    throw new BuildError(`Related alias "${related}" clashes with the memory alias`);
  }

  const builder = cypher.match((p) =>
    p
      .node({ alias: config.alias, labels: config.label, properties: { [config.idProperty]: options.id } })
      .rel({
        types: options.relationshipTypes ?? [],
        direction: options.direction ?? 'both',
        minHops: 1,
        maxHops: depth,
      })
      .node({ alias: related, labels: config.label }),
  );
  builder.where({
    kind: 'comparison',
    subject: prop(related, config.idProperty),
    op: '<>',
    param: builder.params.add(options.id),
  });

  const orderKeys: OrderKey[] = [
    { expr: prop(related, config.recencyProperty), direction: 'DESC', cast: 'datetime' },
    { expr: prop(related, config.idProperty), direction: 'ASC' },
  ];
  applyPagination(builder, [related], {
    orderBy: orderKeys,
    limit: options.limit,
    distinct: true,
    ...(options.skip !== undefined ? { skip: options.skip } : {}),
  });
  return { plan: builder.build(), orderKeys };
}

export interface DetectRelationshipsOptions {
  /** The memory to find neighbours for; it is never among the results. */
  id: string;
  vector: readonly number[];
  threshold: number;
  /** Neighbours to return. Defaults to 5. */
  k?: number;
  metadata: IndexMetadataProvider;
  config?: Partial<SimilarityConfig>;
}

/**
 * The `k` memories most similar to `vector` above `threshold`, excluding the
 * memory `id` itself. Candidates for new RELATES_TO links.
 */
export function detectRelationships(options: DetectRelationshipsOptions): SimilaritySearchQuery {
  const config = resolveSimilarityConfig(options.config);
  const k = options.k ?? 5;
  const builder = cypher.builder();
  const exclude: Predicate = {
    kind: 'comparison',
    subject: prop(config.alias, config.idProperty),
    op: '<>',
    param: builder.params.add(options.id),
  };

  const planned = planSimilarity(
    builder,
    { vector: options.vector, k, threshold: options.threshold, useIndex: true, orderBySimilarity: true },
    { structural: exclude, limit: k, metadata: options.metadata, config },
  );
  applyPagination(builder, [config.alias, config.similarityAlias], { orderBy: planned.orderKeys, limit: k });

  return {
    plan: builder.build(),
    orderKeys: planned.orderKeys,
    strategy: planned.strategy,
    beamWidth: planned.beamWidth,
  };
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

export interface StoreMemoryOptions {
  id: string;
  labels?: readonly string[];
  /** Stored as-is; `timestamp` strings are converted with datetime(). */
  properties: Readonly<Record<string, ParamValue>>;
  config?: Partial<SimilarityConfig>;
}

/**
 * Upserts a memory by id. Without an explicit timestamp an existing one is
 * kept and a new memory is stamped with the current time.
 */
export function storeMemory(options: StoreMemoryOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  if (config.idProperty in options.properties) {
    throw new BuildError(`"${config.idProperty}" is the merge key; pass it as id, not as a property`);
  }

  const builder = cypher.merge({
    alias: config.alias,
    labels: memoryLabels(config, options.labels),
    properties: { [config.idProperty]: options.id },
  });

  const assignments: Record<string, ParamValue | Expression> = {};
  for (const [field, value] of Object.entries(options.properties)) {
    if (field === config.recencyProperty && typeof value === 'string') {
      assignments[field] = call('datetime', builder.bind(value));
    } else {
      assignments[field] = value;
    }
  }
  if (!(config.recencyProperty in assignments)) {
    assignments[config.recencyProperty] = call(
      'coalesce',
      prop(config.alias, config.recencyProperty),
      call('datetime'),
    );
  }

  return builder
    .setProperties(config.alias, assignments)
    .return([config.alias])
    .build();
}

/** Detaches and deletes one memory; returns `deleted` (0 or 1). */
export function deleteMemory(options: MemoryByIdOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  return cypher
    .match({
      alias: config.alias,
      labels: memoryLabels(config, options.labels),
      properties: { [config.idProperty]: options.id },
    })
    .with([config.alias, { expr: prop(config.alias, config.idProperty), as: 'deletedId' }])
    .delete(config.alias, { detach: true })
    .return([{ expr: countOf(ref('deletedId')), as: 'deleted' }])
    .build();
}

export interface ConnectMemoriesOptions {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  properties?: Readonly<Record<string, ParamValue>>;
  config?: Partial<SimilarityConfig>;
}

/** Idempotently links two memories; returns `r` when both exist. */
export function connectMemories(options: ConnectMemoriesOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  const type = assertIdentifier(options.relationshipType, 'relationship type');
  const builder = cypher
    .match({ alias: 'source', labels: config.label, properties: { [config.idProperty]: options.sourceId } })
    .match({ alias: 'target', labels: config.label, properties: { [config.idProperty]: options.targetId } })
    .merge((p) => p.node({ alias: 'source' }).to(type, { alias: 'r' }).node({ alias: 'target' }));

  if (options.properties !== undefined && Object.keys(options.properties).length > 0) {
    builder.setProperties('r', options.properties);
  }
  return builder.return(['r']).build();
}

export interface DisconnectMemoriesOptions {
  sourceId: string;
  targetId: string;
  /** Every outgoing relationship from source to target when omitted. */
  relationshipType?: string;
  config?: Partial<SimilarityConfig>;
}

/** Removes relationships from source to target; returns `removed`. */
export function disconnectMemories(options: DisconnectMemoriesOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  return cypher
    .match((p) =>
      p
        .node({ alias: 'source', labels: config.label, properties: { [config.idProperty]: options.sourceId } })
        .rel({ alias: 'r', types: options.relationshipType ?? [], direction: 'out' })
        .node({ alias: 'target', labels: config.label, properties: { [config.idProperty]: options.targetId } }),
    )
    .with(['r', { expr: call('elementId', ref('r')), as: 'removedId' }])
    .delete('r')
    .return([{ expr: countOf(ref('removedId')), as: 'removed' }])
    .build();
}

export interface UtteranceInput {
  id: string;
  content: string;
  embedding: readonly number[];
  topicId?: ParamScalar;
}

export interface ConversationTurnOptions {
  turnId: string;
  conversationId: string;
  user: UtteranceInput;
  assistant: UtteranceInput;
  /** Initial salience of both utterances. */
  salience: number;
  config?: Partial<SimilarityConfig>;
}

/**
 * Stores one exchange in a single statement: both utterances as memories,
 * a ConversationTurn node pointing at them, and a FOLLOWED_BY link from the
 * user's utterance to the assistant's. Returns `user`, `assistant` and `turn`.
 */
export function storeConversationTurn(options: ConversationTurnOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  if (!Number.isFinite(options.salience)) {
    throw new BuildError(`Salience must be a finite number, got ${String(options.salience)}`);
  }
  if (options.user.id === options.assistant.id) {
    throw new BuildError('User and assistant utterances need distinct ids');
  }

  const utterance = (input: UtteranceInput, memoryType: string): Record<string, ParamValue> => ({
    [config.idProperty]: input.id,
    content: input.content,
    [config.embeddingProperty]: input.embedding,
    salience: options.salience,
    conversation_id: options.conversationId,
    memory_type: memoryType,
    ...(input.topicId !== undefined ? { topic_id: input.topicId } : {}),
  });

  const builder = cypher
    .create({
      alias: 'user',
      labels: [config.label, 'UserUtterance'],
      properties: utterance(options.user, 'user_utterance'),
    })
    .create({
      alias: 'assistant',
      labels: [config.label, 'AssistantUtterance'],
      properties: utterance(options.assistant, 'assistant_utterance'),
    })
    .create({
      alias: 'turn',
      labels: 'ConversationTurn',
      properties: {
        [config.idProperty]: options.turnId,
        user_utterance_id: options.user.id,
        assistant_utterance_id: options.assistant.id,
        conversation_id: options.conversationId,
      },
    })
    .create((p) =>
      p
        .node({ alias: 'user' })
        .to('FOLLOWED_BY', { properties: { strength: 1, sequence: 'conversation_turn' } })
        .node({ alias: 'assistant' }),
    )
    .create((p) => p.node({ alias: 'turn' }).to('HAS_USER').node({ alias: 'user' }))
    .create((p) => p.node({ alias: 'turn' }).to('HAS_ASSISTANT').node({ alias: 'assistant' }));

  for (const alias of ['user', 'assistant', 'turn']) {
    builder.setProperty(alias, config.recencyProperty, call('datetime'));
  }
  return builder.return(['user', 'assistant', 'turn']).build();
}

// ---------------------------------------------------------------------------
// Maintenance
// ---------------------------------------------------------------------------

export interface SalienceOptions {
  /** Defaults to 0.05. */
  floor?: number;
  /** Defaults to `salience`. */
  salienceProperty?: string;
  labels?: readonly string[];
  config?: Partial<SimilarityConfig>;
}

export interface DecaySalienceOptions extends SalienceOptions {
  /** Multiplier in (0, 1]. */
  decay: number;
}

const SALIENCE_FLOOR = 0.05;

function salienceOf(options: SalienceOptions): { floor: number; property: string } {
  const floor = options.floor ?? SALIENCE_FLOOR;
  if (!Number.isFinite(floor) || floor < 0) {
    throw new BuildError(`Salience floor must be a non-negative number, got ${String(floor)}`);
  }
  return { floor, property: assertIdentifier(options.salienceProperty ?? 'salience', 'property') };
}

/** Multiplies the salience of every memory above the floor by `decay`; returns `updated`. */
export function decaySalience(options: DecaySalienceOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  const { floor, property } = salienceOf(options);
  if (!Number.isFinite(options.decay) || options.decay <= 0 || options.decay > 1) {
    throw new BuildError(`Decay must be in (0, 1], got ${String(options.decay)}`);
  }

  const salience = prop(config.alias, property);
  const builder = cypher.match({ alias: config.alias, labels: memoryLabels(config, options.labels) });
  builder.where({ kind: 'comparison', subject: salience, op: '>', param: builder.params.add(floor) });
  return builder
    .setProperty(config.alias, property, arithmetic(salience, '*', builder.bind(options.decay)))
    .return([{ expr: countOf(ref(config.alias)), as: 'updated' }])
    .build();
}

/** Detaches and deletes every memory below the floor; returns `evicted`. */
export function evictLowSalience(options: SalienceOptions = {}): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  const { floor, property } = salienceOf(options);

  const builder = cypher.match({ alias: config.alias, labels: memoryLabels(config, options.labels) });
  builder.where({
    kind: 'comparison',
    subject: prop(config.alias, property),
    op: '<',
    param: builder.params.add(floor),
  });
  return builder
    .with([config.alias, { expr: prop(config.alias, config.idProperty), as: 'evictedId' }])
    .delete(config.alias, { detach: true })
    .return([{ expr: countOf(ref('evictedId')), as: 'evicted' }])
    .build();
}

export interface RecordAccessOptions {
  ids: readonly string[];
  config?: Partial<SimilarityConfig>;
}

/** Stamps `last_accessed` and bumps `access_count` on each memory; returns `accessed`. */
export function recordAccess(options: RecordAccessOptions): QueryPlan {
  const config = resolveSimilarityConfig(options.config);
  if (options.ids.length === 0) {
    throw new BuildError('recordAccess needs at least one id');
  }

  const builder = cypher.match({ alias: config.alias, labels: config.label });
  builder.where({
    kind: 'membership',
    subject: prop(config.alias, config.idProperty),
    param: builder.params.add([...options.ids]),
  });
  return builder
    .setProperties(config.alias, {
      last_accessed: call('datetime'),
      access_count: arithmetic(call('coalesce', prop(config.alias, 'access_count'), num(0)), '+', num(1)),
    })
    .return([{ expr: countOf(ref(config.alias)), as: 'accessed' }])
    .build();
}
