import { v4 as uuidv4 } from 'uuid';
import type {
  FilterExpression,
  IndexMetadataProvider,
  ParamValue,
  QueryExecutor,
  QueryRecord,
} from '../types.js';
import { QueryExecutionError } from '../errors.js';
import type { OrderKey } from '../query/builder.js';
import {
  connectMemories,
  countMemories,
  decaySalience,
  deleteMemory,
  detectRelationships,
  disconnectMemories,
  evictLowSalience,
  filteredRecall,
  getMemory,
  recordAccess,
  relatedMemories,
  similaritySearch,
  storeConversationTurn,
  storeMemory,
  type SalienceOptions,
  type UtteranceInput,
} from '../query/memory-queries.js';
import { cursorFromRecord, decodeCursor, encodeCursor, type Cursor } from '../query/pagination.js';
import type { Direction } from '../query/pattern.js';
import { resolveSimilarityConfig, type SimilarityConfig } from '../query/similarity-planner.js';

/** Property map of a stored memory node. */
export type MemoryNode = Record<string, unknown>;

export interface SearchHit {
  memory: MemoryNode;
  similarity: number;
}

export interface Page<T> {
  items: T[];
  /** Token for the following page, or null when this page was not full. */
  nextCursor: string | null;
}

export interface MemoryRepositoryConfig {
  executor: QueryExecutor;
  metadata: IndexMetadataProvider;
  search?: Partial<SimilarityConfig>;
  /** Page size when a call gives none. */
  defaultLimit?: number;
  /** Similarity threshold when a search gives none. */
  defaultThreshold?: number;
}

interface Scope {
  filter?: FilterExpression | null;
  labels?: readonly string[];
}

interface PageOptions {
  limit?: number;
  skip?: number;
  /** Token from a previous page's `nextCursor`. */
  cursor?: string;
}

interface PageWindow {
  page: { limit: number; skip?: number; cursor?: Cursor };
  consumed: number;
}

export interface SearchOptions extends Scope, PageOptions {
  threshold?: number;
  /** Minimum number of index candidates; the beam never goes below it. */
  k?: number;
  useIndex?: boolean;
  orderBySimilarity?: boolean;
}

export type RecallOptions = Scope & PageOptions;

export interface StoreInput {
  /** A new v4 uuid is assigned when omitted. */
  id?: string;
  labels?: readonly string[];
  properties: Readonly<Record<string, ParamValue>>;
}

export interface RelatedOptions {
  relationshipTypes?: readonly string[];
  depth?: number;
  direction?: Direction;
  limit?: number;
  skip?: number;
}

export interface TurnInput {
  /** New v4 uuids are assigned to the turn and both utterances when omitted. */
  turnId?: string;
  conversationId: string;
  user: Omit<UtteranceInput, 'id'> & { id?: string };
  assistant: Omit<UtteranceInput, 'id'> & { id?: string };
  /** Defaults to 1. */
  salience?: number;
}

export interface StoredTurn {
  user: MemoryNode;
  assistant: MemoryNode;
  turn: MemoryNode;
}

export interface DetectOptions {
  threshold?: number;
  k?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function column(row: QueryRecord, name: string): Record<string, unknown> {
  const value = row[name];
  if (!isRecord(value)) {
    throw new QueryExecutionError(`Expected column "${name}" to hold a node`);
  }
  return value;
}

function numberColumn(row: QueryRecord, name: string): number {
  const value = row[name];
  if (typeof value !== 'number') {
    throw new QueryExecutionError(`Expected column "${name}" to hold a number`);
  }
  return value;
}

/**
 * Memory store on top of a QueryExecutor. Every call builds a fresh plan;
 * nothing is cached between calls.
 */
export class MemoryRepository {
  private readonly executor: QueryExecutor;
  private readonly metadata: IndexMetadataProvider;
  private readonly config: SimilarityConfig;
  private readonly defaultLimit: number;
  private readonly defaultThreshold: number;

  constructor(config: MemoryRepositoryConfig) {
    this.executor = config.executor;
    this.metadata = config.metadata;
    this.config = resolveSimilarityConfig(config.search);
    this.defaultLimit = config.defaultLimit ?? 100;
    this.defaultThreshold = config.defaultThreshold ?? 0.7;
  }

  async search(vector: readonly number[], options: SearchOptions = {}): Promise<Page<SearchHit>> {
    const limit = options.limit ?? this.defaultLimit;
    const window = this.window(options, limit);
    const query = similaritySearch({
      request: {
        vector,
        k: options.k ?? limit,
        threshold: options.threshold ?? this.defaultThreshold,
        useIndex: options.useIndex ?? true,
        orderBySimilarity: options.orderBySimilarity ?? true,
      },
      metadata: this.metadata,
      config: this.config,
      ...this.scope(options),
      ...window.page,
      consumed: window.consumed,
    });
    const rows = await this.executor.execute(query.plan);
    return {
      items: rows.map((row) => ({
        memory: column(row, this.config.alias),
        similarity: numberColumn(row, this.config.similarityAlias),
      })),
      nextCursor: this.nextCursor(rows, query.orderKeys, limit, window.consumed),
    };
  }

  async recall(options: RecallOptions = {}): Promise<Page<MemoryNode>> {
    const limit = options.limit ?? this.defaultLimit;
    const window = this.window(options, limit);
    const query = filteredRecall({
      config: this.config,
      ...this.scope(options),
      ...window.page,
    });
    const rows = await this.executor.execute(query.plan);
    return {
      items: rows.map((row) => column(row, this.config.alias)),
      nextCursor: this.nextCursor(rows, query.orderKeys, limit, window.consumed),
    };
  }

  async count(options: Scope = {}): Promise<number> {
    const rows = await this.executor.execute(countMemories({ config: this.config, ...this.scope(options) }));
    const first = rows[0];
    return first !== undefined ? numberColumn(first, 'count') : 0;
  }

  async get(id: string): Promise<MemoryNode | null> {
    const rows = await this.executor.execute(getMemory({ id, config: this.config }));
    const first = rows[0];
    return first !== undefined ? column(first, this.config.alias) : null;
  }

  async store(input: StoreInput): Promise<MemoryNode> {
    const plan = storeMemory({
      id: input.id ?? uuidv4(),
      properties: input.properties,
      config: this.config,
      ...(input.labels !== undefined ? { labels: input.labels } : {}),
    });
    const rows = await this.executor.execute(plan);
    const first = rows[0];
    if (first === undefined) {
      throw new QueryExecutionError('Store returned no memory');
    }
    return column(first, this.config.alias);
  }

  /** True when a memory was removed. */
  async delete(id: string): Promise<boolean> {
    const rows = await this.executor.execute(deleteMemory({ id, config: this.config }));
    const first = rows[0];
    return first !== undefined && numberColumn(first, 'deleted') > 0;
  }

  async related(id: string, options: RelatedOptions = {}): Promise<MemoryNode[]> {
    const query = relatedMemories({
      id,
      limit: options.limit ?? this.defaultLimit,
      config: this.config,
      ...(options.relationshipTypes !== undefined ? { relationshipTypes: options.relationshipTypes } : {}),
      ...(options.depth !== undefined ? { depth: options.depth } : {}),
      ...(options.direction !== undefined ? { direction: options.direction } : {}),
      ...(options.skip !== undefined ? { skip: options.skip } : {}),
    });
    const rows = await this.executor.execute(query.plan);
    return rows.map((row) => column(row, 'related'));
  }

  /** True when both memories exist and are now linked. */
  async connect(
    sourceId: string,
    targetId: string,
    relationshipType: string,
    properties?: Readonly<Record<string, ParamValue>>,
  ): Promise<boolean> {
    const rows = await this.executor.execute(connectMemories({
      sourceId,
      targetId,
      relationshipType,
      config: this.config,
      ...(properties !== undefined ? { properties } : {}),
    }));
    return rows.length > 0;
  }

  /** Number of relationships removed. */
  async disconnect(sourceId: string, targetId: string, relationshipType?: string): Promise<number> {
    const rows = await this.executor.execute(disconnectMemories({
      sourceId,
      targetId,
      config: this.config,
      ...(relationshipType !== undefined ? { relationshipType } : {}),
    }));
    const first = rows[0];
    return first !== undefined ? numberColumn(first, 'removed') : 0;
  }

  async storeTurn(input: TurnInput): Promise<StoredTurn> {
    const utterance = (u: TurnInput['user']): UtteranceInput => ({
      id: u.id ?? uuidv4(),
      content: u.content,
      embedding: u.embedding,
      ...(u.topicId !== undefined ? { topicId: u.topicId } : {}),
    });
    const rows = await this.executor.execute(storeConversationTurn({
      turnId: input.turnId ?? uuidv4(),
      conversationId: input.conversationId,
      user: utterance(input.user),
      assistant: utterance(input.assistant),
      salience: input.salience ?? 1,
      config: this.config,
    }));
    const first = rows[0];
    if (first === undefined) {
      throw new QueryExecutionError('Store returned no conversation turn');
    }
    return {
      user: column(first, 'user'),
      assistant: column(first, 'assistant'),
      turn: column(first, 'turn'),
    };
  }

  /** Memories similar enough to `id` to be linked to it. */
  async detectRelationships(id: string, vector: readonly number[], options: DetectOptions = {}): Promise<SearchHit[]> {
    const query = detectRelationships({
      id,
      vector,
      threshold: options.threshold ?? this.defaultThreshold,
      metadata: this.metadata,
      config: this.config,
      ...(options.k !== undefined ? { k: options.k } : {}),
    });
    const rows = await this.executor.execute(query.plan);
    return rows.map((row) => ({
      memory: column(row, this.config.alias),
      similarity: numberColumn(row, this.config.similarityAlias),
    }));
  }

  /** Number of memories whose salience was decayed. */
  async decaySalience(decay: number, options: SalienceOptions = {}): Promise<number> {
    const rows = await this.executor.execute(decaySalience({ ...options, decay, config: this.config }));
    const first = rows[0];
    return first !== undefined ? numberColumn(first, 'updated') : 0;
  }

  /** Number of memories evicted. */
  async evictLowSalience(options: SalienceOptions = {}): Promise<number> {
    const rows = await this.executor.execute(evictLowSalience({ ...options, config: this.config }));
    const first = rows[0];
    return first !== undefined ? numberColumn(first, 'evicted') : 0;
  }

  /** Number of memories whose access was recorded. */
  async recordAccess(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const rows = await this.executor.execute(recordAccess({ ids, config: this.config }));
    const first = rows[0];
    return first !== undefined ? numberColumn(first, 'accessed') : 0;
  }

  private scope(options: Scope): Scope {
    return {
      ...(options.filter !== undefined ? { filter: options.filter } : {}),
      ...(options.labels !== undefined ? { labels: options.labels } : {}),
    };
  }

  /** The page to request and the rows earlier pages already returned. */
  private window(options: PageOptions, limit: number): PageWindow {
    if (options.cursor === undefined) {
      return {
        page: { limit, ...(options.skip !== undefined ? { skip: options.skip } : {}) },
        consumed: options.skip ?? 0,
      };
    }
    const token = decodeCursor(options.cursor);
    return {
      page: { limit, cursor: token.values, ...(options.skip !== undefined ? { skip: options.skip } : {}) },
      consumed: token.consumed,
    };
  }

  private nextCursor(rows: QueryRecord[], keys: readonly OrderKey[], limit: number, consumed: number): string | null {
    const last = rows[rows.length - 1];
    if (rows.length < limit || last === undefined) return null;
    return encodeCursor(cursorFromRecord(last, keys), consumed + rows.length);
  }
}
