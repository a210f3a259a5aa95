export { cypher } from './query/query-object.js';
export { CypherQueryBuilder } from './query/builder.js';
export type { ProjectionItem, ProjectionInput, SortDirection, OrderKey, PageWindow } from './query/builder.js';
export { ParameterBag } from './query/params.js';
export type { ParameterBagOptions } from './query/params.js';
export { ref, prop, param, call, countOf, innerProduct, num, arithmetic, cosineScore } from './query/expression.js';
export type { Expression, FunctionName, ArithmeticOp } from './query/expression.js';
export { and, or, hasLabels, isTrue, renderPredicate, predicateParams, TRUE, FALSE } from './query/predicate.js';
export type { Predicate, ComparisonOp, GroupOp } from './query/predicate.js';
export { compileFilter, DEFAULT_TEMPORAL_FIELDS } from './query/filter-compiler.js';
export type { CompiledFilter, CompileFilterOptions } from './query/filter-compiler.js';
export { TRANSITIONS, QUERY_STATES, CLAUSE_KINDS, KEYWORD_KIND, canTransition, transition } from './query/clause-state.js';
export type { ClauseKind, ClauseKeyword, QueryState } from './query/clause-state.js';
export { PatternBuilder } from './query/pattern.js';
export type { Direction, NodeSpec, RelationshipSpec, PatternInput } from './query/pattern.js';
export {
  planSimilarity,
  beamWidth,
  similarityOrderKeys,
  resolveSimilarityConfig,
  DEFAULT_SIMILARITY_CONFIG,
} from './query/similarity-planner.js';
export type {
  SimilarityConfig,
  SimilarityPlan,
  SimilarityPlanOptions,
  SimilarityStrategy,
} from './query/similarity-planner.js';
export { applyPagination, keysetPredicate, encodeCursor, decodeCursor, cursorFromRecord } from './query/pagination.js';
export type { Cursor, CursorToken, PaginationOptions } from './query/pagination.js';
export {
  similaritySearch,
  filteredRecall,
  countMemories,
  getMemory,
  relatedMemories,
  storeMemory,
  deleteMemory,
  connectMemories,
  disconnectMemories,
  detectRelationships,
  storeConversationTurn,
  decaySalience,
  evictLowSalience,
  recordAccess,
} from './query/memory-queries.js';
export type {
  PagedQuery,
  SimilaritySearchOptions,
  SimilaritySearchQuery,
  FilteredRecallOptions,
  MemoryByIdOptions,
  RelatedMemoriesOptions,
  StoreMemoryOptions,
  ConnectMemoriesOptions,
  DisconnectMemoriesOptions,
  DetectRelationshipsOptions,
  UtteranceInput,
  ConversationTurnOptions,
  SalienceOptions,
  DecaySalienceOptions,
  RecordAccessOptions,
} from './query/memory-queries.js';
export type {
  ParamScalar,
  ParamValue,
  FilterExpression,
  FilterValue,
  SimilarityRequest,
  AccessMode,
  QueryPlan,
  QueryRecord,
  QueryExecutor,
  IndexMetadataProvider,
} from './types.js';
export { Neo4jQueryExecutor } from './store/executor.js';
export type { Neo4jExecutorConfig, QueryEvent } from './store/executor.js';
export { mapRecord, mapValue } from './store/record-mapper.js';
export { createDriver, driverConfigFromEnv } from './store/driver.js';
export type { DriverConfig } from './store/driver.js';
export { StaticIndexMetadata, loadIndexMetadata } from './store/index-metadata.js';
export { createVectorIndexQuery, createIdConstraintQuery, applySchema } from './store/schema.js';
export type { VectorIndexOptions, SchemaOptions, SimilarityFunction } from './store/schema.js';
export { MemoryRepository } from './store/memory-repository.js';
export type {
  MemoryRepositoryConfig,
  MemoryNode,
  SearchHit,
  Page,
  SearchOptions,
  RecallOptions,
  StoreInput,
  RelatedOptions,
  TurnInput,
  StoredTurn,
  DetectOptions,
} from './store/memory-repository.js';
export {
  FilterError,
  UnsupportedOperatorError,
  InvalidFilterShapeError,
  BuildError,
  InvalidClauseOrderError,
  AlreadyFinalizedError,
  EmptyQueryError,
  DimensionMismatchError,
  InvalidIdentifierError,
  InvalidSimilarityRequestError,
  InvalidPaginationError,
  UnorderedPaginationError,
  QueryExecutionError,
} from './errors.js';
