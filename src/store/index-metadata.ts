import type { IndexMetadataProvider, QueryExecutor, QueryPlan } from '../types.js';

/** Immutable index-name to dimensionality lookup. */
export class StaticIndexMetadata implements IndexMetadataProvider {
  private readonly dimensions: ReadonlyMap<string, number>;

  constructor(entries: Iterable<readonly [string, number]> = []) {
    const map = new Map<string, number>();
    for (const [name, dims] of entries) {
      if (!Number.isSafeInteger(dims) || dims <= 0) {
        throw new Error(`Index "${name}" must have a positive integer dimension, got ${String(dims)}`);
      }
      map.set(name, dims);
    }
    this.dimensions = map;
  }

  static of(dimensions: Readonly<Record<string, number>>): StaticIndexMetadata {
    return new StaticIndexMetadata(Object.entries(dimensions));
  }

  get indexNames(): string[] {
    return [...this.dimensions.keys()];
  }

  dimensionsFor(indexName: string): number | undefined {
    return this.dimensions.get(indexName);
  }
}

export const SHOW_VECTOR_INDEXES: QueryPlan = {
  text: 'SHOW VECTOR INDEXES YIELD name, options',
  params: {},
  integerParams: [],
  mode: 'read',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function dimensionsOf(options: unknown): number | undefined {
  if (!isRecord(options)) return undefined;
  const config = options['indexConfig'];
  if (!isRecord(config)) return undefined;
  const dims = config['vector.dimensions'];
  return typeof dims === 'number' && Number.isSafeInteger(dims) && dims > 0 ? dims : undefined;
}

/**
 * Reads every vector index once. Indexes whose dimensionality cannot be read
 * are left out, so the planner treats them as unknown.
 */
export async function loadIndexMetadata(executor: QueryExecutor): Promise<StaticIndexMetadata> {
  const rows = await executor.execute(SHOW_VECTOR_INDEXES);
  const entries: [string, number][] = [];
  for (const row of rows) {
    const name = row['name'];
    const dims = dimensionsOf(row['options']);
    if (typeof name === 'string' && dims !== undefined) {
      entries.push([name, dims]);
    }
  }
  return new StaticIndexMetadata(entries);
}
