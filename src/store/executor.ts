import neo4j, { type Driver } from 'neo4j-driver';
import type { AccessMode, QueryExecutor, QueryPlan, QueryRecord } from '../types.js';
import { QueryExecutionError } from '../errors.js';
import { mapRecord } from './record-mapper.js';

export interface QueryEvent {
  text: string;
  mode: AccessMode;
  rowCount: number;
  durationMs: number;
}

export interface Neo4jExecutorConfig {
  driver: Driver;
  /** Target database; the server default when omitted. */
  database?: string;
  /** Transaction timeout in milliseconds. */
  timeoutMs?: number;
  onQuery?: (event: QueryEvent) => void;
  onError?: (error: unknown, plan: QueryPlan) => void;
}

interface ResolvedConfig {
  timeoutMs: number;
  onError: (error: unknown, plan: QueryPlan) => void;
  onQuery?: (event: QueryEvent) => void;
}

/** Parameters as the driver expects them: integer-typed names become driver integers. */
export function toDriverParams(plan: QueryPlan): Record<string, unknown> {
  const integers = new Set(plan.integerParams);
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(plan.params)) {
    out[name] = integers.has(name) && typeof value === 'number' ? neo4j.int(value) : value;
  }
  return out;
}

/**
 * Runs finalized plans against Neo4j, one session per call. The session's
 * access mode follows `plan.mode` so reads can be routed to followers.
 */
export class Neo4jQueryExecutor implements QueryExecutor {
  private readonly driver: Driver;
  private readonly database: string | undefined;
  private readonly resolved: ResolvedConfig;

  constructor(config: Neo4jExecutorConfig) {
    this.driver = config.driver;
    this.database = config.database;
    this.resolved = {
      timeoutMs: config.timeoutMs ?? 30_000,
      onError: config.onError ?? ((err, plan) => {
        console.error(`[cypher-recall] ${plan.mode} query failed:`, err);
      }),
      ...(config.onQuery !== undefined ? { onQuery: config.onQuery } : {}),
    };
  }

  async execute(plan: QueryPlan): Promise<QueryRecord[]> {
    const session = this.driver.session({
      defaultAccessMode: plan.mode === 'write' ? neo4j.session.WRITE : neo4j.session.READ,
      ...(this.database !== undefined ? { database: this.database } : {}),
    });
    const startedAt = Date.now();
    try {
      const result = await session.run(plan.text, toDriverParams(plan), { timeout: this.resolved.timeoutMs });
      const rows = result.records.map(mapRecord);
      this.resolved.onQuery?.({
        text: plan.text,
        mode: plan.mode,
        rowCount: rows.length,
        durationMs: Date.now() - startedAt,
      });
      return rows;
    } catch (err) {
      this.resolved.onError(err, plan);
      throw new QueryExecutionError(
        `Failed to execute ${plan.mode} query: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    } finally {
      await session.close();
    }
  }
}
