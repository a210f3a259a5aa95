import { InvalidClauseOrderError } from '../errors.js';

/** Category a clause belongs to for ordering purposes. */
export type ClauseKind =
  | 'retrieval'
  | 'filtering'
  | 'projection'
  | 'mutation'
  | 'return'
  | 'ordering'
  | 'paging'
  | 'terminal';

export type QueryState = 'initial' | ClauseKind;

export type ClauseKeyword =
  | 'MATCH'
  | 'OPTIONAL MATCH'
  | 'CALL'
  | 'UNWIND'
  | 'WHERE'
  | 'WITH'
  | 'CREATE'
  | 'MERGE'
  | 'SET'
  | 'REMOVE'
  | 'DELETE'
  | 'DETACH DELETE'
  | 'RETURN'
  | 'ORDER BY'
  | 'SKIP/LIMIT';

export const KEYWORD_KIND: Readonly<Record<ClauseKeyword, ClauseKind>> = {
  'MATCH': 'retrieval',
  'OPTIONAL MATCH': 'retrieval',
  'CALL': 'retrieval',
  'UNWIND': 'retrieval',
  'WHERE': 'filtering',
  'WITH': 'projection',
  'CREATE': 'mutation',
  'MERGE': 'mutation',
  'SET': 'mutation',
  'REMOVE': 'mutation',
  'DELETE': 'mutation',
  'DETACH DELETE': 'mutation',
  'RETURN': 'return',
  'ORDER BY': 'ordering',
  'SKIP/LIMIT': 'paging',
};

export const CLAUSE_KINDS: readonly ClauseKind[] = [
  'retrieval',
  'filtering',
  'projection',
  'mutation',
  'return',
  'ordering',
  'paging',
  'terminal',
];

export const QUERY_STATES: readonly QueryState[] = ['initial', ...CLAUSE_KINDS];

/**
 * Allowed next clause kinds per state. A retrieval clause after a filtering
 * stage needs an explicit projection (WITH) in between; ordering and paging
 * only ever follow RETURN (WITH-level ordering is not emitted by the builder).
 */
export const TRANSITIONS: Readonly<Record<QueryState, ReadonlySet<ClauseKind>>> = {
  initial: new Set<ClauseKind>(['retrieval', 'projection', 'mutation', 'return']),
  retrieval: new Set<ClauseKind>(['retrieval', 'filtering', 'projection', 'mutation', 'return']),
  filtering: new Set<ClauseKind>(['projection', 'mutation', 'return']),
  projection: new Set<ClauseKind>(['retrieval', 'filtering', 'projection', 'mutation', 'return']),
  mutation: new Set<ClauseKind>(['mutation', 'projection', 'return', 'terminal']),
  return: new Set<ClauseKind>(['ordering', 'paging', 'terminal']),
  ordering: new Set<ClauseKind>(['paging', 'terminal']),
  paging: new Set<ClauseKind>(['terminal']),
  terminal: new Set<ClauseKind>(),
};

export function canTransition(from: QueryState, next: ClauseKind): boolean {
  return TRANSITIONS[from].has(next);
}

/**
 * Pure transition function: returns the state after accepting `next`,
 * or throws InvalidClauseOrderError naming both ends.
 */
export function transition(from: QueryState, next: ClauseKind): QueryState {
  if (!canTransition(from, next)) {
    throw new InvalidClauseOrderError(from, next);
  }
  return next;
}
