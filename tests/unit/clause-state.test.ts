import { describe, it, expect } from 'vitest';
import {
  CLAUSE_KINDS,
  KEYWORD_KIND,
  QUERY_STATES,
  TRANSITIONS,
  canTransition,
  transition,
  type ClauseKind,
  type QueryState,
} from '../../src/query/clause-state.js';
import { InvalidClauseOrderError } from '../../src/errors.js';

const EXPECTED: Record<QueryState, ClauseKind[]> = {
  initial: ['retrieval', 'projection', 'mutation', 'return'],
  retrieval: ['retrieval', 'filtering', 'projection', 'mutation', 'return'],
  filtering: ['projection', 'mutation', 'return'],
  projection: ['retrieval', 'filtering', 'projection', 'mutation', 'return'],
  mutation: ['mutation', 'projection', 'return', 'terminal'],
  return: ['ordering', 'paging', 'terminal'],
  ordering: ['paging', 'terminal'],
  paging: ['terminal'],
  terminal: [],
};

describe('clause state machine', () => {
  it('covers every state', () => {
    expect(Object.keys(TRANSITIONS).sort()).toEqual([...QUERY_STATES].sort());
  });

  for (const from of QUERY_STATES) {
    for (const next of CLAUSE_KINDS) {
      const allowed = EXPECTED[from].includes(next);
      it(`${from} -> ${next} is ${allowed ? 'allowed' : 'rejected'}`, () => {
        expect(canTransition(from, next)).toBe(allowed);
        if (allowed) {
          expect(transition(from, next)).toBe(next);
        } else {
          try {
            transition(from, next);
            expect.fail('expected InvalidClauseOrderError');
          } catch (err) {
            expect(err).toBeInstanceOf(InvalidClauseOrderError);
            expect((err as InvalidClauseOrderError).from).toBe(from);
            expect((err as InvalidClauseOrderError).attempted).toBe(next);
          }
        }
      });
    }
  }

  it('rejects retrieval straight after filtering', () => {
    expect(() => transition('filtering', 'retrieval')).toThrow(
      'A retrieval clause cannot follow the filtering stage',
    );
  });

  it('maps keywords to clause kinds', () => {
    expect(KEYWORD_KIND['OPTIONAL MATCH']).toBe('retrieval');
    expect(KEYWORD_KIND['CALL']).toBe('retrieval');
    expect(KEYWORD_KIND['WHERE']).toBe('filtering');
    expect(KEYWORD_KIND['WITH']).toBe('projection');
    expect(KEYWORD_KIND['DETACH DELETE']).toBe('mutation');
    expect(KEYWORD_KIND['SKIP/LIMIT']).toBe('paging');
  });
});
