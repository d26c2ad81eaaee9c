import { toStoreError } from './errors.js';

export type QueryRow = Record<string, unknown>;

export type QueryParam = string | number | boolean | null;

export interface QueryResult<Row extends QueryRow = QueryRow> {
  rows: Row[];
  rowCount: number;
}

export interface QuerySession {
  query: <Row extends QueryRow = QueryRow>(text: string, params?: readonly QueryParam[]) => Promise<QueryResult<Row>>;
}

export interface TransactionalSession extends QuerySession {
  begin: () => Promise<void>;
  commit: () => Promise<void>;
  rollback: () => Promise<void>;
}

export interface Session extends TransactionalSession {
  release: () => void;
}

/** Raw statement runner returned by a driver; errors are still driver errors. */
export interface StatementRunner {
  run: (text: string, params: QueryParam[]) => Promise<QueryResult>;
  release: () => void;
}

export function createSession(runner: StatementRunner): Session {
  const query: QuerySession['query'] = async <Row extends QueryRow = QueryRow>(
    text: string,
    params: readonly QueryParam[] = []
  ): Promise<QueryResult<Row>> => {
    let result: QueryResult;
    try {
      result = await runner.run(text, [...params]);
    } catch (error) {
      throw toStoreError(error);
    }
    // Row shape is asserted by the statement text, not checked at run time.
    return { rows: result.rows as Row[], rowCount: result.rowCount };
  };

  return {
    query,
    begin: async () => {
      await query('BEGIN');
    },
    commit: async () => {
      await query('COMMIT');
    },
    rollback: async () => {
      await query('ROLLBACK');
    },
    release: () => runner.release()
  };
}
