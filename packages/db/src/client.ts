import { readFile } from 'node:fs/promises';
import postgres from 'postgres';
import { toStoreError } from './errors.js';
import { buildConnectionOptions, type DbConfig } from './connection-config.js';
import { createSession, type QueryParam, type QueryResult, type QueryRow, type Session, type StatementRunner } from './session.js';

export interface DbConnection {
  /** Reserve the connection for exclusive use, e.g. by one transaction executor. */
  reserve: () => Promise<Session>;
  close: () => Promise<void>;
}

function createStatementRunner(sql: postgres.Sql, release: () => void): StatementRunner {
  return {
    run: async (text: string, params: QueryParam[]): Promise<QueryResult> => {
      const rows = await sql.unsafe<QueryRow[]>(text, params);
      return {
        rows: [...rows],
        rowCount: rows.count
      };
    },
    release
  };
}

export async function connectWithIdToken(config: DbConfig, idToken: string): Promise<DbConnection> {
  const rootCert = await readFile(config.sslRootCertPath, 'utf8');
  const sql = postgres(buildConnectionOptions(config, idToken, rootCert));

  return {
    reserve: async (): Promise<Session> => {
      try {
        const reserved = await sql.reserve();
        return createSession(createStatementRunner(reserved, () => reserved.release()));
      } catch (error) {
        throw toStoreError(error);
      }
    },
    close: async (): Promise<void> => {
      await sql.end({ timeout: 5 });
    }
  };
}
