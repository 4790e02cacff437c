import pg from 'pg';
import type { Client, QueryResultRow } from 'pg';
import { getLogger } from '../utils/logging.js';

export interface ConnectionParams {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectTimeoutMs: number;
}

/** One open connection, owned by a single probe invocation. */
export interface DatabaseSession {
  query<R extends QueryResultRow>(sql: string, values?: unknown[]): Promise<R[]>;
  close(): Promise<void>;
}

export type DatabaseConnector = (params: ConnectionParams) => Promise<DatabaseSession>;

class PgSession implements DatabaseSession {
  constructor(private readonly client: Client) {}

  async query<R extends QueryResultRow>(sql: string, values?: unknown[]): Promise<R[]> {
    const res = await this.client.query<R>(sql, values);
    return res.rows;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

// Never pooled: every invocation opens and closes its own client.
export const pgConnector: DatabaseConnector = async (params) => {
  const client = new pg.Client({
    host: params.host,
    port: params.port,
    database: params.database,
    user: params.user,
    password: params.password,
    connectionTimeoutMillis: params.connectTimeoutMs,
  });
  client.on('error', (err) => {
    getLogger().error({ err, host: params.host }, 'Database client error');
  });
  try {
    await client.connect();
  } catch (err) {
    await client.end().catch((endErr: unknown) => {
      getLogger().debug({ err: endErr, host: params.host }, 'Failed to end unconnected client');
    });
    throw err;
  }
  return new PgSession(client);
};
