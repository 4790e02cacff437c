import type { CredentialRecord, ProbeResult, TestRecord } from '../core/types.js';
import {
  ConnectionError,
  ProbeError,
  UnexpectedError,
  errorMessage,
} from '../core/errors.js';
import type { DatabaseConnector, DatabaseSession } from '../db/client.js';
import { dbConnectionsClosedTotal } from '../metrics/index.js';
import type { ProbeLogger } from './probeLogger.js';

export const TEST_TABLE = 'connectivity_probe_test';
export const TEST_MARKER = 'Connectivity probe test record';

// Temp table: visible to this session only and dropped when the connection closes.
export const PROBE_SQL = {
  version: 'SELECT version() AS version',
  begin: 'BEGIN',
  createTable: `CREATE TEMP TABLE IF NOT EXISTS ${TEST_TABLE} (
    id serial PRIMARY KEY,
    created_at timestamptz NOT NULL,
    test_value text NOT NULL
  )`,
  insert: `INSERT INTO ${TEST_TABLE} (created_at, test_value)
    VALUES (current_timestamp, $1)
    RETURNING id, created_at, test_value`,
  selectById: `SELECT id, created_at, test_value FROM ${TEST_TABLE} WHERE id = $1`,
  deleteById: `DELETE FROM ${TEST_TABLE} WHERE id = $1`,
  commit: 'COMMIT',
  rollback: 'ROLLBACK',
} as const;

type VersionRow = { version: string };
type TestRow = { id: number; created_at: Date | string; test_value: string };

export interface ConnectivityProbeOptions {
  connectTimeoutMs: number;
}

function toTestRecord(row: TestRow): TestRecord {
  const ts = row.created_at instanceof Date ? row.created_at : new Date(row.created_at);
  return { id: row.id, timestamp: ts.toISOString(), text: row.test_value };
}

export class ConnectivityProbe {
  constructor(
    private readonly connect: DatabaseConnector,
    private readonly opts: ConnectivityProbeOptions = { connectTimeoutMs: 5000 },
  ) {}

  async run(credential: CredentialRecord, log: ProbeLogger): Promise<ProbeResult> {
    let session: DatabaseSession | undefined;
    try {
      await log.info(`Attempting to connect to database at ${credential.host}`, {
        host: credential.host,
        port: credential.port,
        database: credential.database,
      });
      session = await this.open(credential);
      return await this.exercise(session, log);
    } catch (err) {
      const failure =
        err instanceof ConnectionError
          ? err
          : new UnexpectedError(`Database operation failed: ${errorMessage(err)}`, err);
      await log.error(failure.message, { kind: failure.kind });
      return {
        status: 'Failed',
        error: failure.message,
        errorKind: failure.kind,
      };
    } finally {
      if (session) await this.close(session, log);
    }
  }

  private async open(credential: CredentialRecord): Promise<DatabaseSession> {
    try {
      return await this.connect({
        host: credential.host,
        port: Number(credential.port),
        database: credential.database,
        user: credential.user,
        password: credential.password,
        connectTimeoutMs: this.opts.connectTimeoutMs,
      });
    } catch (err) {
      throw new ConnectionError(`Database connection failed: ${errorMessage(err)}`, err);
    }
  }

  private async exercise(session: DatabaseSession, log: ProbeLogger): Promise<ProbeResult> {
    const [versionRow] = await session.query<VersionRow>(PROBE_SQL.version);
    if (!versionRow) throw new UnexpectedError('version() returned no rows');
    const version = versionRow.version;
    await log.info(`Database version: ${version}`);

    await session.query(PROBE_SQL.begin);
    try {
      await session.query(PROBE_SQL.createTable);

      const [inserted] = await session.query<TestRow>(PROBE_SQL.insert, [TEST_MARKER]);
      if (!inserted) throw new UnexpectedError('Insert returned no row');
      const testRecord = toTestRecord(inserted);
      await log.info(`Test record inserted: ${JSON.stringify(testRecord)}`);

      const visible = await session.query<TestRow>(PROBE_SQL.selectById, [testRecord.id]);
      if (visible.length === 0) {
        throw new UnexpectedError(`Inserted test record ${testRecord.id} is not visible`);
      }
      await log.info(`Record verification: ${JSON.stringify(toTestRecord(visible[0]))}`);

      await session.query(PROBE_SQL.deleteById, [testRecord.id]);
      await log.info(`Deleted test record with ID: ${testRecord.id}`);

      const remaining = await session.query<TestRow>(PROBE_SQL.selectById, [testRecord.id]);
      if (remaining.length > 0) {
        await log.warn(`Record ${testRecord.id} still exists after deletion`);
      } else {
        log.debug('Record successfully deleted', { id: testRecord.id });
      }

      await session.query(PROBE_SQL.commit);
      return {
        status: 'Success',
        version,
        testRecord,
        deletedRecordId: testRecord.id,
      };
    } catch (err) {
      await this.rollback(session, log, err);
      throw err;
    }
  }

  private async rollback(session: DatabaseSession, log: ProbeLogger, cause: unknown) {
    try {
      await session.query(PROBE_SQL.rollback);
    } catch (err) {
      log.debug('Rollback failed', {
        err: errorMessage(err),
        cause: cause instanceof ProbeError ? cause.kind : errorMessage(cause),
      });
    }
  }

  private async close(session: DatabaseSession, log: ProbeLogger): Promise<void> {
    try {
      await session.close();
      dbConnectionsClosedTotal.inc();
      log.debug('Database connection closed');
    } catch (err) {
      await log.warn(`Database connection close failed: ${errorMessage(err)}`);
    }
  }
}
