// Domain model shared by the probe components; transport shapes live in api/schemas.

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface CredentialRecord {
  host: string;
  port: string;
  database: string;
  user: string;
  password: string;
}

export interface LogStreamHandle {
  readonly logGroupName: string;
  readonly streamName: string;
}

export interface TestRecord {
  id: number;
  timestamp: string; // ISO-8601, as returned by the insert
  text: string;
}

export type ProbeResult =
  | {
      status: 'Success';
      version: string;
      testRecord: TestRecord;
      deletedRecordId: number;
    }
  | {
      status: 'Failed';
      error: string;
      errorKind: 'ConnectionError' | 'UnexpectedError';
    };

export interface ResponseBody {
  message: string;
  version?: string;
  testRecord?: TestRecord;
  deletedRecordId?: number;
  error?: string;
  logStream?: string;
}

export interface ResponseEnvelope {
  statusCode: 200 | 500;
  body: ResponseBody;
}

export interface InvocationContext {
  requestId?: string;
}
