import type { Logger } from 'pino';
import type {
  InvocationContext,
  LogStreamHandle,
  ProbeResult,
  ResponseEnvelope,
} from '../core/types.js';
import {
  ConfigurationError,
  ProbeError,
  UnexpectedError,
  describeKind,
  toProbeError,
} from '../core/errors.js';
import { responseEnvelopeSchema } from '../api/schemas/probeSchemas.js';
import { getLogger } from '../utils/logging.js';
import {
  probeDurationSeconds,
  probeFailuresTotal,
  probeInvocationsTotal,
} from '../metrics/index.js';
import type { ConnectivityProbe } from './connectivityProbe.js';
import type { LogStreamManager } from './logStreamManager.js';
import { ProbeLogger } from './probeLogger.js';
import type { SecretResolver } from './secretResolver.js';

export const MESSAGES = {
  success: 'Successfully connected to and tested the database',
  failed: 'Failed to connect to database',
  executionError: 'Probe execution error',
} as const;

export interface ProbeOrchestratorDeps {
  secretId: string | undefined;
  logStreams: LogStreamManager;
  secrets: SecretResolver;
  probe: ConnectivityProbe;
  logger?: Logger;
}

export class ProbeOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: ProbeOrchestratorDeps) {
    this.logger = deps.logger ?? getLogger();
  }

  /** Runs one invocation. Always resolves with a 200 or 500 envelope. */
  async execute(_event: unknown, invocation: InvocationContext = {}): Promise<ResponseEnvelope> {
    const endTimer = probeDurationSeconds.startTimer();
    const local = invocation.requestId
      ? this.logger.child({ requestId: invocation.requestId })
      : this.logger;
    let handle: LogStreamHandle | undefined;
    let envelope: ResponseEnvelope;
    try {
      handle = await this.deps.logStreams.createStream();
      const log = new ProbeLogger(local, this.deps.logStreams, handle);
      envelope = await this.run(log);
    } catch (err) {
      envelope = await this.fail(
        toProbeError(err),
        new ProbeLogger(local, this.deps.logStreams, handle),
      );
    }
    endTimer();
    probeInvocationsTotal.inc({ status_code: String(envelope.statusCode) });
    return envelope;
  }

  private async run(log: ProbeLogger): Promise<ResponseEnvelope> {
    const secretId = this.deps.secretId;
    if (!secretId) {
      throw new ConfigurationError('DB_SECRET_NAME is not configured');
    }
    const credential = await this.deps.secrets.resolve(secretId);
    const result = await this.deps.probe.run(credential, log);
    if (result.status === 'Success') {
      await log.info(MESSAGES.success);
    } else {
      probeFailuresTotal.inc({ kind: describeKind(result.errorKind) });
      await log.error(MESSAGES.failed, { kind: result.errorKind });
    }
    return this.validated(toEnvelope(result, log.handle));
  }

  private async fail(err: ProbeError, log: ProbeLogger): Promise<ResponseEnvelope> {
    const error = `Probe execution failed: ${err.message}`;
    probeFailuresTotal.inc({ kind: describeKind(err.kind) });
    await log.error(error, { kind: err.kind, err });
    return {
      statusCode: 500,
      body: {
        message: MESSAGES.executionError,
        error,
        ...(log.handle ? { logStream: log.handle.streamName } : {}),
      },
    };
  }

  private validated(envelope: ResponseEnvelope): ResponseEnvelope {
    const parsed = responseEnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      throw new UnexpectedError(`Response failed validation: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

export function toEnvelope(
  result: ProbeResult,
  handle: LogStreamHandle | undefined,
): ResponseEnvelope {
  const logStream = handle ? { logStream: handle.streamName } : {};
  if (result.status === 'Success') {
    return {
      statusCode: 200,
      body: {
        message: MESSAGES.success,
        version: result.version,
        testRecord: result.testRecord,
        deletedRecordId: result.deletedRecordId,
        ...logStream,
      },
    };
  }
  return {
    statusCode: 500,
    body: {
      message: MESSAGES.failed,
      error: result.error,
      ...logStream,
    },
  };
}
