import crypto from 'crypto';
import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  PutLogEventsCommand,
  PutRetentionPolicyCommand,
  ResourceAlreadyExistsException,
} from '@aws-sdk/client-cloudwatch-logs';
import type { Logger } from 'pino';
import type { LogStreamConfig } from '../config/index.js';
import type { LogLevel, LogStreamHandle } from '../core/types.js';
import { LogServiceError, errorMessage } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';
import { logStreamFailuresTotal } from '../metrics/index.js';

export interface LogStreamManagerOptions extends LogStreamConfig {
  now?: () => Date;
  newId?: () => string;
  logger?: Logger;
}

/** UTC yyyyMMddHHmmss */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * Owns the remote log stream of a single invocation. Every operation is best
 * effort: failures are reported to the local logger and never reach the caller.
 */
export class LogStreamManager {
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly logger: Logger;

  constructor(
    private readonly client: CloudWatchLogsClient,
    private readonly opts: LogStreamManagerOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? (() => crypto.randomUUID());
    this.logger = opts.logger ?? getLogger();
  }

  streamName(): string {
    // Timestamp alone collides for invocations within the same second.
    return `${this.opts.streamPrefix}${compactTimestamp(this.now())}-${this.newId()}`;
  }

  async createStream(): Promise<LogStreamHandle | undefined> {
    const handle: LogStreamHandle = {
      logGroupName: this.opts.logGroupName,
      streamName: this.streamName(),
    };
    try {
      await this.ensureLogGroup();
      await this.client.send(
        new CreateLogStreamCommand({
          logGroupName: handle.logGroupName,
          logStreamName: handle.streamName,
        }),
      );
      this.logger.debug({ logStream: handle.streamName }, 'log stream created');
      return handle;
    } catch (err) {
      const failure = new LogServiceError(
        `Failed to create custom log stream: ${errorMessage(err)}`,
        err,
      );
      logStreamFailuresTotal.inc({ operation: 'create' });
      this.logger.error({ err: failure, logGroup: handle.logGroupName }, failure.message);
      return undefined;
    }
  }

  async emit(handle: LogStreamHandle | undefined, message: string, level: LogLevel): Promise<void> {
    if (!handle) return;
    try {
      await this.client.send(
        new PutLogEventsCommand({
          logGroupName: handle.logGroupName,
          logStreamName: handle.streamName,
          logEvents: [{ timestamp: this.now().getTime(), message: `[${level}] ${message}` }],
        }),
      );
    } catch (err) {
      const failure = new LogServiceError(
        `Failed to write to custom log stream: ${errorMessage(err)}`,
        err,
      );
      logStreamFailuresTotal.inc({ operation: 'emit' });
      this.logger.error({ err: failure, logStream: handle.streamName }, failure.message);
    }
  }

  private async ensureLogGroup(): Promise<void> {
    try {
      await this.client.send(new CreateLogGroupCommand({ logGroupName: this.opts.logGroupName }));
    } catch (err) {
      if (err instanceof ResourceAlreadyExistsException) return;
      throw err;
    }
    // Only a group this call created gets the retention policy.
    await this.client.send(
      new PutRetentionPolicyCommand({
        logGroupName: this.opts.logGroupName,
        retentionInDays: this.opts.retentionInDays,
      }),
    );
  }
}
