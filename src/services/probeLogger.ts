import type { Logger } from 'pino';
import type { LogLevel, LogStreamHandle } from '../core/types.js';

export interface RemoteLogSink {
  emit(handle: LogStreamHandle | undefined, message: string, level: LogLevel): Promise<void>;
}

type Fields = Record<string, unknown>;

/**
 * Writes each probe event to the local process log and to the invocation's
 * remote log stream, in that order. None of the methods reject.
 */
export class ProbeLogger {
  constructor(
    private readonly local: Logger,
    private readonly remote: RemoteLogSink,
    readonly handle: LogStreamHandle | undefined,
  ) {}

  info(message: string, fields: Fields = {}): Promise<void> {
    return this.write('INFO', message, fields);
  }

  warn(message: string, fields: Fields = {}): Promise<void> {
    return this.write('WARN', message, fields);
  }

  error(message: string, fields: Fields = {}): Promise<void> {
    return this.write('ERROR', message, fields);
  }

  /** Local-only; for diagnostics that do not belong in the invocation's stream. */
  debug(message: string, fields: Fields = {}): void {
    this.local.debug(fields, message);
  }

  private async write(level: LogLevel, message: string, fields: Fields): Promise<void> {
    const withStream = this.handle ? { ...fields, logStream: this.handle.streamName } : fields;
    try {
      switch (level) {
        case 'INFO':
          this.local.info(withStream, message);
          break;
        case 'WARN':
          this.local.warn(withStream, message);
          break;
        case 'ERROR':
          this.local.error(withStream, message);
          break;
      }
    } catch (err) {
      // Local sink broken (e.g. closed destination); stderr is the last resort.
      console.error('local log sink failed', err);
    }
    await this.remote.emit(this.handle, message, level);
  }
}
