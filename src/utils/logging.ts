import pino, { type DestinationStream, type Logger } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: Logger | null = null;

function collectorSink(): { logs: string[]; sink: DestinationStream } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink };
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = pino({ level: cfg.logging.level }, collectorSink().sink);
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        base: { service: 'db-connectivity-probe' },
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level = 'info') {
  const { logs, sink } = collectorSink();
  loggerInstance = pino({ level }, sink);
  return logs;
}
