import type { Context } from 'aws-lambda';
import pino, { type Logger } from 'pino';
import { getOrchestrator } from './bootstrap.js';
import { ConfigurationError, ProbeError, describeKind, errorMessage } from './core/errors.js';
import type { ResponseEnvelope } from './core/types.js';
import { probeFailuresTotal, probeInvocationsTotal } from './metrics/index.js';
import { MESSAGES, type ProbeOrchestrator } from './services/probeOrchestrator.js';

export type { ResponseEnvelope } from './core/types.js';

// getLogger() reads the same configuration that just failed to load.
let fallbackLogger: Logger | undefined;

function startupLogger(): Logger {
  if (!fallbackLogger) fallbackLogger = pino({ level: 'error' });
  return fallbackLogger;
}

/** Lambda entry point. The event payload is not inspected. */
export async function handler(event: unknown, context: Context): Promise<ResponseEnvelope> {
  let orchestrator: ProbeOrchestrator;
  try {
    orchestrator = getOrchestrator();
  } catch (err) {
    return startupFailure(err, context.awsRequestId);
  }
  return orchestrator.execute(event, { requestId: context.awsRequestId });
}

function startupFailure(err: unknown, requestId: string): ResponseEnvelope {
  const failure =
    err instanceof ProbeError
      ? err
      : new ConfigurationError(`Invalid configuration: ${errorMessage(err)}`, err);
  const error = `Probe execution failed: ${failure.message}`;
  try {
    startupLogger().error({ err: failure, kind: failure.kind, requestId }, error);
  } catch (logErr) {
    console.error(error, logErr);
  }
  probeFailuresTotal.inc({ kind: describeKind(failure.kind) });
  probeInvocationsTotal.inc({ status_code: '500' });
  return { statusCode: 500, body: { message: MESSAGES.executionError, error } };
}
