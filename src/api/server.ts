import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { probeRoutes } from './routes/probe.js';
import { registry } from '../metrics/index.js';
import { getOrchestrator } from '../bootstrap.js';
import type { ProbeOrchestrator } from '../services/probeOrchestrator.js';

export interface BuildServerOptions {
  orchestrator?: ProbeOrchestrator;
}

export async function buildServer(opts: BuildServerOptions = {}) {
  const app = Fastify({ logger: getLogger() });
  const orchestrator = opts.orchestrator ?? getOrchestrator();

  app.get('/healthz', async () => ({
    status: 'ok',
    time: new Date().toISOString(),
    build: {
      version: process.env.npm_package_version || 'dev',
      node: process.version,
    },
  }));

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  await app.register(probeRoutes, { orchestrator });

  // Unified error handler (fallback); the probe route itself never throws.
  app.setErrorHandler((error, _req, reply) => {
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  return app;
}
