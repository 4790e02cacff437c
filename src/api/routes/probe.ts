import type { FastifyInstance } from 'fastify';
import type { ProbeOrchestrator } from '../../services/probeOrchestrator.js';

export interface ProbeRoutesOptions {
  orchestrator: ProbeOrchestrator;
}

export async function probeRoutes(app: FastifyInstance, opts: ProbeRoutesOptions) {
  app.post('/v1/probe', async (req, reply) => {
    const envelope = await opts.orchestrator.execute(req.body ?? {}, { requestId: req.id });
    return reply.status(envelope.statusCode).send(envelope);
  });
}
