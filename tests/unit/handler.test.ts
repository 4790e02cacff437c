import { describe, it, expect, vi } from 'vitest';
import { probeHarness } from '../utils/probe.js';
import { lambdaContext } from '../utils/lambda.js';

const harness = probeHarness();

vi.mock('../../src/bootstrap.js', () => ({
  getOrchestrator: () => harness.orchestrator,
}));

const { handler } = await import('../../src/handler.js');

describe('lambda handler', () => {
  it('returns the orchestrator envelope and tags the request id', async () => {
    const res = await handler({ source: 'aws.events' }, lambdaContext('req-lambda-1'));
    expect(res.statusCode).toBe(200);
    const tagged = harness.lines.filter((l) => l.requestId === 'req-lambda-1');
    expect(tagged.length).toBeGreaterThan(0);
  });
});
