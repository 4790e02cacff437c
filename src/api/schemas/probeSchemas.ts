import { z } from 'zod';
import type { ResponseEnvelope } from '../../core/types.js';

export const testRecordSchema = z.object({
  id: z.number().int(),
  timestamp: z.string().datetime(),
  text: z.string(),
});

export const responseBodySchema = z
  .object({
    message: z.string().min(1),
    version: z.string().min(1).optional(),
    testRecord: testRecordSchema.optional(),
    deletedRecordId: z.number().int().optional(),
    error: z.string().optional(),
    logStream: z.string().min(1).optional(),
  })
  .strict();

export const responseEnvelopeSchema: z.ZodType<ResponseEnvelope> = z.object({
  statusCode: z.union([z.literal(200), z.literal(500)]),
  body: responseBodySchema,
});
