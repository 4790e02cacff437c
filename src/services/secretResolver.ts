import { z } from 'zod';
import {
  GetSecretValueCommand,
  SecretsManagerClient,
  SecretsManagerServiceException,
} from '@aws-sdk/client-secrets-manager';
import type { Logger } from 'pino';
import type { CredentialRecord } from '../core/types.js';
import {
  SecretAccessError,
  SecretFormatError,
  UnexpectedError,
  errorMessage,
} from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

export const DEFAULT_PORT = '5432';

// RDS-managed secrets also carry engine / cluster metadata; anything else is rejected.
export const secretPayloadSchema = z
  .object({
    host: z.string().min(1),
    port: z
      .union([z.string().regex(/^\d+$/, 'must be numeric').transform(Number), z.number().int()])
      .pipe(z.number().min(1).max(65535))
      .optional(),
    dbname: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    engine: z.string().optional(),
    dbClusterIdentifier: z.string().optional(),
    dbInstanceIdentifier: z.string().optional(),
  })
  .strict();

/**
 * Parse a secret string into a credential record. The text is only ever read as
 * JSON; issues report field paths, never field values.
 */
export function parseCredentialPayload(text: string): CredentialRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SecretFormatError('Secret payload is not valid JSON', err);
  }
  const parsed = secretPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new SecretFormatError(`Secret payload has an unexpected shape (${issues})`);
  }
  const p = parsed.data;
  return {
    host: p.host,
    port: p.port === undefined ? DEFAULT_PORT : String(p.port),
    database: p.dbname,
    user: p.username,
    password: p.password,
  };
}

export class SecretResolver {
  constructor(
    private readonly client: SecretsManagerClient,
    private readonly logger: Logger = getLogger(),
  ) {}

  async resolve(secretId: string): Promise<CredentialRecord> {
    this.logger.info({ secretId }, `Retrieving secrets for: ${secretId}`);
    let secretString: string | undefined;
    try {
      const res = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
      secretString = res.SecretString;
    } catch (err) {
      if (err instanceof SecretsManagerServiceException) {
        throw new SecretAccessError(
          err.name,
          `Secrets Manager error (${err.name}): ${err.message}`,
          err,
        );
      }
      throw new UnexpectedError(`Unexpected secrets error: ${errorMessage(err)}`, err);
    }
    if (typeof secretString !== 'string') {
      throw new SecretFormatError('Secret binary not supported');
    }
    const credential = parseCredentialPayload(secretString);
    this.logger.info({ secretId }, 'Successfully retrieved database secrets');
    return credential;
  }
}
