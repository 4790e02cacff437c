import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  ResourceNotFoundException,
  DecryptionFailure,
} from '@aws-sdk/client-secrets-manager';
import {
  SecretResolver,
  parseCredentialPayload,
} from '../../src/services/secretResolver.js';
import {
  SecretAccessError,
  SecretFormatError,
  UnexpectedError,
} from '../../src/core/errors.js';
import { VALID_SECRET, fakeSecretsClient } from '../utils/fakes.js';

const silent = pino({ level: 'silent' });

describe('parseCredentialPayload', () => {
  it('maps the secret fields onto a credential record', () => {
    expect(parseCredentialPayload(JSON.stringify(VALID_SECRET))).toEqual({
      host: 'db.internal.test',
      port: '5433',
      database: 'appdb',
      user: 'probe_user',
      password: 'test-password',
    });
  });

  it('defaults the port to 5432', () => {
    const { port: _port, ...noPort } = VALID_SECRET;
    expect(parseCredentialPayload(JSON.stringify(noPort)).port).toBe('5432');
  });

  it('accepts a numeric string port', () => {
    const cred = parseCredentialPayload(JSON.stringify({ ...VALID_SECRET, port: '6543' }));
    expect(cred.port).toBe('6543');
  });

  it('tolerates RDS-managed metadata keys', () => {
    const payload = { ...VALID_SECRET, engine: 'postgres', dbClusterIdentifier: 'cluster-a' };
    expect(parseCredentialPayload(JSON.stringify(payload)).host).toBe('db.internal.test');
  });

  it('rejects text that is not JSON without evaluating it', () => {
    const code = "{'host': 'h', 'dbname': 'd', 'username': 'u', 'password': __import__('os')}";
    expect(() => parseCredentialPayload(code)).toThrow(SecretFormatError);
    expect(() => parseCredentialPayload(code)).toThrow('Secret payload is not valid JSON');
  });

  it('rejects unknown keys', () => {
    const payload = JSON.stringify({ ...VALID_SECRET, sslmode: 'disable' });
    expect(() => parseCredentialPayload(payload)).toThrow(/Unrecognized key/);
  });

  it('names missing fields but never echoes values', () => {
    const { password: _pw, ...noPassword } = VALID_SECRET;
    let caught: unknown;
    try {
      parseCredentialPayload(JSON.stringify({ ...noPassword, username: 'secret-user-value' }));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SecretFormatError);
    const msg = (caught as Error).message;
    expect(msg).toContain('password: Required');
    expect(msg).not.toContain('secret-user-value');
  });

  it('rejects a JSON array', () => {
    expect(() => parseCredentialPayload('[1,2,3]')).toThrow(/\(root\): Expected object, received array/);
  });

  it('rejects a non-numeric port', () => {
    const payload = JSON.stringify({ ...VALID_SECRET, port: 'fivefour' });
    expect(() => parseCredentialPayload(payload)).toThrow(SecretFormatError);
  });

  it.each([
    ['0', 'greater than or equal to 1'],
    [0, 'greater than or equal to 1'],
    ['99999', 'less than or equal to 65535'],
    [70000, 'less than or equal to 65535'],
  ])('rejects out-of-range port %j', (port, reason) => {
    const payload = JSON.stringify({ ...VALID_SECRET, port });
    expect(() => parseCredentialPayload(payload)).toThrow(SecretFormatError);
    expect(() => parseCredentialPayload(payload)).toThrow(`port: Number must be ${reason}`);
  });

  it('accepts the highest valid port in either form', () => {
    expect(parseCredentialPayload(JSON.stringify({ ...VALID_SECRET, port: '65535' })).port).toBe('65535');
    expect(parseCredentialPayload(JSON.stringify({ ...VALID_SECRET, port: 65535 })).port).toBe('65535');
  });
});

describe('SecretResolver', () => {
  it('resolves a string secret', async () => {
    const fake = fakeSecretsClient({ SecretString: JSON.stringify(VALID_SECRET) });
    const resolver = new SecretResolver(fake.client, silent);
    const cred = await resolver.resolve('prod/db/probe');
    expect(fake.requested).toEqual(['prod/db/probe']);
    expect(cred.database).toBe('appdb');
  });

  it('wraps provider errors with their code', async () => {
    const fake = fakeSecretsClient(
      new ResourceNotFoundException({
        message: "Secrets Manager can't find the specified secret.",
        $metadata: {},
      }),
    );
    const resolver = new SecretResolver(fake.client, silent);
    const err = await resolver.resolve('missing').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SecretAccessError);
    expect(err).toMatchObject({
      kind: 'SecretAccessError',
      code: 'ResourceNotFoundException',
      message:
        "Secrets Manager error (ResourceNotFoundException): Secrets Manager can't find the specified secret.",
    });
  });

  it('keeps the code of other provider exceptions', async () => {
    const fake = fakeSecretsClient(
      new DecryptionFailure({ message: 'kms key disabled', $metadata: {} }),
    );
    const err = await new SecretResolver(fake.client, silent).resolve('s').catch((e: unknown) => e);
    expect(err).toMatchObject({ code: 'DecryptionFailure' });
  });

  it('treats transport failures as unexpected', async () => {
    const fake = fakeSecretsClient(new Error('getaddrinfo ENOTFOUND secretsmanager'));
    const err = await new SecretResolver(fake.client, silent).resolve('s').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnexpectedError);
    expect((err as Error).message).toBe(
      'Unexpected secrets error: getaddrinfo ENOTFOUND secretsmanager',
    );
  });

  it('rejects binary secrets', async () => {
    const fake = fakeSecretsClient({ SecretBinary: new Uint8Array([1, 2, 3]) });
    await expect(new SecretResolver(fake.client, silent).resolve('s')).rejects.toThrow(
      new SecretFormatError('Secret binary not supported'),
    );
  });
});
