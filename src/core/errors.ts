export type ProbeErrorKind =
  | 'ConnectionError'
  | 'SecretAccessError'
  | 'SecretFormatError'
  | 'LogServiceError'
  | 'ConfigurationError'
  | 'UnexpectedError';

export abstract class ProbeError extends Error {
  abstract readonly kind: ProbeErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = new.target.name;
  }
}

/** Timeout, authentication or network failure while opening the database connection. */
export class ConnectionError extends ProbeError {
  readonly kind = 'ConnectionError';
}

/** The secret store refused the request; `code` is the provider's error code. */
export class SecretAccessError extends ProbeError {
  readonly kind = 'SecretAccessError';

  constructor(
    readonly code: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

/** The secret payload is binary, not JSON, or does not match the credential shape. */
export class SecretFormatError extends ProbeError {
  readonly kind = 'SecretFormatError';
}

export class LogServiceError extends ProbeError {
  readonly kind = 'LogServiceError';
}

export class ConfigurationError extends ProbeError {
  readonly kind = 'ConfigurationError';
}

export class UnexpectedError extends ProbeError {
  readonly kind = 'UnexpectedError';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function toProbeError(err: unknown): ProbeError {
  if (err instanceof ProbeError) return err;
  return new UnexpectedError(errorMessage(err), err);
}

/** Exhaustive over the closed set of kinds; used as the `kind` metric label. */
export function describeKind(kind: ProbeErrorKind): string {
  switch (kind) {
    case 'ConnectionError':
      return 'connection';
    case 'SecretAccessError':
      return 'secret_access';
    case 'SecretFormatError':
      return 'secret_format';
    case 'LogServiceError':
      return 'log_service';
    case 'ConfigurationError':
      return 'configuration';
    case 'UnexpectedError':
      return 'unexpected';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}
