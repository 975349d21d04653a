/**
 * Error taxonomy.
 *
 * Only TransportError ever reaches the top of a render cycle. The others are
 * caught where they are raised and turned into a degraded view.
 */

/** Market data call failed outright (transport or unparseable body). */
export class TransportError extends Error {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
    this.name = 'TransportError';
  }
}

/** A provider answered, but not in the shape we read. */
export class ProviderFormatError extends Error {
  constructor(
    public readonly provider: string,
    public readonly field: string,
    public readonly rawValue: unknown,
    detail: string,
  ) {
    super(`[${provider}] Unexpected payload at ${field}: ${detail}`);
    this.name = 'ProviderFormatError';
  }
}

/** Credentials or signing secret missing. */
export class AuthConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthConfigError';
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly variable: string,
    public readonly rawValue: string,
    detail: string,
  ) {
    super(`Invalid ${variable}="${rawValue}": ${detail}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
