/**
 * Error taxonomy for the harvester.
 *
 * - TransportError: a page could not be fetched. Fatal to the current unit only.
 * - CredentialError / ConfigError: fatal at process start.
 *
 * Storage errors are left as the driver's own errors and always propagate.
 */

export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.url = url;
    this.status = options?.status;
  }
}

export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
