import type { StorageKind } from './types.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown at startup when no storage backend in the fallback chain could be opened.
 */
export class StorageUnavailableError extends Error {
  readonly attempted: StorageKind[];

  constructor(attempted: StorageKind[]) {
    super(`No storage backend available (tried: ${attempted.join(', ')})`);
    this.name = 'StorageUnavailableError';
    this.attempted = attempted;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
