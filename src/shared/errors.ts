export class ImporterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ImporterError';
  }
}

export class ConfigError extends ImporterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends ImporterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class DestinationError extends ImporterError {
  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'DESTINATION_ERROR', details);
    this.name = 'DestinationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
