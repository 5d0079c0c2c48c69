// Custom error types for better error handling

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ConfigCorruptError extends Error {
  constructor(
    message: string,
    public filePath: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigCorruptError';
  }
}

export class ConfigPersistError extends Error {
  constructor(
    message: string,
    public filePath: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigPersistError';
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public operation: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class PrefixTooLongError extends Error {
  constructor(
    public prefixLength: number,
    public limit: number
  ) {
    super(`Prefix of ${prefixLength} characters leaves no room under the ${limit} character limit`);
    this.name = 'PrefixTooLongError';
  }
}
