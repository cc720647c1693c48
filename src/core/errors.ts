/** Validation error for malformed configuration documents. */
export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Config error in ${filePath}: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/** Raised when a source cannot be retrieved: a URL after retries, or an unreadable local file. */
export class SourceFetchError extends Error {
  readonly location: string;
  readonly status?: number;

  constructor(location: string, message: string, status?: number) {
    super(message);
    this.name = 'SourceFetchError';
    this.location = location;
    this.status = status;
  }
}

/** Raised when a report sink fails after its internal retry. */
export class DeliveryError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = 'DeliveryError';
    this.attempts = attempts;
  }
}
