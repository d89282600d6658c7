/**
 * Root of every Flotilla error: a stable `code` for callers that branch on
 * the kind of failure, optional structured `details`, and the underlying
 * failure as the standard `cause`.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BaseError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ConfigurationErrorOptions {
  /** File the bad configuration came from */
  source?: string;
  /** One line per failed check, as `path: message` */
  issues?: string[];
  cause?: unknown;
}

/**
 * A config file, environment override or agent definition that cannot be used.
 */
export class ConfigurationError extends BaseError {
  readonly source: string | null;
  readonly issues: string[];

  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    super(message, 'CONFIGURATION_ERROR', options.issues, options.cause);
    this.name = 'ConfigurationError';
    this.source = options.source ?? null;
    this.issues = options.issues ?? [];
  }
}

/** The metadata store could not be opened or migrated */
export class DatabaseError extends BaseError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, 'DATABASE_ERROR', { path }, cause);
    this.name = 'DatabaseError';
  }
}

/**
 * A call to a remote deployment server failed. `status` is the HTTP status
 * when the server answered, null when it could not be reached.
 */
export class NetworkError extends BaseError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    cause?: unknown
  ) {
    super(message, 'NETWORK_ERROR', status === null ? undefined : { status }, cause);
    this.name = 'NetworkError';
  }
}
