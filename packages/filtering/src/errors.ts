/**
 * Filter configuration is missing, mistyped or would make scoring undefined.
 * Fatal: the run stops before any job is looked at.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * The dedup store could not be read, created, locked or appended to.
 * Fatal: continuing would risk reprocessing jobs or losing dedup state.
 */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
    this.path = path;
  }
}
