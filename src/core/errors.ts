export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// Raised when a durable write did not complete; callers must treat the operation as not having happened.
export class PersistenceFailure extends Error {
  readonly underlying?: unknown;

  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message);
    this.name = 'PersistenceFailure';
    this.underlying = cause;
  }
}

export const errorCode = (err: unknown): unknown => (err instanceof Error && 'code' in err ? err.code : undefined);
