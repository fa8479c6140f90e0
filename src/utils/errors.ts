export type JournalErrorKind =
  | 'OutOfRange'
  | 'NotFound'
  | 'InvalidArgument'
  | 'JournalExhausted'
  | 'PartialFailure';

export class JournalAppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JournalAppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Errors raised by the journal core. `kind` is the value the boundary layer sees.
 */
export class JournalOperationError extends JournalAppError {
  public readonly kind: JournalErrorKind;

  constructor(kind: JournalErrorKind, message: string, options?: ErrorOptions) {
    super(message, `JOURNAL_${kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase()}`, options);
    this.name = 'JournalOperationError';
    this.kind = kind;
  }
}

export class OutOfRangeError extends JournalOperationError {
  constructor(message: string, options?: ErrorOptions) {
    super('OutOfRange', message, options);
    this.name = 'OutOfRangeError';
  }
}

export class NotFoundError extends JournalOperationError {
  constructor(message: string, options?: ErrorOptions) {
    super('NotFound', message, options);
    this.name = 'NotFoundError';
  }
}

export class InvalidArgumentError extends JournalOperationError {
  constructor(message: string, options?: ErrorOptions) {
    super('InvalidArgument', message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class JournalExhaustedError extends JournalOperationError {
  constructor(message: string, options?: ErrorOptions) {
    super('JournalExhausted', message, options);
    this.name = 'JournalExhaustedError';
  }
}

export interface PartialFailureDetails<T> {
  /** Whatever the operation completed before reporting. */
  outcome: T;
  /** Article ids whose external side effect failed. */
  failedArticleIds: number[];
}

export class PartialFailureError<T = unknown> extends JournalOperationError {
  public readonly outcome: T;
  public readonly failedArticleIds: number[];

  constructor(message: string, details: PartialFailureDetails<T>, options?: ErrorOptions) {
    super('PartialFailure', message, options);
    this.name = 'PartialFailureError';
    this.outcome = details.outcome;
    this.failedArticleIds = details.failedArticleIds;
  }
}

export class CatalogError extends JournalAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CATALOG_ERROR', options);
    this.name = 'CatalogError';
  }
}

export class ConfigError extends JournalAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
