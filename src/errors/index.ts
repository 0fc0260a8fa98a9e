export type ValidationErrorKind =
  | 'InvalidDate'
  | 'InvalidAmount'
  | 'InvalidCategory'
  | 'InvalidDescription'
  | 'InvalidId';

export type LedgerErrorKind =
  | ValidationErrorKind
  | 'MigrationFailure'
  | 'IOFailure'
  | 'InvalidFormat';

/**
 * Base class for every error raised by the ledger core
 */
export abstract class LedgerError extends Error {
  abstract readonly kind: LedgerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export abstract class TransactionValidationError extends LedgerError {
  abstract readonly kind: ValidationErrorKind;

  /** 1-based record number, set when the value was read from the ledger file */
  storedRecord?: number;

  /**
   * Mark the error as coming from a stored row rather than from a caller
   */
  atStoredRecord(file: string, record: number): this {
    this.message = `Record ${record} in ${file}: ${this.message}`;
    this.storedRecord = record;
    return this;
  }
}

export class InvalidDateError extends TransactionValidationError {
  readonly kind = 'InvalidDate';
}

export class InvalidAmountError extends TransactionValidationError {
  readonly kind = 'InvalidAmount';
}

export class InvalidCategoryError extends TransactionValidationError {
  readonly kind = 'InvalidCategory';
}

export class InvalidDescriptionError extends TransactionValidationError {
  readonly kind = 'InvalidDescription';
}

export class InvalidIdError extends TransactionValidationError {
  readonly kind = 'InvalidId';
}

/**
 * Raised when a legacy ledger could not be upgraded.
 * The store refuses further work until initialization succeeds.
 */
export class MigrationError extends LedgerError {
  readonly kind = 'MigrationFailure';
}

export class StorageError extends LedgerError {
  readonly kind = 'IOFailure';

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidFormatError extends LedgerError {
  readonly kind = 'InvalidFormat';
}

export function isValidationError(error: unknown): error is TransactionValidationError {
  return error instanceof TransactionValidationError;
}

/**
 * True for a validation failure in a caller's input, as opposed to a corrupt stored row
 */
export function isInputValidationError(error: unknown): error is TransactionValidationError {
  return isValidationError(error) && error.storedRecord === undefined;
}

// Realm-independent: fs errors seen under Jest are not instances of this realm's Error
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
