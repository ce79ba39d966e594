/**
 * Application Error Types
 *
 * Typed error codes with safe, user-facing messages. Soft degradations are never
 * errors; they travel inside the plan artifact instead.
 */

export type AppErrorCode =
  | 'CONFLICTING_PANTRY_ENTRY'
  | 'INSUFFICIENT_CATALOG'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFIG_INVALID';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: AppErrorCode, safeMessage: string, causeOrDetails?: unknown) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails !== undefined) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  toJSON(): { code: AppErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Raw pantry input holds the same canonical ingredient twice, or a quantity
 * that is not a finite, non-negative number.
 */
export class ConflictingPantryEntryError extends AppError {
  constructor(message: string, details: { ingredient: string; key: string; reason: 'duplicate' | 'malformed' }) {
    super('CONFLICTING_PANTRY_ENTRY', message, details);
    this.name = 'ConflictingPantryEntryError';
  }
}

/**
 * No recipe survives the hard filters, so not even one meal slot can be filled.
 */
export class InsufficientCatalogError extends AppError {
  constructor(message: string, details: { catalogSize: number; eligible: number; reason: 'hard-constraints' | 'recent-use' }) {
    super('INSUFFICIENT_CATALOG', message, details);
    this.name = 'InsufficientCatalogError';
  }
}

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
  CONFLICTING_PANTRY_ENTRY: 409,
  INSUFFICIENT_CATALOG: 422,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFIG_INVALID: 500,
};

export function httpStatusFor(error: AppError): number {
  return STATUS_BY_CODE[error.code];
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
