/**
 * Application Errors
 *
 * Every failure the services raise on purpose extends AppError, so the HTTP
 * error middleware can map it to a status code without string matching.
 */

export type ErrorCode =
  | 'STREAMER_NOT_FOUND'
  | 'DONATION_NOT_FOUND'
  | 'INVALID_TIERS'
  | 'STREAMER_INACTIVE'
  | 'INVALID_DONOR_ADDRESS'
  | 'INVALID_STREAMER_WALLET'
  | 'AMOUNT_OUT_OF_RANGE'
  | 'NO_MATCHING_TIER'
  | 'DUPLICATE_WALLET'
  | 'CORRUPTED_RECORD'
  | 'STORAGE_FAILURE';

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
}

export class NoMatchingTierError extends ValidationError {
  readonly availableAmounts: number[];

  constructor(amountUsd: number, availableAmounts: number[]) {
    super(
      `Invalid donation amount: $${amountUsd}. Must match one of: ${availableAmounts
        .map((amount) => `$${amount.toFixed(2)}`)
        .join(', ')}`,
      'NO_MATCHING_TIER'
    );
    this.availableAmounts = availableAmounts;
  }
}

export class ConflictError extends AppError {
  readonly statusCode = 409;
}

/**
 * Stored data that violates an invariant the write path should have enforced
 */
export class DataIntegrityError extends AppError {
  readonly statusCode = 500;
}

export class CorruptedRecordError extends AppError {
  readonly statusCode = 500;
  readonly key: string;

  constructor(key: string, reason: string, options?: { cause?: unknown }) {
    super(`Corrupted record at ${key}: ${reason}`, 'CORRUPTED_RECORD', options);
    this.key = key;
  }
}

export class StorageError extends AppError {
  readonly statusCode = 500;

  constructor(operation: string, cause: unknown) {
    super(
      `Storage ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'STORAGE_FAILURE',
      { cause }
    );
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
