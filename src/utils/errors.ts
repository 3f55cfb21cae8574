// src/utils/errors.ts
import { Response } from 'express';

export abstract class BaseError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): { name: string; message: string; statusCode: number } {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode
    };
  }
}

/**
 * Bad input, rejected before anything is persisted (400)
 */
export class ValidationError extends BaseError {
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

export class AuthenticationError extends BaseError {
  readonly statusCode = 401;
}

/**
 * Caller is neither sender nor receiver of the message it acts on (403)
 */
export class PermissionDeniedError extends BaseError {
  readonly statusCode = 403;
}

export class NotFoundError extends BaseError {
  readonly statusCode = 404;

  constructor(public readonly resource: string, id?: string) {
    super(id ? `${resource} ${id} not found` : `${resource} not found`);
  }
}

/**
 * Uniqueness violation, e.g. two edits racing for the same history version (409)
 */
export class ConflictError extends BaseError {
  readonly statusCode = 409;
}

/**
 * Shared catch block for controllers: known errors keep their status,
 * anything else is logged and answered with a generic 500.
 */
export const respondWithError = (
  res: Response,
  error: unknown,
  logLabel: string,
  fallbackMessage: string
): Response => {
  if (error instanceof BaseError) {
    return res.status(error.statusCode).json({
      success: false,
      message: error.message,
      ...(error instanceof ValidationError && error.field
        ? { errors: [{ field: error.field, message: error.message }] }
        : {})
    });
  }

  console.error(`${logLabel}:`, error);
  return res.status(500).json({
    success: false,
    message: fallbackMessage
  });
};
