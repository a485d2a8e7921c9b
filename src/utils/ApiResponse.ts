/**
 * ApiResponse
 *
 * Uniform response bodies for the HTTP routes.
 *
 * Standard Response Format:
 *   Success: { success: true, data: T, message?: string }
 *   Error:   { success: false, error: string, code?: string, details?: unknown }
 */

import { Response } from 'express';
import { ZodError } from 'zod';
import { getErrorMessage } from './errorUtils';
import { Logger } from './logger';

export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: unknown;
  timestamp?: string;
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  code?: string;
}

export const HttpStatus = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class ApiResponse {
  static success<T>(res: Response, data: T, message?: string, status: number = HttpStatus.OK): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
    };

    if (message) {
      response.message = message;
    }

    return res.status(status).json(response);
  }

  /**
   * Send an error response
   *
   * @param details - Extra payload attached as `details`
   */
  static error(
    res: Response,
    error: string | Error,
    status: number = HttpStatus.INTERNAL_SERVER_ERROR,
    code?: ErrorCode,
    details?: unknown
  ): Response {
    const message = error instanceof Error ? error.message : error;

    const response: ErrorResponse = {
      success: false,
      error: message,
      timestamp: new Date().toISOString(),
    };

    if (code) {
      response.code = code;
    }

    if (details !== undefined) {
      response.details = details;
    }

    return res.status(status).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, HttpStatus.BAD_REQUEST, ErrorCodes.INVALID_INPUT, details);
  }

  static validationError(
    res: Response,
    errors: ValidationErrorDetail[] | string[],
    message: string = 'Validation failed'
  ): Response {
    return this.error(res, message, HttpStatus.UNPROCESSABLE_ENTITY, ErrorCodes.VALIDATION_ERROR, { errors });
  }

  static zodError(res: Response, zodError: ZodError): Response {
    const errors: ValidationErrorDetail[] = zodError.errors.map((e) => ({
      field: e.path.join('.') || 'unknown',
      message: e.message,
      code: e.code,
    }));

    return this.validationError(res, errors);
  }

  static unauthorized(res: Response, message: string = 'Authentication required', details?: unknown): Response {
    return this.error(res, message, HttpStatus.UNAUTHORIZED, ErrorCodes.UNAUTHORIZED, details);
  }

  static notFound(res: Response, resource: string = 'Resource'): Response {
    return this.error(res, `${resource} not found`, HttpStatus.NOT_FOUND, ErrorCodes.NOT_FOUND);
  }

  static internalError(res: Response, error: string | Error = 'Internal server error'): Response {
    return this.error(res, error, HttpStatus.INTERNAL_SERVER_ERROR, ErrorCodes.INTERNAL_ERROR);
  }

  /**
   * Map a thrown value to a response: zod errors become 422, everything else 500.
   */
  static handleException(res: Response, error: unknown, operation: string = 'Operation'): Response {
    Logger.error(`[ApiResponse] ${operation} failed`, { error: getErrorMessage(error) });

    if (error instanceof ZodError) {
      return this.zodError(res, error);
    }

    return this.internalError(res, getErrorMessage(error));
  }
}

export default ApiResponse;
