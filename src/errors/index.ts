/**
 * RFC 7807 error classes for the entry pass service.
 *
 * Reference: https://datatracker.ietf.org/doc/html/rfc7807
 */

// =============================================================================
// Types
// =============================================================================

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  [key: string]: unknown;
}

export interface FieldError {
  field: string;
  message: string;
}

const PROBLEM_TYPE_BASE = 'https://httpstatuses.com';

// =============================================================================
// Base Error Class
// =============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toProblemDetails(instance?: string): ProblemDetails {
    const problem: ProblemDetails = {
      type: `${PROBLEM_TYPE_BASE}/${this.statusCode}`,
      title: this.name.replace(/Error$/, '').replace(/([a-z])([A-Z])/g, '$1 $2') || 'Error',
      status: this.statusCode,
      detail: this.message,
      code: this.code,
    };

    if (instance) {
      problem.instance = instance;
    }

    if (this.details) {
      Object.assign(problem, this.details);
    }

    return problem;
  }
}

// =============================================================================
// 400 Bad Request Errors
// =============================================================================

export class ValidationError extends AppError {
  public readonly errors: FieldError[];

  constructor(message: string = 'Validation Failed', errors: FieldError[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true, { errors });
    this.errors = errors;
  }
}

// =============================================================================
// 401 / 403
// =============================================================================

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required', code: string = 'UNAUTHORIZED') {
    super(message, 401, code);
  }
}

export class InvalidCredentialsError extends AppError {
  constructor() {
    super('Invalid credentials', 401, 'INVALID_CREDENTIALS');
  }
}

export class InvalidTokenError extends AppError {
  constructor(message: string = 'Invalid or expired token') {
    super(message, 401, 'INVALID_TOKEN');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Access forbidden', code: string = 'FORBIDDEN') {
    super(message, 403, code);
  }
}

// =============================================================================
// 404 / 409
// =============================================================================

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code: string = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

export class TicketNotFoundError extends NotFoundError {
  constructor(ticketId: string) {
    super(`Ticket ${ticketId} not found`, 'TICKET_NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict', code: string = 'CONFLICT') {
    super(message, 409, code);
  }
}

// =============================================================================
// 500 Internal Server Errors
// =============================================================================

export class InternalError extends AppError {
  constructor(message: string = 'Internal server error', code: string = 'INTERNAL_ERROR') {
    super(message, 500, code, false);
  }
}

export class StorageError extends AppError {
  constructor(message: string = 'Storage operation failed', collection?: string) {
    super(message, 500, 'STORAGE_ERROR', true, collection ? { collection } : undefined);
  }
}
