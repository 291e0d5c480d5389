// types/errors.ts
// Error types shared by the assessment engine and its service boundary
// Provides the standardized result envelope and custom error classes

import type { ZodIssue } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR SEVERITY & KIND TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ErrorSeverity = 'info' | 'warning' | 'error' | 'critical';

/**
 * Coarse error taxonomy surfaced to callers
 */
export type ErrorKind = 'VALIDATION' | 'CONFIGURATION' | 'EXTERNAL_SERVICE' | 'PARSE' | 'INTERNAL';

// ═══════════════════════════════════════════════════════════════════════════
// API ERROR TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Standard error structure returned from every boundary operation
 */
export interface ApiError {
  code: string; // Error code from error-codes.ts (e.g., 'VALID_001')
  kind: ErrorKind;
  message: string; // User-friendly error message
  details: string; // More detailed explanation of what happened
  suggestion: string; // What the caller can do to fix it
  severity: ErrorSeverity;
  blocking: boolean; // Whether this error prevents further action
  technical?: string; // Technical details for logging
  timestamp?: string;
  requestId?: string;
}

export interface ApiWarning {
  code: string;
  message: string;
  details?: string;
}

/**
 * Standard response wrapper; failures are values, never thrown past the boundary
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  warnings?: ApiWarning[];
  meta?: {
    timestamp: string;
    requestId: string;
    duration?: number; // ms
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ERROR DEFINITION TYPE (for error-codes.ts)
// ═══════════════════════════════════════════════════════════════════════════

export interface ErrorDefinition {
  code: string;
  kind: ErrorKind;
  message: string;
  details: string;
  suggestion: string;
  severity: ErrorSeverity;
  blocking: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error carrying a registry definition. Thrown inside services,
 * converted to ApiError at the pipeline boundary.
 */
export class AppError extends Error {
  code: string;
  kind: ErrorKind;
  details: string;
  suggestion: string;
  severity: ErrorSeverity;
  blocking: boolean;
  technical?: string;
  timestamp: string;

  constructor(
    errorDef: ErrorDefinition,
    additionalDetails?: string,
    technical?: string
  ) {
    super(errorDef.message);

    this.name = 'AppError';
    this.code = errorDef.code;
    this.kind = errorDef.kind;
    this.details = additionalDetails
      ? `${errorDef.details} ${additionalDetails}`
      : errorDef.details;
    this.suggestion = errorDef.suggestion;
    this.severity = errorDef.severity;
    this.blocking = errorDef.blocking;
    this.technical = technical;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  toApiError(requestId?: string): ApiError {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      severity: this.severity,
      blocking: this.blocking,
      technical: this.technical,
      timestamp: this.timestamp,
      requestId,
    };
  }

  toApiResponse<T = never>(requestId?: string): ApiResponse<T> {
    return {
      success: false,
      error: this.toApiError(requestId),
      meta: {
        timestamp: this.timestamp,
        requestId: requestId || 'unknown',
      },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidationErrorItem {
  field: string;
  code: string;
  message: string;
}

/**
 * Input validation failure with field-level items
 */
export class ValidationError extends Error {
  code: string = 'VALID_001';
  kind: ErrorKind = 'VALIDATION';
  errors: ValidationErrorItem[];
  timestamp: string;

  constructor(errors: ValidationErrorItem[]) {
    const fieldNames = errors.map(e => e.field).join(', ');
    super(`Validation failed for: ${fieldNames}`);

    this.name = 'ValidationError';
    this.errors = errors;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }

  /**
   * Build from zod issues, prefixing paths with the record name
   */
  static fromZodIssues(issues: ZodIssue[], prefix?: string): ValidationError {
    return new ValidationError(
      issues.map(issue => {
        const path = issue.path.map(String).join('.');
        const field = [prefix, path].filter(Boolean).join('.') || prefix || 'input';
        return { field, code: issue.code, message: issue.message };
      })
    );
  }

  toApiError(requestId?: string): ApiError {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: `${this.errors.length} validation error(s) found.`,
      suggestion: 'Review the listed fields and correct the input.',
      severity: 'error',
      blocking: true,
      timestamp: this.timestamp,
      requestId,
    };
  }

  toApiResponse<T = never>(requestId?: string): ApiResponse<T> {
    return {
      success: false,
      error: this.toApiError(requestId),
      warnings: this.errors.map(e => ({
        code: e.code,
        message: `${e.field}: ${e.message}`,
      })),
      meta: {
        timestamp: this.timestamp,
        requestId: requestId || 'unknown',
      },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPER TYPE GUARDS
// ═══════════════════════════════════════════════════════════════════════════

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
