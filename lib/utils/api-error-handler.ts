// lib/utils/api-error-handler.ts
// Converts any error into the standardized ApiResponse format

import {
  type ApiError,
  type ApiResponse,
  type ApiWarning,
  isAppError,
  isValidationError,
} from '../../types/errors';
import { getErrorDefinition } from '../config/error-codes';

// ═══════════════════════════════════════════════════════════════════════════
// REQUEST ID GENERATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Generate a unique request ID for tracking
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Determines error code from error message patterns
 */
function getErrorCodeFromMessage(message: string): string {
  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('json') || lowerMessage.includes('parse')) {
    return 'PARSE_001';
  }
  if (lowerMessage.includes('supabase') || lowerMessage.includes('relation')) {
    return 'DB_001';
  }
  if (lowerMessage.includes('enoent') || lowerMessage.includes('eacces') || lowerMessage.includes('eisdir')) {
    return 'FILE_001';
  }
  if (lowerMessage.includes('openai') || lowerMessage.includes('completion')) {
    return 'EXT_001';
  }

  return 'UNKNOWN';
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN ERROR HANDLER
// ═══════════════════════════════════════════════════════════════════════════

interface HandleErrorOptions {
  context?: string;
  requestId?: string;
  defaultCode?: string;
}

/**
 * Convert any thrown value to an ApiError
 */
export function handleError(
  error: unknown,
  options: HandleErrorOptions = {}
): ApiError {
  const { context, requestId = generateRequestId(), defaultCode = 'UNKNOWN' } = options;
  const timestamp = new Date().toISOString();

  if (isAppError(error) || isValidationError(error)) {
    return error.toApiError(requestId);
  }

  if (error instanceof Error) {
    const matched = getErrorCodeFromMessage(error.message);
    const code = matched === 'UNKNOWN' ? defaultCode : matched;
    const def = getErrorDefinition(code);

    return {
      code: def.code,
      kind: def.kind,
      message: def.message,
      details: context
        ? `${def.details} Context: ${context}`
        : def.details,
      suggestion: def.suggestion,
      severity: def.severity,
      blocking: def.blocking,
      technical: error.message,
      timestamp,
      requestId,
    };
  }

  const def = getErrorDefinition(defaultCode);
  return {
    code: def.code,
    kind: def.kind,
    message: def.message,
    details: context
      ? `${def.details} Error: ${String(error)}. Context: ${context}`
      : `${def.details} Error: ${String(error)}`,
    suggestion: def.suggestion,
    severity: def.severity,
    blocking: def.blocking,
    timestamp,
    requestId,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// API RESPONSE HELPERS
// ═══════════════════════════════════════════════════════════════════════════

export function createSuccessResponse<T>(
  data: T,
  options: { requestId?: string; warnings?: ApiWarning[]; duration?: number } = {}
): ApiResponse<T> {
  const requestId = options.requestId || generateRequestId();
  return {
    success: true,
    data,
    warnings: options.warnings && options.warnings.length > 0 ? options.warnings : undefined,
    meta: {
      timestamp: new Date().toISOString(),
      requestId,
      duration: options.duration,
    },
  };
}

export function createErrorApiResponse<T = never>(
  error: unknown,
  options: HandleErrorOptions = {}
): ApiResponse<T> {
  const requestId = options.requestId || generateRequestId();

  if (isValidationError(error)) {
    return error.toApiResponse<T>(requestId);
  }

  return {
    success: false,
    error: handleError(error, { ...options, requestId }),
    meta: {
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

/**
 * Warning entry for a non-blocking failure
 */
export function createWarning(code: string, error?: unknown): ApiWarning {
  const def = getErrorDefinition(code);
  return {
    code: def.code,
    message: def.message,
    details: error instanceof Error ? error.message : def.details,
  };
}
