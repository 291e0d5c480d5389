// lib/config/error-codes.ts
// Registry of all error codes with messages and suggestions
// This is the SINGLE SOURCE OF TRUTH for error definitions

import { AppError, type ErrorDefinition, type ErrorKind } from '../../types/errors';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export const ERROR_CODES: Record<string, ErrorDefinition> = {
  // ═════════════════════════════════════════════════════════════════════════
  // VALIDATION ERRORS (VALID_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  VALID_001: {
    code: 'VALID_001',
    kind: 'VALIDATION',
    message: 'Invalid input record',
    details: 'One or more required fields are missing or malformed.',
    suggestion: 'Check the listed fields against the record schema.',
    severity: 'error',
    blocking: true,
  },
  VALID_002: {
    code: 'VALID_002',
    kind: 'VALIDATION',
    message: 'Empty review batch',
    details: 'Review analysis was requested but no review records were supplied.',
    suggestion: 'Supply at least one review record or omit the reviews field.',
    severity: 'error',
    blocking: true,
  },
  VALID_003: {
    code: 'VALID_003',
    kind: 'VALIDATION',
    message: 'Empty marketing copy',
    details: 'Copy validation was requested but the copy text is empty.',
    suggestion: 'Supply the marketing copy to validate or omit the copy field.',
    severity: 'error',
    blocking: true,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // CONFIGURATION ERRORS (CONFIG_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  CONFIG_001: {
    code: 'CONFIG_001',
    kind: 'CONFIGURATION',
    message: 'Invalid environment configuration',
    details: 'One or more environment variables have invalid values.',
    suggestion: 'Check LOG_LEVEL, SUPABASE_URL and the other variables listed in the details.',
    severity: 'critical',
    blocking: true,
  },
  CONFIG_002: {
    code: 'CONFIG_002',
    kind: 'CONFIGURATION',
    message: 'Scoring rules invalid',
    details: 'The scoring-rules.ts configuration contains out-of-range or unordered values.',
    suggestion: 'Run validateScoringConfig() and fix the reported entries in lib/config/scoring-rules.ts.',
    severity: 'critical',
    blocking: true,
  },
  CONFIG_003: {
    code: 'CONFIG_003',
    kind: 'CONFIGURATION',
    message: 'Review lexicon invalid',
    details: 'The review lexicon data could not be loaded or failed validation.',
    suggestion: 'Verify data/review-lexicon.json matches the lexicon schema.',
    severity: 'critical',
    blocking: true,
  },
  CONFIG_004: {
    code: 'CONFIG_004',
    kind: 'CONFIGURATION',
    message: 'Missing service credentials',
    details: 'A required credential for an external service is not configured.',
    suggestion: 'Set OPENAI_API_KEY or SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY as needed.',
    severity: 'warning',
    blocking: false,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // EXTERNAL SERVICE ERRORS (EXT_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  EXT_001: {
    code: 'EXT_001',
    kind: 'EXTERNAL_SERVICE',
    message: 'Review enrichment failed',
    details: 'The AI summarizer did not return a usable analysis.',
    suggestion: 'The report was produced without AI insights. Retry later or check the API key and model.',
    severity: 'warning',
    blocking: false,
  },
  EXT_002: {
    code: 'EXT_002',
    kind: 'EXTERNAL_SERVICE',
    message: 'AI service returned no content',
    details: 'The completion response contained no message content.',
    suggestion: 'Retry the request. Check the model name if this persists.',
    severity: 'warning',
    blocking: false,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // DATABASE ERRORS (DB_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  DB_001: {
    code: 'DB_001',
    kind: 'EXTERNAL_SERVICE',
    message: 'Report save failed',
    details: 'Could not store the report record.',
    suggestion: 'Check SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY and that the reports table exists.',
    severity: 'warning',
    blocking: false,
  },
  DB_002: {
    code: 'DB_002',
    kind: 'EXTERNAL_SERVICE',
    message: 'Report lookup failed',
    details: 'Could not read the report record for the keyword.',
    suggestion: 'Check database connectivity and the reports table name.',
    severity: 'warning',
    blocking: false,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // FILE ERRORS (FILE_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  FILE_001: {
    code: 'FILE_001',
    kind: 'EXTERNAL_SERVICE',
    message: 'Report file write failed',
    details: 'The rendered report could not be written to disk.',
    suggestion: 'Check that the output directory is writable.',
    severity: 'warning',
    blocking: false,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // PARSE ERRORS (PARSE_XXX)
  // ═════════════════════════════════════════════════════════════════════════
  PARSE_001: {
    code: 'PARSE_001',
    kind: 'PARSE',
    message: 'Unparseable AI response',
    details: 'The AI response was not valid JSON or did not match the expected shape.',
    suggestion: 'Retry the request. The prompt asks for JSON only.',
    severity: 'warning',
    blocking: false,
  },

  // ═════════════════════════════════════════════════════════════════════════
  // UNKNOWN
  // ═════════════════════════════════════════════════════════════════════════
  UNKNOWN: {
    code: 'UNKNOWN',
    kind: 'INTERNAL',
    message: 'Unexpected error',
    details: 'An unexpected error occurred.',
    suggestion: 'Check the logs for the technical details.',
    severity: 'error',
    blocking: true,
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Get error definition by code
 */
export function getErrorDefinition(code: string): ErrorDefinition {
  return ERROR_CODES[code] || ERROR_CODES.UNKNOWN;
}

/**
 * Create an AppError from a registry code
 */
export function createAppError(code: string, additionalDetails?: string, technical?: string): AppError {
  return new AppError(getErrorDefinition(code), additionalDetails, technical);
}

export function isValidErrorCode(code: string): boolean {
  return code in ERROR_CODES;
}

/**
 * Get all error codes for a category (e.g., 'DB' returns DB_001, DB_002)
 */
export function getErrorCodesForCategory(prefix: string): ErrorDefinition[] {
  return Object.values(ERROR_CODES).filter(e => e.code.startsWith(`${prefix}_`));
}

export function getErrorCodesForKind(kind: ErrorKind): ErrorDefinition[] {
  return Object.values(ERROR_CODES).filter(e => e.kind === kind);
}
