// tests/lib/utils/api-error-handler.test.ts

import { createAppError } from '../../../lib/config/error-codes';
import {
  createErrorApiResponse,
  createSuccessResponse,
  createWarning,
  generateRequestId,
  handleError,
} from '../../../lib/utils/api-error-handler';
import { ValidationError } from '../../../types/errors';

describe('handleError', () => {
  test('AppError keeps its registry code and technical detail', () => {
    const apiError = handleError(createAppError('EXT_002', undefined, 'empty choices'), { requestId: 'req-1' });

    expect(apiError.code).toBe('EXT_002');
    expect(apiError.kind).toBe('EXTERNAL_SERVICE');
    expect(apiError.technical).toBe('empty choices');
    expect(apiError.requestId).toBe('req-1');
  });

  test('plain errors are classified by message', () => {
    expect(handleError(new Error('Unexpected token } in JSON at position 4')).code).toBe('PARSE_001');
    expect(handleError(new Error('relation "opportunity_reports" does not exist')).code).toBe('DB_001');
    expect(handleError(new Error('EACCES: permission denied, open \'out/report.md\'')).code).toBe('FILE_001');
  });

  test('unmatched errors use the default code and keep the message as technical', () => {
    const apiError = handleError(new Error('boom'), { defaultCode: 'EXT_001', context: 'enrich' });

    expect(apiError.code).toBe('EXT_001');
    expect(apiError.technical).toBe('boom');
    expect(apiError.details).toBe('The AI summarizer did not return a usable analysis. Context: enrich');
  });

  test('non-error values fall back to UNKNOWN', () => {
    const apiError = handleError('not an error');

    expect(apiError.code).toBe('UNKNOWN');
    expect(apiError.details).toBe('An unexpected error occurred. Error: not an error');
  });
});

describe('response helpers', () => {
  test('success response omits an empty warning list', () => {
    const response = createSuccessResponse({ ok: true }, { requestId: 'req-2', warnings: [], duration: 12 });

    expect(response.success).toBe(true);
    expect(response.data).toEqual({ ok: true });
    expect(response.warnings).toBeUndefined();
    expect(response.meta?.requestId).toBe('req-2');
    expect(response.meta?.duration).toBe(12);
  });

  test('validation errors list each field as a warning', () => {
    const error = new ValidationError([
      { field: 'request.product_name', code: 'too_small', message: 'product_name is required' },
      { field: 'request.reviews.0.rating', code: 'too_big', message: 'Number must be less than or equal to 5' },
    ]);
    const response = createErrorApiResponse(error, { requestId: 'req-3' });

    expect(response.success).toBe(false);
    expect(response.error?.code).toBe('VALID_001');
    expect(response.error?.message).toBe('Validation failed for: request.product_name, request.reviews.0.rating');
    expect(response.warnings).toEqual([
      { code: 'too_small', message: 'request.product_name: product_name is required' },
      { code: 'too_big', message: 'request.reviews.0.rating: Number must be less than or equal to 5' },
    ]);
  });

  test('warnings carry the registry message and the error text', () => {
    expect(createWarning('DB_001', new Error('timeout'))).toEqual({
      code: 'DB_001',
      message: 'Report save failed',
      details: 'timeout',
    });
    expect(createWarning('FILE_001')).toEqual({
      code: 'FILE_001',
      message: 'Report file write failed',
      details: 'The rendered report could not be written to disk.',
    });
  });

  test('request ids are prefixed and distinct', () => {
    const first = generateRequestId();
    expect(first.startsWith('req_')).toBe(true);
    expect(generateRequestId()).not.toBe(first);
  });
});
