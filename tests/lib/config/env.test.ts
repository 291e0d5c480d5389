// tests/lib/config/env.test.ts

import { getEnvConfig, hasSupabaseConfig } from '../../../lib/config/env';
import { isAppError } from '../../../types/errors';

describe('getEnvConfig', () => {
  test('applies defaults for an empty environment', () => {
    const config = getEnvConfig({});

    expect(config).toEqual({
      OPENAI_API_KEY: undefined,
      OPENAI_MODEL: 'gpt-4o-mini',
      SUPABASE_URL: undefined,
      SUPABASE_SERVICE_ROLE_KEY: undefined,
      REPORTS_TABLE: 'opportunity_reports',
      REPORT_OUTPUT_DIR: 'output',
      LOG_LEVEL: 'info',
    });
  });

  test('treats blank keys as unset', () => {
    const config = getEnvConfig({ OPENAI_API_KEY: '   ' });
    expect(config.OPENAI_API_KEY).toBeUndefined();
  });

  test('reads explicit values', () => {
    const config = getEnvConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_MODEL: 'gpt-4o',
      REPORTS_TABLE: 'reports',
      LOG_LEVEL: 'debug',
    });

    expect(config.OPENAI_API_KEY).toBe('test-key');
    expect(config.OPENAI_MODEL).toBe('gpt-4o');
    expect(config.REPORTS_TABLE).toBe('reports');
    expect(config.LOG_LEVEL).toBe('debug');
  });

  test('throws CONFIG_001 for an invalid log level', () => {
    let caught: unknown;
    try {
      getEnvConfig({ LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(isAppError(caught)).toBe(true);
    if (isAppError(caught)) {
      expect(caught.code).toBe('CONFIG_001');
      expect(caught.kind).toBe('CONFIGURATION');
      expect(caught.details).toContain('LOG_LEVEL');
    }
  });

  test('throws for a malformed Supabase URL', () => {
    expect(() => getEnvConfig({ SUPABASE_URL: 'not a url' })).toThrow('Invalid environment configuration');
  });
});

describe('hasSupabaseConfig', () => {
  test('requires both URL and service key', () => {
    expect(hasSupabaseConfig(getEnvConfig({ SUPABASE_URL: 'http://localhost:54321' }))).toBe(false);
    expect(hasSupabaseConfig(getEnvConfig({
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-key',
    }))).toBe(true);
  });
});
