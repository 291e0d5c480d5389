// lib/config/env.ts
// Environment configuration parsed once with zod

import { z } from 'zod';
import { createAppError } from './error-codes';

const optionalString = z
  .string()
  .trim()
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

export const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  SUPABASE_URL: z.string().trim().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  REPORTS_TABLE: z.string().trim().min(1).default('opportunity_reports'),
  REPORT_OUTPUT_DIR: z.string().trim().min(1).default('output'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'critical']).default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Parse configuration from the given environment (process.env by default).
 * Throws CONFIG_001 listing every invalid variable.
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse({
    OPENAI_API_KEY: env.OPENAI_API_KEY,
    OPENAI_MODEL: env.OPENAI_MODEL || undefined,
    SUPABASE_URL: env.SUPABASE_URL || undefined,
    SUPABASE_SERVICE_ROLE_KEY: env.SUPABASE_SERVICE_ROLE_KEY,
    REPORTS_TABLE: env.REPORTS_TABLE || undefined,
    REPORT_OUTPUT_DIR: env.REPORT_OUTPUT_DIR || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const fields = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw createAppError('CONFIG_001', fields);
  }

  return parsed.data;
}

/**
 * Whether Supabase persistence is fully configured
 */
export function hasSupabaseConfig(config: EnvConfig): config is EnvConfig & {
  SUPABASE_URL: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
} {
  return Boolean(config.SUPABASE_URL && config.SUPABASE_SERVICE_ROLE_KEY);
}
