// lib/observability/retry.ts
// Retry and exponential backoff for calls that leave the process
// Provides configurable retry logic with jitter and retryable-error classification

import { logger, ErrorCategory, PipelineType } from './logging';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
  retryableErrors: string[];
  nonRetryableErrors: string[];
  retryableStatuses: number[];
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
  totalDuration: number;
  finalAttemptAt: string;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  retryableErrors: [
    'ECONNRESET',
    'ENOTFOUND',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'NETWORK_ERROR',
    'TIMEOUT',
    'RATE_LIMIT',
    'SERVICE_UNAVAILABLE',
    'PARSE_001',
    'EXT_002'
  ],
  nonRetryableErrors: [
    'VALIDATION_ERROR',
    'AUTHENTICATION_ERROR',
    'INVALID_REQUEST',
    'CONFIG_004'
  ],
  retryableStatuses: [408, 429, 500, 502, 503, 504]
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function readStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class RetryManager {
  static async executeWithRetry<T>(
    fn: () => Promise<T>,
    pipeline: PipelineType,
    operationName: string,
    config: Partial<RetryConfig> = {}
  ): Promise<RetryResult<T>> {
    const retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };

    const startTime = Date.now();
    let lastError: Error = new Error(`${operationName} was not attempted`);
    let attempts = 0;

    for (let attempt = 1; attempt <= retryConfig.maxAttempts; attempt++) {
      attempts = attempt;

      try {
        const result = await fn();

        return {
          success: true,
          result,
          attempts,
          totalDuration: Date.now() - startTime,
          finalAttemptAt: new Date().toISOString()
        };
      } catch (error) {
        lastError = toError(error);

        if (!this.isRetryableError(lastError, retryConfig)) {
          logger.error(pipeline, logger.classifyError(lastError),
            `Non-retryable error in ${operationName} (attempt ${attempt})`,
            lastError, {
              operation_name: operationName,
              attempt,
              error_code: readCode(lastError),
              non_retryable: true
            });

          break;
        }

        if (attempt < retryConfig.maxAttempts) {
          const delay = this.calculateDelay(attempt, retryConfig);
          logger.logRetryAttempt(pipeline, operationName, attempt, retryConfig.maxAttempts, lastError, delay);
          await this.sleep(delay);
        }
      }
    }

    const totalDuration = Date.now() - startTime;

    logger.error(pipeline, ErrorCategory.EXTERNAL_SERVICE,
      `All retry attempts failed for ${operationName}`,
      lastError, {
        operation_name: operationName,
        attempts,
        max_attempts: retryConfig.maxAttempts,
        total_duration_ms: totalDuration
      });

    return {
      success: false,
      error: lastError,
      attempts,
      totalDuration,
      finalAttemptAt: new Date().toISOString()
    };
  }

  static isRetryableError(error: Error, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
    const message = error.message;
    const code = readCode(error);

    // Non-retryable list wins
    if (config.nonRetryableErrors.some(nonRetryable =>
      message.includes(nonRetryable) || code === nonRetryable
    )) {
      return false;
    }

    const status = readStatus(error);
    if (status !== undefined && config.retryableStatuses.includes(status)) {
      return true;
    }

    return config.retryableErrors.some(retryable =>
      message.includes(retryable) || code === retryable
    );
  }

  static calculateDelay(attempt: number, config: RetryConfig): number {
    let delay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, config.maxDelayMs);

    if (config.jitter) {
      const jitterAmount = delay * 0.1; // 10% jitter
      delay += (Math.random() - 0.5) * jitterAmount;
    }

    return Math.max(0, Math.floor(delay));
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * AI API calls: 3 attempts, 1s → 2s → 4s
   */
  static async retryApiCall<T>(
    fn: () => Promise<T>,
    pipeline: PipelineType,
    apiName: string,
    config: Partial<RetryConfig> = {}
  ): Promise<RetryResult<T>> {
    return this.executeWithRetry(fn, pipeline, apiName, {
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 4000,
      backoffMultiplier: 2,
      jitter: true,
      ...config
    });
  }
}

export const retryApiCall = <T>(
  fn: () => Promise<T>,
  pipeline: PipelineType,
  apiName: string,
  config?: Partial<RetryConfig>
): Promise<RetryResult<T>> => {
  return RetryManager.retryApiCall(fn, pipeline, apiName, config);
};
