// lib/observability/logging.ts
// Structured logging for all pipelines with error classification
// Log entries go to a pluggable sink (console by default), filtered by LOG_LEVEL

import { v4 as uuidv4 } from 'uuid';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration',
  EXTERNAL_SERVICE = 'external_service',
  DATABASE = 'database',
  FILESYSTEM = 'filesystem',
  PARSE = 'parse',
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  BUSINESS_LOGIC = 'business_logic',
  SYSTEM = 'system'
}

export enum PipelineType {
  OPPORTUNITY_ANALYSIS = 'opportunity_analysis',
  REVIEW_ANALYSIS = 'review_analysis',
  CLAIM_VALIDATION = 'claim_validation',
  REVIEW_ENRICHMENT = 'review_enrichment',
  REPORT_PERSISTENCE = 'report_persistence'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50,
};

export interface StructuredLog {
  id: string;
  timestamp: string;
  level: LogLevel;
  category: ErrorCategory;
  pipeline: PipelineType;
  message: string;
  details: Record<string, unknown>;
  context: {
    request_id?: string;
    environment: string;
    version: string;
  };
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(log: StructuredLog): void;
}

export class ConsoleLogSink implements LogSink {
  write(log: StructuredLog): void {
    const logMessage = `[${log.level.toUpperCase()}] [${log.category}] [${log.pipeline}] ${log.message}`;

    switch (log.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage, log.details);
        break;
      case LogLevel.INFO:
        console.info(logMessage, log.details);
        break;
      case LogLevel.WARN:
        console.warn(logMessage, log.details);
        break;
      case LogLevel.ERROR:
      case LogLevel.CRITICAL:
        console.error(logMessage, log.details);
        if (log.error) {
          console.error('Error details:', log.error);
        }
        break;
    }
  }
}

/**
 * Keeps entries in memory; used by tests to assert on emitted logs
 */
export class MemoryLogSink implements LogSink {
  readonly logs: StructuredLog[] = [];

  write(log: StructuredLog): void {
    this.logs.push(log);
  }

  clear(): void {
    this.logs.length = 0;
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  const match = Object.values(LogLevel).find(level => level === value);
  return match ?? LogLevel.INFO;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

class Logger {
  private static instance: Logger;
  private context: StructuredLog['context'];
  private sink: LogSink = new ConsoleLogSink();
  private minLevel: LogLevel;

  private constructor() {
    this.context = {
      environment: process.env.NODE_ENV || 'development',
      version: process.env.npm_package_version || '1.0.0'
    };
    this.minLevel = parseLogLevel(process.env.LOG_LEVEL);
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setContext(context: Partial<StructuredLog['context']>): void {
    this.context = { ...this.context, ...context };
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  resetSink(): void {
    this.sink = new ConsoleLogSink();
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  private createLogEntry(
    level: LogLevel,
    category: ErrorCategory,
    pipeline: PipelineType,
    message: string,
    details: Record<string, unknown> = {},
    error?: Error
  ): StructuredLog {
    return {
      id: `log_${uuidv4()}`,
      timestamp: new Date().toISOString(),
      level,
      category,
      pipeline,
      message,
      details,
      context: this.context,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error)
      } : undefined
    };
  }

  private emit(log: StructuredLog): void {
    if (LEVEL_ORDER[log.level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    try {
      this.sink.write(log);
    } catch (sinkError) {
      // Sink failures never reach the caller
      console.error('Failed to write log:', sinkError);
    }
  }

  debug(pipeline: PipelineType, message: string, details: Record<string, unknown> = {}): void {
    this.emit(this.createLogEntry(LogLevel.DEBUG, ErrorCategory.SYSTEM, pipeline, message, details));
  }

  info(pipeline: PipelineType, message: string, details: Record<string, unknown> = {}): void {
    this.emit(this.createLogEntry(LogLevel.INFO, ErrorCategory.SYSTEM, pipeline, message, details));
  }

  warn(
    pipeline: PipelineType,
    category: ErrorCategory,
    message: string,
    error?: Error,
    details: Record<string, unknown> = {}
  ): void {
    this.emit(this.createLogEntry(LogLevel.WARN, category, pipeline, message, details, error));
  }

  error(
    pipeline: PipelineType,
    category: ErrorCategory,
    message: string,
    error: Error,
    details: Record<string, unknown> = {}
  ): void {
    this.emit(this.createLogEntry(LogLevel.ERROR, category, pipeline, message, details, error));
  }

  critical(
    pipeline: PipelineType,
    category: ErrorCategory,
    message: string,
    error: Error,
    details: Record<string, unknown> = {}
  ): void {
    this.emit(this.createLogEntry(LogLevel.CRITICAL, category, pipeline, message, details, error));
  }

  logPipelineStart(
    pipeline: PipelineType,
    details: Record<string, unknown> = {}
  ): string {
    const executionId = `exec_${uuidv4()}`;

    this.info(pipeline, 'Pipeline execution started', {
      execution_id: executionId,
      ...details
    });

    return executionId;
  }

  logPipelineEnd(
    pipeline: PipelineType,
    executionId: string,
    success: boolean,
    details: Record<string, unknown> = {},
    error?: Error
  ): void {
    const message = success ? 'Pipeline execution completed successfully' : 'Pipeline execution failed';
    const level = success ? LogLevel.INFO : LogLevel.ERROR;
    const category = error ? this.classifyError(error) : ErrorCategory.SYSTEM;

    this.emit(this.createLogEntry(level, category, pipeline, message, {
      execution_id: executionId,
      success,
      ...details
    }, error));
  }

  logRetryAttempt(
    pipeline: PipelineType,
    operationName: string,
    attempt: number,
    maxAttempts: number,
    error: Error,
    nextRetryInMs: number
  ): void {
    this.warn(pipeline, this.classifyError(error), `Retrying ${operationName} (attempt ${attempt}/${maxAttempts})`, error, {
      operation_name: operationName,
      attempt,
      max_attempts: maxAttempts,
      next_retry_in_ms: nextRetryInMs
    });
  }

  classifyError(error: Error): ErrorCategory {
    const message = error.message.toLowerCase();

    if (message.includes('network') || message.includes('fetch') || message.includes('timeout')) {
      return ErrorCategory.NETWORK;
    }
    if (message.includes('database') || message.includes('supabase') || message.includes('relation')) {
      return ErrorCategory.DATABASE;
    }
    if (message.includes('unauthorized') || message.includes('forbidden') || message.includes('api key')) {
      return ErrorCategory.AUTHENTICATION;
    }
    if (message.includes('rate limit') || message.includes('too many requests')) {
      return ErrorCategory.RATE_LIMIT;
    }
    if (message.includes('json') || message.includes('parse')) {
      return ErrorCategory.PARSE;
    }
    if (message.includes('validation') || message.includes('invalid') || message.includes('required')) {
      return ErrorCategory.VALIDATION;
    }
    if (message.includes('enoent') || message.includes('eacces') || message.includes('file')) {
      return ErrorCategory.FILESYSTEM;
    }
    if (message.includes('api') || message.includes('external') || message.includes('service')) {
      return ErrorCategory.EXTERNAL_SERVICE;
    }

    return ErrorCategory.BUSINESS_LOGIC;
  }
}

export type { Logger };

// Export singleton instance
export const logger = Logger.getInstance();
