import type { ZodType } from 'zod';
import { logger, type LogMeta } from './logger.js';

export class StoryError extends Error {
  public readonly code: string;
  public readonly userMessage: string;
  public readonly context?: LogMeta;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: string = 'UNKNOWN_ERROR',
    userMessage?: string,
    context?: LogMeta,
    isRetryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoryError';
    this.code = code;
    this.userMessage = userMessage || 'Something went wrong. Please try again.';
    this.context = context;
    this.isRetryable = isRetryable;
  }
}

export class InvalidConfigError extends StoryError {
  public readonly key: string;
  public readonly envVar?: string;

  constructor(key: string, reason: string, details: { envVar?: string; value?: unknown } = {}) {
    super(
      `Invalid setting "${key}": ${reason}`,
      'INVALID_CONFIG',
      `Invalid setting ${details.envVar ?? key}: ${reason}`,
      { key, envVar: details.envVar, value: details.value },
      false
    );
    this.name = 'InvalidConfigError';
    this.key = key;
    this.envVar = details.envVar;
  }
}

export class GenerationFailedError extends StoryError {
  constructor(message: string, context?: LogMeta, cause?: unknown, isRetryable: boolean = true) {
    super(
      message,
      'GENERATION_FAILED',
      'The storyteller lost its train of thought. Try again.',
      context,
      isRetryable,
      { cause }
    );
    this.name = 'GenerationFailedError';
  }
}

export class EmptyCandidateSetError extends StoryError {
  constructor(vocabSize: number) {
    super(
      'No token has probability mass left after filtering',
      'EMPTY_CANDIDATE_SET',
      undefined,
      { vocabSize },
      false
    );
    this.name = 'EmptyCandidateSetError';
  }
}

export class PersistenceError extends StoryError {
  constructor(message: string, operation?: string, context?: LogMeta, cause?: unknown) {
    super(
      message,
      'PERSISTENCE_ERROR',
      'Saving or loading the story failed.',
      { operation, ...context },
      false,
      { cause }
    );
    this.name = 'PersistenceError';
  }
}

export class OperationAbortedError extends StoryError {
  constructor(reason?: unknown) {
    super('Operation was cancelled', 'ABORTED', 'Cancelled.', { reason: describeError(reason) }, false);
    this.name = 'OperationAbortedError';
  }
}

function describeError(error: unknown): unknown {
  return error instanceof Error ? error.message : error;
}

// Promise timeout wrapper
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, errorMessage?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(errorMessage || `Operation timed out after ${timeoutMs}ms`)),
          timeoutMs
        );
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Settles with `promise` unless `signal` aborts first, in which case it rejects with
 * {@link OperationAbortedError} and leaves the original promise to finish unobserved.
 */
export function abandonOnAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new OperationAbortedError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      promise.catch(() => undefined);
      reject(new OperationAbortedError(signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// Retry wrapper with exponential backoff
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = 3,
  baseDelay: number = 1000,
  shouldRetry?: (error: unknown) => boolean
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delay = baseDelay * Math.pow(2, attempt);
      logger.warn(`Retry attempt ${attempt + 1}/${maxRetries} after ${delay}ms`, {
        error: describeError(error),
        attempt: attempt + 1,
        maxRetries
      });

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof StoryError) {
    return error.isRetryable;
  }

  const code = readProperty(error, 'code');
  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
    return true;
  }

  const status = readProperty(error, 'status');
  if (typeof status === 'number') {
    return (status >= 500 && status < 600) || status === 429;
  }

  return false;
}

// Circuit breaker for the remote model service
export class CircuitBreaker {
  private failures: number = 0;
  private lastFailureTime: number = 0;
  private state: 'CLOSED' | 'OPEN' | 'HALF_OPEN' = 'CLOSED';

  constructor(
    private maxFailures: number = 5,
    private resetTimeout: number = 60000
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() - this.lastFailureTime > this.resetTimeout) {
        this.state = 'HALF_OPEN';
        logger.info('Circuit breaker transitioning to HALF_OPEN state');
      } else {
        throw new StoryError(
          'Circuit breaker is OPEN',
          'CIRCUIT_BREAKER_OPEN',
          'The model service is temporarily unavailable',
          { failures: this.failures },
          true
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'HALF_OPEN') {
        this.reset();
        logger.info('Circuit breaker reset to CLOSED state');
      }

      return result;
    } catch (error) {
      if (!(error instanceof OperationAbortedError)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private recordFailure() {
    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.failures >= this.maxFailures) {
      this.state = 'OPEN';
      logger.error(`Circuit breaker opened after ${this.failures} failures`);
    }
  }

  private reset() {
    this.failures = 0;
    this.state = 'CLOSED';
  }

  getState() {
    return {
      state: this.state,
      failures: this.failures,
      lastFailureTime: this.lastFailureTime
    };
  }
}

export function safeJsonParse<T>(json: string, schema: ZodType<T>, fallback: T): T {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    logger.warn('JSON parse failed', {
      json: json.slice(0, 100),
      error: describeError(error)
    });
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('JSON did not match the expected shape', {
      json: json.slice(0, 100),
      issues: parsed.error.issues.map((issue) => issue.message)
    });
    return fallback;
  }
  return parsed.data;
}

export function setupGlobalErrorHandlers(onShutdown?: () => void) {
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack,
      pid: process.pid
    });
    process.exitCode = 1;
    onShutdown?.();
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: describeError(reason),
      stack: reason instanceof Error ? reason.stack : undefined
    });
  });

  process.on('warning', (warning) => {
    logger.warn('Process warning', {
      name: warning.name,
      message: warning.message
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    onShutdown?.();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
}

export function formatErrorForUser(error: unknown): string {
  if (error instanceof StoryError) {
    return error.userMessage;
  }

  return 'An unexpected error occurred. Please try again.';
}

export function formatErrorForLogging(error: unknown, context?: LogMeta): LogMeta {
  const baseInfo: LogMeta = {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    name: error instanceof Error ? error.name : 'Unknown',
    ...context
  };

  if (error instanceof StoryError) {
    return {
      ...baseInfo,
      code: error.code,
      userMessage: error.userMessage,
      context: error.context,
      isRetryable: error.isRetryable,
      cause: describeError(error.cause)
    };
  }

  return baseInfo;
}
