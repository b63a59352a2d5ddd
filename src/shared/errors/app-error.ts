import { BaseError } from './base.error.js';

/**
 * Distinguishes the error kinds callers react to differently:
 * configuration errors abort construction, usage errors abort a single call,
 * resource errors are normally recovered from internally.
 */
export type ErrorCategory = 'configuration' | 'usage' | 'resource' | 'unexpected';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly category: ErrorCategory;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends BaseError {
  public readonly category: ErrorCategory;

  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
    this.category = options.category;
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, category: 'unexpected' });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided payload.',
      metadata,
      category: 'configuration',
      exposeMessage: true,
    });
  }

  public static configuration(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
    cause?: unknown,
  ): AppError {
    return new AppError({ code, message, metadata, cause, category: 'configuration', exposeMessage: true });
  }

  public static usage(code: string, message: string, metadata?: Record<string, unknown>): AppError {
    return new AppError({ code, message, metadata, category: 'usage', exposeMessage: true });
  }

  public static notFound(code: string, message: string, metadata?: Record<string, unknown>): AppError {
    return new AppError({ code, message, metadata, category: 'resource', exposeMessage: false });
  }

  public static resource(
    code: string,
    message: string,
    cause: unknown,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({ code, message, metadata, cause, category: 'resource', exposeMessage: false });
  }
}

export const isAppError = (error: unknown, category?: ErrorCategory): error is AppError =>
  error instanceof AppError && (category === undefined || error.category === category);
