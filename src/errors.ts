import { ZodError } from 'zod';

export type ErrorCode = 'BAD_REQUEST' | 'OCR_FAILED' | 'CATALOG_INVALID' | 'CONFIG_INVALID' | 'INTERNAL';

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.details = options.details;
  }
}

/** Unreadable or malformed catalog resource. Fatal at startup. */
export class CatalogLoadError extends AppError {
  constructor(message: string, options: { cause?: unknown; details?: Record<string, unknown> } = {}) {
    super('CATALOG_INVALID', message, options);
    this.name = 'CatalogLoadError';
  }
}

/** The OCR collaborator could not read the image. Recoverable per request. */
export class OcrError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('OCR_FAILED', message, options);
    this.name = 'OcrError';
  }
}

export function zodIssues(error: ZodError): Record<string, unknown> {
  return {
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }))
  };
}

export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof AppError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details && { details: error.details })
    };
  }

  if (error instanceof ZodError) {
    return { code: 'BAD_REQUEST', message: 'Validation error', details: zodIssues(error) };
  }

  const message = error instanceof Error ? error.message : 'An unexpected error occurred';
  return { code: 'INTERNAL', message };
}
