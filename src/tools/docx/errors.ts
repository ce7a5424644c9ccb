/**
 * DOCX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: DocxErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  OUTPUT_EXISTS = 'OUTPUT_EXISTS',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  INVALID_DOCX = 'INVALID_DOCX',
  DOCX_CREATE_FAILED = 'DOCX_CREATE_FAILED',
  DOCX_WRITE_FAILED = 'DOCX_WRITE_FAILED',
}

export function isDocxError(error: unknown, code?: DocxErrorCode): error is DocxError {
  return error instanceof DocxError && (code === undefined || error.code === code);
}

/** Wrap an async operation — re-throws existing DocxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new DocxError(message, errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
