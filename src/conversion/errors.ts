/**
 * Conversion Error Handling
 *
 * One error class for every failure that stops a conversion, tagged with a
 * code the CLI and callers can branch on. Recoverable problems are not
 * errors: they become diagnostics on the ConversionContext.
 *
 * @module conversion/errors
 */

export enum ConversionErrorCode {
  INPUT_READ_FAILED = 'INPUT_READ_FAILED',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
  INVALID_DOCUMENT = 'INVALID_DOCUMENT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  REWRITE_DID_NOT_CONVERGE = 'REWRITE_DID_NOT_CONVERGE',
}

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ConversionErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConversionError';
    Error.captureStackTrace?.(this, ConversionError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

/** Existing ConversionErrors pass through; anything else is wrapped under `errorCode`. */
export function toConversionError(
  error: unknown,
  errorCode: ConversionErrorCode,
  context?: Record<string, unknown>
): ConversionError {
  if (error instanceof ConversionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConversionError(message, errorCode, {
    ...context,
    originalError: error instanceof Error ? error.stack : String(error),
  });
}

export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: ConversionErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toConversionError(error, errorCode, context);
  }
}

export function withErrorContextSync<T>(
  operation: () => T,
  errorCode: ConversionErrorCode,
  context?: Record<string, unknown>
): T {
  try {
    return operation();
  } catch (error) {
    throw toConversionError(error, errorCode, context);
  }
}
