/**
 * Error types for the receiving pipeline
 * Every fatal condition carries a code and, where one exists, the action that fixes it
 */

export type ReceivingErrorCode =
  | 'NO_INVOICE_LINES'
  | 'CATALOG_NOT_FOUND'
  | 'CATALOG_AMBIGUOUS'
  | 'CATALOG_COLUMN_MISSING'
  | 'CATALOG_EMPTY'
  | 'CATALOG_READ_FAILED'
  | 'SOURCE_READ_FAILED'
  | 'RECOGNITION_FAILED'
  | 'WRITE_FAILED'
  | 'INVALID_CONFIG'
  | 'UNKNOWN';

/** Pipeline stage an error is attributed to */
export type ReceivingStage = 'config' | 'catalog' | 'extraction' | 'output';

export interface ReceivingErrorDetails {
  /** Error code for programmatic handling */
  code: ReceivingErrorCode;
  /** Human-readable message */
  message: string;
  /** Stage that failed */
  stage?: ReceivingStage;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ReceivingError extends Error {
  readonly code: ReceivingErrorCode;
  readonly stage?: ReceivingStage;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReceivingErrorDetails) {
    super(details.message);
    this.name = 'ReceivingError';
    this.code = details.code;
    this.stage = details.stage;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, ReceivingError);
    }
  }

  /**
   * Format error for the operator running the import
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.stage) {
      parts.push(`Stage: ${this.stage}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stage: this.stage,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as ReceivingError
 */
export function wrapError(
  error: unknown,
  defaultCode: ReceivingErrorCode = 'UNKNOWN',
  stage?: ReceivingStage
): ReceivingError {
  if (error instanceof ReceivingError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ReceivingError({
    code: defaultCode,
    message,
    stage,
    cause,
  });
}
