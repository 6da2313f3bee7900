/**
 * Custom error hierarchy for cqlgen
 */

export type ErrorCategory =
  | 'CONFIGURATION'
  | 'TEMPLATE'
  | 'FORMATTING'
  | 'OUTPUT'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  table?: string;
  artifact?: string;
  [key: string]: unknown;
}

/**
 * Base error class for cqlgen
 */
export class CqlGenError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'CqlGenError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'HIGH',
      ...context,
    };

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Schema/configuration errors: missing file, empty tables, no partition key
 */
export class ConfigurationError extends CqlGenError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Template parse or execution errors
 */
export class TemplateError extends CqlGenError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'TEMPLATE',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'TemplateError';
  }
}

/**
 * Rendered text is not valid source. Keeps the offending text for debugging.
 */
export class FormattingError extends CqlGenError {
  public readonly source: string;

  constructor(message: string, source: string, context: Partial<ErrorContext> = {}) {
    super(`${message}\n${source}`, 'E3001', {
      category: 'FORMATTING',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'FormattingError';
    this.source = source;
  }
}

/**
 * Generated files could not be written
 */
export class OutputError extends CqlGenError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'OUTPUT',
      severity: 'HIGH',
      ...context,
    });
    this.name = 'OutputError';
  }
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): CqlGenError {
  if (error instanceof CqlGenError) {
    return error;
  }

  if (error instanceof Error) {
    return new CqlGenError(error.message, 'E9999', {
      category: 'UNKNOWN',
      originalError: error.name,
      ...context,
    });
  }

  return new CqlGenError(String(error), 'E9999', {
    category: 'UNKNOWN',
    ...context,
  });
}
