/**
 * Error taxonomy system for graphform
 * Provides structured error codes with dev/prod differentiation
 */

/**
 * Error categories for systematic classification
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  GRAPH = 'GRAPH',
  MODULE = 'MODULE',
  PLAN = 'PLAN',
  STATE = 'STATE',
  PROVIDER = 'PROVIDER',
  PROVISIONER = 'PROVISIONER'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  CRITICAL = 'CRITICAL',  // Nothing was (or may be) applied
  ERROR = 'ERROR',        // Node-scoped failure, other nodes may continue
  WARNING = 'WARNING',
  INFO = 'INFO'
}

/**
 * Environment context for error messages
 */
export enum ErrorEnvironment {
  DEVELOPMENT = 'DEVELOPMENT',
  PRODUCTION = 'PRODUCTION',
  TEST = 'TEST'
}

/**
 * Structured error code with metadata.
 *
 * Messages are templates: `{name}` placeholders are replaced by the matching context value.
 */
export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly devMessage: string;
  readonly prodMessage: string;
  readonly suggestions?: readonly string[];
}

/**
 * Registry of all known error codes
 */
export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  static register(errorCode: ErrorCode): void {
    this.codes.set(errorCode.code, errorCode);
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }

  static getAllCodes(): ErrorCode[] {
    return Array.from(this.codes.values());
  }

  static getByCategory(category: ErrorCategory): ErrorCode[] {
    return this.getAllCodes().filter(error => error.category === category);
  }
}

/**
 * Replace `{key}` placeholders with context values. Arrays are joined with ", ".
 */
export function formatErrorMessage(template: string, context: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (!(key in context)) {
      return match;
    }
    const value = context[key];
    if (Array.isArray(value)) {
      return value.map(v => String(v)).join(', ');
    }
    return String(value);
  });
}

/**
 * Base structured error class
 */
export abstract class GraphformError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    errorCode: ErrorCode,
    context: Record<string, unknown> = {},
    originalError?: Error,
    environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
  ) {
    const template = environment === ErrorEnvironment.PRODUCTION
      ? errorCode.prodMessage
      : errorCode.devMessage;

    super(formatErrorMessage(template, context));

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.severity = errorCode.severity;
    this.timestamp = new Date().toISOString();
    this.context = context;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly error details
   */
  getDetails(environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT): {
    code: string;
    message: string;
    suggestions?: readonly string[];
    context: Record<string, unknown>;
  } {
    const errorCode = ErrorCodeRegistry.get(this.code);

    return {
      code: this.code,
      message: this.message,
      suggestions: errorCode?.suggestions,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : this.context
    };
  }

  /**
   * Serialize for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

/**
 * Type guard for graphform errors
 */
export function isGraphformError(error: unknown): error is GraphformError {
  return error instanceof GraphformError;
}

/**
 * Extract error details safely from any error
 */
export function extractErrorDetails(
  error: unknown,
  environment: ErrorEnvironment = ErrorEnvironment.DEVELOPMENT
): {
  code?: string;
  message: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
} {
  if (isGraphformError(error)) {
    const details = error.getDetails(environment);
    return {
      code: details.code,
      message: details.message,
      category: error.category,
      severity: error.severity,
      context: details.context
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      context: environment === ErrorEnvironment.PRODUCTION ? {} : { stack: error.stack }
    };
  }

  return {
    message: String(error),
    context: {}
  };
}
