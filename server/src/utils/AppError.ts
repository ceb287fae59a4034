/**
 * Custom application error class with HTTP status codes and error codes
 * Provides structured error handling across the application
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string, code: string = 'BAD_REQUEST'): AppError {
    return new AppError(message, 400, code);
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * The calculation payload failed validation; nothing was computed
 */
export class CalculationValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(CalculationValidationError.describe(issues), 400, 'VALIDATION_ERROR', true, issues);
    this.issues = issues;
  }

  static single(field: string, message: string): CalculationValidationError {
    return new CalculationValidationError([{ field, message }]);
  }

  private static describe(issues: ValidationIssue[]): string {
    const parts = issues.map(issue => (issue.field ? `${issue.field}: ${issue.message}` : issue.message));
    return `Invalid calculation payload: ${parts.length > 0 ? parts.join('; ') : 'unknown error'}`;
  }
}

/**
 * No configuration is declared or present for a tax year
 */
export class ConfigurationNotFoundError extends AppError {
  public readonly year: number;

  constructor(year: number, message?: string) {
    super(message ?? `Configuration for year ${year} not found`, 404, 'NOT_FOUND');
    this.year = year;
  }
}

/**
 * A configuration file exists but does not satisfy the schema
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', false);
  }
}
