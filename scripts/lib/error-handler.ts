/**
 * Error Handler for the Alumni Stats ETL
 * Tagged error kinds plus classification and formatting for console diagnostics
 */

export type PipelineErrorKind =
  | 'configuration'
  | 'connection'
  | 'extraction'
  | 'load'
  | 'dataset-not-found';

export type ErrorContext = Readonly<Record<string, string>>;

export interface ErrorClassification {
  kind: PipelineErrorKind | 'unknown';
  isFatal: boolean;
  message: string;
  suggestion: string;
}

/**
 * Base class for every error the pipeline raises on purpose.
 * `context` carries the structured details (table id, base id, missing variables...).
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

/** Required environment values are missing. Raised before any client is built. */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration' as const;
}

/** A source or warehouse client could not be constructed. */
export class ConnectionError extends PipelineError {
  readonly kind = 'connection' as const;
}

/** The source table could not be read. Aborts the run. */
export class ExtractionError extends PipelineError {
  readonly kind = 'extraction' as const;
}

/** A single warehouse table failed to load. Sibling loads still run. */
export class LoadError extends PipelineError {
  readonly kind = 'load' as const;
}

/** The configured dataset does not exist in the warehouse project. */
export class DatasetNotFoundError extends PipelineError {
  readonly kind = 'dataset-not-found' as const;
}

export type TableLoadError = LoadError | DatasetNotFoundError;

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Extract a human-readable message from any thrown value
 */
export function describeCause(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Read a numeric or string `code` off an error-like value (Google API errors carry the HTTP status here)
 */
export function errorCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'number' || typeof code === 'string') {
      return code;
    }
  }
  return undefined;
}

/**
 * Classify an error to decide whether the run can continue
 */
export function classifyError(error: unknown): ErrorClassification {
  if (!isPipelineError(error)) {
    return {
      kind: 'unknown',
      isFatal: true,
      message: describeCause(error),
      suggestion: 'Review error details and logs'
    };
  }

  switch (error.kind) {
    case 'configuration':
      return {
        kind: error.kind,
        isFatal: true,
        message: 'Required configuration is missing',
        suggestion: 'Set every required variable in the environment or in .env'
      };
    case 'connection':
      return {
        kind: error.kind,
        isFatal: true,
        message: 'Failed to initialize clients',
        suggestion: 'Check the API key and warehouse credentials'
      };
    case 'extraction':
      return {
        kind: error.kind,
        isFatal: true,
        message: 'Failed to extract records from the source',
        suggestion: 'Check your token, base id and table name'
      };
    case 'dataset-not-found':
      return {
        kind: error.kind,
        isFatal: false,
        message: 'Warehouse dataset not found',
        suggestion: 'Create the dataset or fix WAREHOUSE_DATASET_ID'
      };
    case 'load':
      return {
        kind: error.kind,
        isFatal: false,
        message: 'Warehouse table load failed',
        suggestion: 'Review the load job error; other tables were still attempted'
      };
  }
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.kind}\n`;
  formatted += `  Fatal:       ${classification.isFatal ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (isPipelineError(error)) {
    formatted += `  Details:     ${error.message}\n`;
    for (const [key, value] of Object.entries(error.context)) {
      formatted += `  ${(key + ':').padEnd(13)}${value}\n`;
    }
    if (error.cause !== undefined) {
      formatted += `  Cause:       ${describeCause(error.cause)}\n`;
    }
  }

  return formatted;
}
