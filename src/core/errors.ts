/**
 * Error Taxonomy
 *
 * Categorized errors for the analysis pipeline:
 * - Retryable: the same request may succeed later (generation timeouts)
 * - NonRetryable: the run is rejected and surfaced to the caller
 * - Degradable: recovered inside the pipeline with a reduced result
 */

// =============================================================================
// BASE ERRORS
// =============================================================================

export abstract class DatasetAnalyzerError extends Error {
  abstract readonly retryable: boolean;
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// =============================================================================
// RETRYABLE ERRORS
// =============================================================================

export abstract class RetryableError extends DatasetAnalyzerError {
  readonly retryable = true;
}

export class GenerationTimeoutError extends RetryableError {
  readonly code = 'GENERATION_TIMEOUT';

  constructor(provider: string, timeoutMs: number) {
    super(`${provider} text generation timed out after ${timeoutMs}ms`, { provider, timeoutMs });
  }
}

// =============================================================================
// NON-RETRYABLE ERRORS - Surfaced to the caller
// =============================================================================

export abstract class NonRetryableError extends DatasetAnalyzerError {
  readonly retryable = false;
}

export class InvalidInputError extends NonRetryableError {
  readonly code = 'INVALID_INPUT';

  constructor(message: string, public readonly validationErrors?: unknown[]) {
    super(message, { validationErrors });
  }
}

export class EmptyDatasetError extends NonRetryableError {
  readonly code = 'EMPTY_DATASET';

  constructor(rowCount: number, columnCount: number) {
    super(`Dataset must have at least one row and one column (got ${rowCount} rows, ${columnCount} columns)`, {
      rowCount,
      columnCount,
    });
  }
}

export class MalformedRowError extends NonRetryableError {
  readonly code = 'MALFORMED_ROW';

  constructor(
    public readonly rowIndex: number,
    expectedColumns: string[],
    actualColumns: string[]
  ) {
    super(`Row ${rowIndex} does not match the dataset schema`, {
      rowIndex,
      expectedColumns,
      actualColumns,
    });
  }
}

export class AnalysisCancelledError extends NonRetryableError {
  readonly code = 'ANALYSIS_CANCELLED';

  constructor(stage: string) {
    super(`Analysis cancelled before ${stage}`, { stage });
  }
}

export class ProviderConfigError extends NonRetryableError {
  readonly code = 'PROVIDER_CONFIG';

  constructor(provider: string, envKey: string) {
    super(`${provider} API key required. Set ${envKey} environment variable.`, { provider, envKey });
  }
}

class InternalError extends NonRetryableError {
  readonly code = 'INTERNAL_ERROR';
}

// =============================================================================
// DEGRADABLE ERRORS - Recovered locally, never surfaced
// =============================================================================

export abstract class DegradableError extends DatasetAnalyzerError {
  readonly retryable = false;

  constructor(
    message: string,
    public readonly degradationPath: string,
    details?: Record<string, unknown>
  ) {
    super(message, { degradationPath, ...details });
  }
}

export class InsufficientDataError extends DegradableError {
  readonly code = 'INSUFFICIENT_DATA';

  constructor(
    public readonly usableRows: number,
    public readonly requiredRows: number
  ) {
    super(
      `ML analysis needs at least ${requiredRows} complete numeric rows, found ${usableRows}`,
      'ml_to_eda',
      { usableRows, requiredRows }
    );
  }
}

export class GenerationFailureError extends DegradableError {
  readonly code = 'GENERATION_FAILED';

  constructor(provider: string, reason: string) {
    super(`${provider} text generation failed: ${reason}`, 'template_insights', { provider, reason });
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isRetryable(error: unknown): error is RetryableError {
  return error instanceof RetryableError;
}

export function isNonRetryable(error: unknown): error is NonRetryableError {
  return error instanceof NonRetryableError;
}

export function isDegradable(error: unknown): error is DegradableError {
  return error instanceof DegradableError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function wrapError(error: unknown, context?: string): DatasetAnalyzerError {
  if (error instanceof DatasetAnalyzerError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(`${context ? context + ': ' : ''}${error.message}`, {
      originalError: error.name,
    });
  }

  return new InternalError(`Unknown error: ${String(error)}`);
}
