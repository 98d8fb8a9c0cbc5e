import type { Diagnosis, FailedResult } from './types.js';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid request, retry, auth, suite or environment configuration. Raised before any attempt. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION', details);
  }
}

/** Terminal failure of a logical request once the retry policy gives up. */
export class RetriesExhaustedError extends AppError {
  readonly diagnosis: Diagnosis;

  constructor(public readonly result: FailedResult) {
    super(
      `${result.method} ${result.url} failed after ${result.attempts} attempt(s): ${result.diagnosis.issue}`,
      'RETRIES_EXHAUSTED',
      { attempts: result.attempts, statusCode: result.statusCode, category: result.diagnosis.category }
    );
    this.diagnosis = result.diagnosis;
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
