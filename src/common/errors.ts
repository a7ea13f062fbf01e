import type { AnalysisErrorKind, FailedEntry } from '../types/analysis';

export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly kind: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A single request was rejected before scoring. */
export class AnalysisError extends AppError {
  declare readonly kind: AnalysisErrorKind;

  constructor(kind: AnalysisErrorKind, message: string) {
    super(message, 400, kind);
  }
}

export class AllComparisonsFailedError extends AppError {
  constructor(readonly failed: FailedEntry[]) {
    super('Every brand in the comparison failed validation', 422, 'AllComparisonsFailed', { failed });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NotFound');
  }
}

export class ValidationError extends AppError {
  constructor(details: unknown) {
    super('ValidationError', 400, 'ValidationError', details);
  }
}

/** Malformed reference data. Fatal at startup. */
export class CatalogLoadError extends AppError {
  constructor(message: string, issues?: unknown) {
    super(message, 500, 'CatalogLoadError', issues);
  }
}

export class ScoringConfigError extends AppError {
  constructor(message: string, issues?: unknown) {
    super(message, 500, 'ScoringConfigError', issues);
  }
}
