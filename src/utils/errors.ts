export type AnalysisErrorCode =
  | 'MISSING_DATA'
  | 'DATA_QUALITY'
  | 'INVALID_SERIES'
  | 'INSUFFICIENT_HISTORY'
  | 'INVALID_CONFIGURATION';

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// A required field is absent or cannot be parsed
export class MissingDataError extends AnalysisError {
  override readonly code: AnalysisErrorCode = 'MISSING_DATA';

  constructor(readonly field: string, detail?: string) {
    super(detail ? `Missing or invalid field "${field}": ${detail}` : `Missing or invalid field "${field}"`);
  }
}

export class DataQualityError extends AnalysisError {
  override readonly code: AnalysisErrorCode = 'DATA_QUALITY';
}

export class InvalidSeriesError extends DataQualityError {
  override readonly code: AnalysisErrorCode = 'INVALID_SERIES';
}

export class InsufficientHistoryError extends AnalysisError {
  override readonly code: AnalysisErrorCode = 'INSUFFICIENT_HISTORY';

  constructor(
    readonly component: string,
    readonly required: number,
    readonly actual: number
  ) {
    super(`${component} needs at least ${required} sample(s), got ${actual}`);
  }
}

export class InvalidConfigurationError extends AnalysisError {
  override readonly code: AnalysisErrorCode = 'INVALID_CONFIGURATION';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
