/**
 * Error classes for report extraction.
 *
 * Every failure that aborts a report is an `ExtractionError`, so the batch
 * runner can record it with its code next to the water-right number:
 *
 *   throw new UnknownFieldError('usage location', 'Foo:', ['bar'])
 *   throw new FieldFormatError('Nutzungsort Lfd. Nr.:', '1 aktiv')
 */

export type ExtractionErrorCode =
  | 'STRUCTURAL_VIOLATION'
  | 'UNKNOWN_FIELD'
  | 'FIELD_FORMAT'
  | 'DOCUMENT_LOAD'
  | 'CONFIG_INVALID'
  | 'TABLE_ROW_INVALID'
  | 'INTERNAL_ERROR';

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedExtractionError {
  code: ExtractionErrorCode;
  message: string;
  details?: ErrorDetail[];
}

export class ExtractionError extends Error {
  constructor(
    public readonly code: ExtractionErrorCode,
    message: string,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedExtractionError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/** Section sentinels out of place, department header incomplete. */
export class StructuralError extends ExtractionError {
  constructor(message: string) {
    super('STRUCTURAL_VIOLATION', message);
  }
}

/** A key outside the closed vocabulary, or a known key with the wrong number of values. */
export class UnknownFieldError extends ExtractionError {
  constructor(
    section: string,
    public readonly key: string,
    public readonly values: Array<string | undefined>
  ) {
    super('UNKNOWN_FIELD', `invalid entry for the ${section}, key: ${JSON.stringify(key)}, values: ${JSON.stringify(values)}`, [
      { field: key, message: `unexpected values ${JSON.stringify(values)}` },
    ]);
  }
}

export class FieldFormatError extends ExtractionError {
  constructor(
    public readonly field: string,
    public readonly value: string,
    reason = 'has invalid format'
  ) {
    super('FIELD_FORMAT', `'${field}' ${reason}: ${value}`, [{ field, message: reason }]);
  }
}

export class DocumentLoadError extends ExtractionError {
  constructor(message: string, cause?: unknown) {
    super('DOCUMENT_LOAD', message, undefined, { cause });
  }
}

/** A spreadsheet row that does not fit the enrichment table's columns. */
export class TableRowError extends ExtractionError {
  constructor(
    public readonly row: number,
    details: ErrorDetail[]
  ) {
    super('TABLE_ROW_INVALID', `Invalid spreadsheet row ${row}`, details);
  }
}

interface IssueList {
  issues: Array<{ path: (string | number)[]; message: string }>;
}

export function issueDetails(error: IssueList): ErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export class ConfigError extends ExtractionError {
  static fromZodError(error: IssueList): ConfigError {
    return new ConfigError('Invalid extractor configuration', issueDetails(error));
  }

  constructor(message: string, details?: ErrorDetail[]) {
    super('CONFIG_INVALID', message, details);
  }
}

export function toExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ExtractionError('INTERNAL_ERROR', message, undefined, { cause: error });
}
