import { AppError } from '@listsync/shared';
import type { ValidationIssue } from './types';

export type ImportErrorKind =
  | 'invalidData'
  | 'invalidFormat'
  | 'decodingFailed'
  | 'validationFailed'
  | 'repositoryError'
  | 'cancelled';

const ERROR_CODES: Record<ImportErrorKind, string> = {
  invalidData: 'IMPORT_INVALID_DATA',
  invalidFormat: 'IMPORT_INVALID_FORMAT',
  decodingFailed: 'IMPORT_DECODING_FAILED',
  validationFailed: 'IMPORT_VALIDATION_FAILED',
  repositoryError: 'IMPORT_REPOSITORY_ERROR',
  cancelled: 'IMPORT_CANCELLED',
};

const STATUS_CODES: Record<ImportErrorKind, number> = {
  invalidData: 400,
  invalidFormat: 400,
  decodingFailed: 422,
  validationFailed: 422,
  repositoryError: 500,
  cancelled: 409,
};

function describeError(kind: ImportErrorKind, reason: string | undefined): string {
  switch (kind) {
    case 'invalidData':
      return reason ? `The provided data is invalid: ${reason}` : 'The provided data is invalid or corrupted';
    case 'invalidFormat':
      return reason ? `The file format is not supported: ${reason}` : 'The file format is not supported';
    case 'decodingFailed':
      return `Failed to decode data: ${reason ?? 'unknown error'}`;
    case 'validationFailed':
      return `Data validation failed: ${reason ?? 'unknown error'}`;
    case 'repositoryError':
      return `Failed to save data: ${reason ?? 'unknown error'}`;
    case 'cancelled':
      return 'The import was cancelled';
  }
}

/**
 * Terminal failure of a preview or commit call. `kind` discriminates the
 * variant; `reason` carries the variant's payload.
 */
export class ImportError extends AppError {
  constructor(
    public readonly kind: ImportErrorKind,
    public readonly reason?: string,
    details?: Array<{ field: string; message: string }>,
  ) {
    super(ERROR_CODES[kind], describeError(kind, reason), STATUS_CODES[kind], details);
    this.name = 'ImportError';
  }

  static invalidData(reason?: string): ImportError {
    return new ImportError('invalidData', reason);
  }

  static invalidFormat(reason?: string): ImportError {
    return new ImportError('invalidFormat', reason);
  }

  static decodingFailed(reason: string): ImportError {
    return new ImportError('decodingFailed', reason);
  }

  static validationFailed(issues: ValidationIssue[]): ImportError {
    const first = issues[0];
    const reason = first
      ? issues.length > 1
        ? `${first.message} (and ${issues.length - 1} more)`
        : first.message
      : 'unknown error';
    return new ImportError(
      'validationFailed',
      reason,
      issues.map((i) => ({ field: i.field, message: i.message })),
    );
  }

  static repositoryError(reason: string): ImportError {
    return new ImportError('repositoryError', reason);
  }

  static cancelled(): ImportError {
    return new ImportError('cancelled');
  }
}

export function isImportError(err: unknown): err is ImportError {
  return err instanceof ImportError;
}
