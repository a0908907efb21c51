/**
 * Error taxonomy for flow file imports.
 *
 * Fatal errors (`ImportError` subclasses) abort the whole file and roll the
 * transaction back. `ValidationError` is recoverable: it is raised while a
 * single line is processed, caught by the orchestrator and turned into an
 * entry of the result's error list.
 */

export const VALIDATION_ERROR_KINDS = [
  'InvalidMPAN',
  'EmptySerial',
  'FieldTooLong',
  'InvalidValue',
  'InvalidDateFormat',
  'FutureDate',
  'OrphanMeter',
  'OrphanReading',
  'UnknownRecordType',
] as const;

export type ValidationErrorKind = (typeof VALIDATION_ERROR_KINDS)[number];

/**
 * Unrecognized codes that are stored as given and reported.
 */
export type WarningKind =
  | 'UnrecognizedRegisterId'
  | 'UnrecognizedMeterType'
  | 'UnrecognizedReadingType';

export class ValidationError extends Error {
  constructor(
    public readonly kind: ValidationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Base class for failures that abort an import.
 */
export abstract class ImportError extends Error {
  abstract readonly kind: 'DuplicateFile' | 'Structural';

  constructor(
    public readonly filename: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
  }
}

export class DuplicateFileError extends ImportError {
  readonly kind = 'DuplicateFile';

  constructor(filename: string, originalError?: Error) {
    super(filename, `File '${filename}' has already been imported`, originalError);
    this.name = 'DuplicateFileError';
  }
}

/**
 * Unreadable stream, encoding failure or a missing source.
 */
export class StructuralError extends ImportError {
  readonly kind = 'Structural';

  constructor(filename: string, message: string, originalError?: Error) {
    super(filename, `[${filename}] ${message}`, originalError);
    this.name = 'StructuralError';
  }
}
