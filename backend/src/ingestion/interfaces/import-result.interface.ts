import type { Readable } from 'node:stream';
import type {
  ValidationErrorKind,
  WarningKind,
} from '../errors/import.errors';

/**
 * A recoverable problem found on one line of a flow file.
 */
export interface ImportIssue<K extends string = ValidationErrorKind> {
  /** 1-based line number in the source file */
  lineNo: number;
  kind: K;
  message: string;
}

export type ImportWarning = ImportIssue<WarningKind>;

/**
 * Import Result Summary
 *
 * Returned for committed and dry-run imports alike. A dry run reports the
 * counts the import would have produced.
 */
export interface ImportResult {
  filename: string;
  dryRun: boolean;
  createdFile: boolean;
  /** Persisted FlowFile id; null when the transaction was rolled back */
  flowFileId: number | null;
  linesRead: number;
  meterPointsCreated: number;
  metersCreated: number;
  readingsCreated: number;
  recordsSkipped: number;
  errors: ImportIssue[];
  warnings: ImportWarning[];
  durationMs: number;
}

export interface ImportOptions {
  dryRun?: boolean;
  /**
   * Name recorded on the FlowFile. Required for stream sources; defaults to
   * the basename for path sources.
   */
  filename?: string;
}

/** A filesystem path or an already-open byte stream */
export type ImportSource = string | Readable;
