// Re-export public API
export { IngestionModule } from './ingestion.module';
export { IngestionService } from './ingestion.service';
export type {
  ImportIssue,
  ImportOptions,
  ImportResult,
  ImportSource,
  ImportWarning,
} from './interfaces/import-result.interface';
export {
  DuplicateFileError,
  ImportError,
  StructuralError,
  ValidationError,
} from './errors/import.errors';
export type { ValidationErrorKind, WarningKind } from './errors/import.errors';
