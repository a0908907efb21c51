import type { LogLevel } from '@nestjs/common';
import { parseArgs } from 'node:util';
import { ImportError } from '../ingestion';
import type { ImportOptions, ImportResult } from '../ingestion';

export const USAGE = `Usage: import-flow [--dry-run] <file...>

Imports D0010 flow files. Each file is committed as a whole; records that
fail validation are reported and skipped.

Options:
  --dry-run   Process the files and report, then roll back
  -h, --help  Show this message`;

/**
 * Nest log levels for the command's application context. Per-record issues
 * are printed by `formatIssues`, so the service's warnings stay quiet.
 */
export const CLI_LOG_LEVELS: LogLevel[] = ['error'];

export interface ImportCommandArgs {
  files: string[];
  dryRun: boolean;
  help: boolean;
}

/**
 * Anything able to import a file by path. IngestionService in production.
 */
export interface FileImporter {
  importFile(path: string, options: ImportOptions): Promise<ImportResult>;
}

export interface CommandOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * @throws an error with code ERR_PARSE_ARGS_UNKNOWN_OPTION for unknown options
 */
export function parseImportArgs(argv: string[]): ImportCommandArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  return {
    files: positionals,
    dryRun: values['dry-run'] ?? false,
    help: values.help ?? false,
  };
}

export function formatSummary(result: ImportResult): string {
  const prefix = result.dryRun ? '[dry run] ' : '';
  return (
    `${prefix}${result.filename}: ${result.readingsCreated} readings, ` +
    `${result.meterPointsCreated} meter points, ${result.metersCreated} meters created; ` +
    `${result.recordsSkipped} records skipped, ${result.warnings.length} warnings`
  );
}

export function formatIssues(result: ImportResult): string[] {
  return [
    ...result.errors.map(
      (issue) =>
        `  line ${issue.lineNo}: error [${issue.kind}] ${issue.message}`,
    ),
    ...result.warnings.map(
      (issue) =>
        `  line ${issue.lineNo}: warning [${issue.kind}] ${issue.message}`,
    ),
  ];
}

/**
 * Import each file in turn and report. Files are imported in the order
 * given, each in its own transaction.
 *
 * Per-record errors are printed but do not affect the exit code; any file
 * that fails fatally (duplicate, unreadable) makes the command exit 1.
 *
 * @returns process exit code
 */
export async function runImportCommand(
  args: ImportCommandArgs,
  importer: FileImporter,
  output: CommandOutput,
): Promise<number> {
  let fatalFailures = 0;
  for (const file of args.files) {
    try {
      const result = await importer.importFile(file, { dryRun: args.dryRun });
      output.out(formatSummary(result));
      for (const line of formatIssues(result)) {
        output.out(line);
      }
    } catch (error) {
      fatalFailures++;
      const label = error instanceof ImportError ? error.name : 'Error';
      const message = error instanceof Error ? error.message : String(error);
      output.err(`${file}: ${label}: ${message}`);
    }
  }

  return fatalFailures > 0 ? 1 : 0;
}
