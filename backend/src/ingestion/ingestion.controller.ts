import {
  BadRequestException,
  Controller,
  Logger,
  Post,
  Query,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { Readable } from 'node:stream';
import { ImportError } from './errors/import.errors';
import { IngestionService } from './ingestion.service';
import type { ImportResult } from './interfaces/import-result.interface';

/**
 * Failure entry for a file whose import was aborted
 */
export interface FailedFileImport {
  filename: string;
  success: false;
  errorKind: 'DuplicateFile' | 'Structural' | 'Unexpected';
  error: string;
}

export type FileImportEntry =
  | (ImportResult & { success: true })
  | FailedFileImport;

/**
 * Response DTO for the upload endpoint
 */
export interface BulkImportResponse {
  dryRun: boolean;
  successCount: number;
  errorCount: number;
  totalReadingsCreated: number;
  results: FileImportEntry[];
}

/**
 * IngestionController
 *
 * Web upload handler for D0010 flow files (up to 10 files per request).
 * Per-record problems are part of each file's result; a file that fails
 * fatally (duplicate, unreadable) is reported without failing the request.
 *
 * Usage:
 *   POST /ingest?dryRun=true
 *   Content-Type: multipart/form-data
 *   Body: files=<flow_file1>&files=<flow_file2>...
 */
@Controller('ingest')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * @example
   * curl -X POST "http://localhost:3000/ingest?dryRun=true" \
   *   -F "files=@/path/to/DR1234_20230615.uff"
   */
  @Post()
  @UseInterceptors(FilesInterceptor('files', 10))
  async ingestFiles(
    @UploadedFiles() files: Array<Express.Multer.File> | undefined,
    @Query('dryRun') dryRunParam?: string,
  ): Promise<BulkImportResponse> {
    if (!files || files.length === 0) {
      throw new BadRequestException(
        'No files uploaded. Use form field "files".',
      );
    }

    const dryRun = dryRunParam === 'true' || dryRunParam === '1';
    this.logger.log(
      `Upload request: fileCount=${files.length}, dryRun=${dryRun}`,
    );

    const results: FileImportEntry[] = [];
    let successCount = 0;
    let errorCount = 0;
    let totalReadingsCreated = 0;

    // Sequential: each file gets its own transaction
    for (const file of files) {
      try {
        const result = await this.ingestionService.importFile(
          Readable.from(file.buffer),
          { filename: file.originalname, dryRun },
        );
        successCount++;
        totalReadingsCreated += result.readingsCreated;
        results.push({ ...result, success: true });
      } catch (error) {
        errorCount++;
        results.push(this.toFailure(file.originalname, error));
      }
    }

    this.logger.log(
      `Upload complete: ${successCount} imported, ${errorCount} failed, ${totalReadingsCreated} readings`,
    );

    return {
      dryRun,
      successCount,
      errorCount,
      totalReadingsCreated,
      results,
    };
  }

  private toFailure(filename: string, error: unknown): FailedFileImport {
    if (error instanceof ImportError) {
      return {
        filename,
        success: false,
        errorKind: error.kind,
        error: error.message,
      };
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(`Failed to import ${filename}: ${message}`);
    return { filename, success: false, errorKind: 'Unexpected', error: message };
  }
}
