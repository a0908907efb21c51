import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import { DataSource, QueryRunner } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  FlowFile,
  MAX_FILENAME_LENGTH,
} from '../database/entities/flow-file.entity';
import { Meter } from '../database/entities/meter.entity';
import { MeterPoint } from '../database/entities/meter-point.entity';
import { Reading } from '../database/entities/reading.entity';
import {
  checkMeterType,
  checkRegisterId,
  parseReadingType,
  validateMpan,
  validateReadingDatetime,
  validateReadingValue,
  validateSerial,
} from './d0010/field-validators';
import { HierarchyTracker } from './d0010/hierarchy-tracker';
import { readLines } from './d0010/line-reader';
import { TokenizedRecord, tokenizeLine } from './d0010/record-tokenizer';
import { findOrCreate, isUniqueViolation } from './entity-resolver';
import {
  DuplicateFileError,
  StructuralError,
  ValidationError,
  WarningKind,
} from './errors/import.errors';
import {
  ImportOptions,
  ImportResult,
  ImportSource,
} from './interfaces/import-result.interface';

/**
 * Per-file state threaded through the line-processing step
 */
interface ImportContext {
  queryRunner: QueryRunner;
  flowFile: FlowFile;
  tracker: HierarchyTracker<MeterPoint, Meter>;
  result: ImportResult;
  pendingReadings: QueryDeepPartialEntity<Reading>[];
  meterPointCache: Map<string, MeterPoint>;
  meterCache: Map<string, Meter>;
  /** Reference instant for the "not in the future" check */
  startedAt: Date;
}

/**
 * SQLite drivers hand every caller the same QueryRunner, so two open
 * transactions would nest instead of being isolated.
 */
const SHARED_CONNECTION_DRIVERS: ReadonlySet<string> = new Set([
  'sqlite',
  'better-sqlite3',
  'sqljs',
]);

/**
 * IngestionService - Imports D0010 flow files
 *
 * Responsibilities:
 * 1. Transaction scope: one transaction per file, committed or rolled back as a whole
 * 2. Duplicate detection: filename checked before any line is parsed
 * 3. Line pipeline: tokenizer -> hierarchy tracker -> validators -> entities
 * 4. Error isolation: a bad record is reported and skipped, the file continues
 * 5. Batch insertion: readings flushed in bulk
 * 6. Dry runs: full processing, then rollback
 * 7. Isolation: imports run one at a time on single-connection drivers
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly BATCH_SIZE = 500;
  /** Tail of the import queue on single-connection drivers */
  private importQueue: Promise<unknown> = Promise.resolve();

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Import one flow file.
   *
   * @param source - File path, or a stream (then `options.filename` is required)
   * @returns Counts and the ordered list of recoverable errors
   * @throws DuplicateFileError if the filename was already imported
   * @throws StructuralError if the source cannot be read or decoded
   */
  async importFile(
    source: ImportSource,
    options: ImportOptions = {},
  ): Promise<ImportResult> {
    if (!SHARED_CONNECTION_DRIVERS.has(this.dataSource.options.type)) {
      return this.runImport(source, options);
    }
    return this.enqueue(() => this.runImport(source, options));
  }

  /**
   * Run `task` after every previously queued import has settled.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.importQueue.then(task, task);
    // The caller observes failures through `run`; the queue only waits
    this.importQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runImport(
    source: ImportSource,
    options: ImportOptions,
  ): Promise<ImportResult> {
    const startTime = Date.now();
    const dryRun = options.dryRun ?? false;
    const filename = this.resolveFilename(source, options.filename);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const flowFile = await this.createFlowFile(queryRunner, filename);

      const context: ImportContext = {
        queryRunner,
        flowFile,
        tracker: new HierarchyTracker<MeterPoint, Meter>(),
        result: {
          filename,
          dryRun,
          createdFile: true,
          flowFileId: null,
          linesRead: 0,
          meterPointsCreated: 0,
          metersCreated: 0,
          readingsCreated: 0,
          recordsSkipped: 0,
          errors: [],
          warnings: [],
          durationMs: 0,
        },
        pendingReadings: [],
        meterPointCache: new Map(),
        meterCache: new Map(),
        startedAt: new Date(startTime),
      };

      await this.processLines(context, this.openSource(source, filename));
      await this.flushReadings(context);

      const { result } = context;
      await queryRunner.manager.update(FlowFile, flowFile.id, {
        lineCount: result.linesRead,
        readingCount: result.readingsCreated,
        skippedCount: result.recordsSkipped,
      });

      if (dryRun) {
        await queryRunner.rollbackTransaction();
      } else {
        await queryRunner.commitTransaction();
        result.flowFileId = flowFile.id;
      }

      result.durationMs = Date.now() - startTime;
      this.logger.log(
        `${dryRun ? 'Dry run' : 'Import'} complete for ${filename}: ` +
          `${result.readingsCreated} readings, ${result.meterPointsCreated} meter points, ` +
          `${result.metersCreated} meters created; ${result.recordsSkipped} records skipped`,
      );
      return result;
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      const failure = this.toImportFailure(error, filename);
      this.logger.error(`Import failed for ${filename}: ${failure.message}`);
      throw failure;
    } finally {
      await queryRunner.release();
    }
  }

  private resolveFilename(source: ImportSource, filename?: string): string {
    const resolved = (
      filename ?? (typeof source === 'string' ? basename(source) : '')
    ).trim();
    if (!resolved) {
      throw new StructuralError(
        '<stream>',
        'A filename is required when importing from a stream',
      );
    }
    if (resolved.length > MAX_FILENAME_LENGTH) {
      throw new StructuralError(
        resolved,
        `Filename exceeds ${MAX_FILENAME_LENGTH} characters`,
      );
    }
    return resolved;
  }

  private openSource(source: ImportSource, filename: string): Readable {
    if (typeof source !== 'string') {
      return source;
    }
    this.logger.debug(`Opening ${source} as ${filename}`);
    return createReadStream(source);
  }

  /**
   * Insert the FlowFile row. Runs before any parsing so a repeated import is
   * rejected without reading the file.
   */
  private async createFlowFile(
    queryRunner: QueryRunner,
    filename: string,
  ): Promise<FlowFile> {
    const { manager } = queryRunner;
    if (await manager.existsBy(FlowFile, { filename })) {
      throw new DuplicateFileError(filename);
    }

    try {
      const flowFile = manager.create(FlowFile, { filename });
      return await manager.save(flowFile);
    } catch (error) {
      // A concurrent import of the same filename committed first
      if (isUniqueViolation(error)) {
        throw new DuplicateFileError(
          filename,
          error instanceof Error ? error : undefined,
        );
      }
      throw error;
    }
  }

  private async processLines(
    context: ImportContext,
    stream: Readable,
  ): Promise<void> {
    const lines = readLines(stream);
    let lineNo = 0;

    try {
      while (true) {
        let next: IteratorResult<string>;
        try {
          next = await lines.next();
        } catch (error) {
          throw this.structural(context, error);
        }
        if (next.done) {
          break;
        }

        lineNo++;
        const record = tokenizeLine(next.value);
        if (record === null) {
          continue;
        }

        context.result.linesRead++;
        try {
          await this.processRecord(context, record, lineNo);
        } catch (error) {
          if (!(error instanceof ValidationError)) {
            throw error;
          }
          context.result.recordsSkipped++;
          context.result.errors.push({
            lineNo,
            kind: error.kind,
            message: error.message,
          });
          this.logger.warn(
            `${context.flowFile.filename} line ${lineNo}: [${error.kind}] ${error.message}`,
          );
        }
      }
    } finally {
      // Release the file handle when a fatal error stops the loop early
      stream.destroy();
    }
  }

  /**
   * Dispatch one tokenized record. Throws ValidationError for recoverable
   * problems; anything else is fatal.
   */
  private async processRecord(
    context: ImportContext,
    record: TokenizedRecord,
    lineNo: number,
  ): Promise<void> {
    switch (record.type) {
      case 'ZHV':
      case 'ZPT':
        return;
      case '026':
        return this.processMeterPoint(context, record);
      case '028':
        return this.processMeter(context, record, lineNo);
      case '030':
        return this.processReading(context, record, lineNo);
      case 'UNKNOWN':
        throw new ValidationError(
          'UnknownRecordType',
          `Unknown record type '${record.code}'`,
        );
    }
  }

  private async processMeterPoint(
    context: ImportContext,
    record: TokenizedRecord,
  ): Promise<void> {
    const { tracker } = context;
    let mpan: string;
    try {
      mpan = validateMpan(record.fields[0]);
    } catch (error) {
      tracker.invalidateMeterPoint();
      throw error;
    }

    let meterPoint = context.meterPointCache.get(mpan);
    if (!meterPoint) {
      const { entity, created } = await findOrCreate(
        context.queryRunner,
        MeterPoint,
        { mpan },
        { mpan },
      );
      meterPoint = entity;
      context.meterPointCache.set(mpan, entity);
      if (created) {
        context.result.meterPointsCreated++;
      }
    }

    tracker.enterMeterPoint(meterPoint);
  }

  private async processMeter(
    context: ImportContext,
    record: TokenizedRecord,
    lineNo: number,
  ): Promise<void> {
    const { tracker } = context;
    let meterPoint: MeterPoint;
    let serialNumber: string;
    try {
      meterPoint = tracker.requireMeterPoint();
      serialNumber = validateSerial(record.fields[0]);
    } catch (error) {
      tracker.invalidateMeter();
      throw error;
    }

    const meterType = checkMeterType(record.fields[1]);
    if (meterType.flagged) {
      this.addWarning(
        context,
        lineNo,
        'UnrecognizedMeterType',
        meterType.value === null
          ? `Meter ${serialNumber} has no meter type code`
          : `Unrecognized meter type '${meterType.value}' for meter ${serialNumber}`,
      );
    }

    const cacheKey = `${meterPoint.id}:${serialNumber}`;
    let meter = context.meterCache.get(cacheKey);
    if (!meter) {
      const { entity, created } = await findOrCreate(
        context.queryRunner,
        Meter,
        { meterPointId: meterPoint.id, serialNumber },
        {
          meterPointId: meterPoint.id,
          serialNumber,
          meterType: meterType.value,
        },
      );
      meter = entity;
      context.meterCache.set(cacheKey, entity);
      if (created) {
        context.result.metersCreated++;
      }
    }

    tracker.enterMeter(meter);
  }

  private async processReading(
    context: ImportContext,
    record: TokenizedRecord,
    lineNo: number,
  ): Promise<void> {
    const meter = context.tracker.requireMeter();
    const [rawRegisterId, rawValue, rawDatetime, rawReadingType]: (
      | string
      | undefined
    )[] = record.fields;

    const value = validateReadingValue(rawValue);
    const readingAt = validateReadingDatetime(rawDatetime, context.startedAt);

    const registerId = checkRegisterId(rawRegisterId);
    if (registerId.flagged) {
      this.addWarning(
        context,
        lineNo,
        'UnrecognizedRegisterId',
        `Unrecognized register id '${registerId.value}'`,
      );
    }

    const readingType = parseReadingType(rawReadingType);
    if (readingType.flagged) {
      this.addWarning(
        context,
        lineNo,
        'UnrecognizedReadingType',
        `Unrecognized reading type '${rawReadingType?.trim() ?? ''}', recorded as ACTUAL`,
      );
    }

    context.pendingReadings.push({
      meterId: meter.id,
      flowFileId: context.flowFile.id,
      registerId: registerId.value,
      value,
      readingAt,
      readingType: readingType.value,
    });
    context.result.readingsCreated++;

    if (context.pendingReadings.length >= this.BATCH_SIZE) {
      await this.flushReadings(context);
    }
  }

  private addWarning(
    context: ImportContext,
    lineNo: number,
    kind: WarningKind,
    message: string,
  ): void {
    context.result.warnings.push({ lineNo, kind, message });
    this.logger.debug(
      `${context.flowFile.filename} line ${lineNo}: [${kind}] ${message}`,
    );
  }

  private async flushReadings(context: ImportContext): Promise<void> {
    if (context.pendingReadings.length === 0) {
      return;
    }
    const batch = context.pendingReadings;
    context.pendingReadings = [];

    try {
      await context.queryRunner.manager.insert(Reading, batch);
    } catch (error) {
      this.logger.error('Reading batch insert failed', {
        batchSize: batch.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private structural(context: ImportContext, error: unknown): StructuralError {
    const cause = error instanceof Error ? error : undefined;
    const detail = isDecodingError(error)
      ? 'File is not valid UTF-8'
      : `Unable to read file: ${cause?.message ?? String(error)}`;
    return new StructuralError(context.flowFile.filename, detail, cause);
  }

  private toImportFailure(error: unknown, filename: string): Error {
    return error instanceof Error
      ? error
      : new StructuralError(filename, String(error));
  }
}

function isDecodingError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ERR_ENCODING_INVALID_ENCODED_DATA'
  );
}
