import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import { Readable } from 'node:stream';
import { DataSource } from 'typeorm';
import { FlowFile } from '../database/entities/flow-file.entity';
import { Meter } from '../database/entities/meter.entity';
import { MeterPoint } from '../database/entities/meter-point.entity';
import { Reading } from '../database/entities/reading.entity';
import {
  createFlowBuffer,
  createFlowStream,
  d0010,
  FUTURE_DATETIME,
  MPAN,
  OTHER_MPAN,
  SERIAL,
  wellFormedFile,
} from '../../test/utils/flow-builder';
import { testDatabaseModule } from '../../test/utils/test-database';
import { DuplicateFileError, StructuralError } from './errors/import.errors';
import { IngestionService } from './ingestion.service';
import { ImportResult } from './interfaces/import-result.interface';

describe('IngestionService', () => {
  let module: TestingModule;
  let service: IngestionService;
  let dataSource: DataSource;

  const fixturePath = path.join(
    __dirname,
    '../../test/fixtures/sample-d0010.uff',
  );

  const importLines = (lines: string[], filename = 'DR1234_20230616.uff') =>
    service.importFile(createFlowStream(lines), { filename });

  const counts = ({ dryRun, flowFileId, durationMs, ...rest }: ImportResult) =>
    rest;

  const countRows = async () => ({
    flowFiles: await dataSource.getRepository(FlowFile).count(),
    meterPoints: await dataSource.getRepository(MeterPoint).count(),
    meters: await dataSource.getRepository(Meter).count(),
    readings: await dataSource.getRepository(Reading).count(),
  });

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [testDatabaseModule()],
      providers: [IngestionService],
    }).compile();

    service = module.get(IngestionService);
    dataSource = module.get(DataSource);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('importFile - well-formed files', () => {
    it('should create one reading per valid 030 record with no errors', async () => {
      const result = await importLines(wellFormedFile(3));

      expect(result).toMatchObject({
        filename: 'DR1234_20230616.uff',
        dryRun: false,
        createdFile: true,
        linesRead: 7,
        meterPointsCreated: 1,
        metersCreated: 1,
        readingsCreated: 3,
        recordsSkipped: 0,
        errors: [],
        warnings: [],
      });
      expect(await countRows()).toEqual({
        flowFiles: 1,
        meterPoints: 1,
        meters: 1,
        readings: 3,
      });
    });

    it('should persist reading fields tied to the meter and the flow file', async () => {
      const result = await importLines(wellFormedFile(2));

      const readings = await dataSource.getRepository(Reading).find({
        relations: { meter: { meterPoint: true }, flowFile: true },
        order: { id: 'ASC' },
      });

      expect(readings).toHaveLength(2);
      expect(readings[0].registerId).toBe('S');
      expect(readings[0].value).toBe(1000.5);
      expect(readings[0].readingAt.toISOString()).toBe(
        '2023-06-01T11:00:00.000Z',
      );
      expect(readings[0].readingType).toBe('ACTUAL');
      expect(readings[0].meter.serialNumber).toBe(SERIAL);
      expect(readings[0].meter.meterType).toBe('D');
      expect(readings[0].meter.meterPoint.mpan).toBe(MPAN);
      expect(readings[0].flowFile.id).toBe(result.flowFileId);
      expect(readings[1].value).toBe(1001.5);
    });

    it('should record row counts on the flow file', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading(),
        d0010.reading('S', '-5'),
      ]);

      const flowFile = await dataSource
        .getRepository(FlowFile)
        .findOneByOrFail({ filename: 'DR1234_20230616.uff' });
      expect(flowFile.id).toBe(result.flowFileId);
      expect(flowFile.lineCount).toBe(4);
      expect(flowFile.readingCount).toBe(1);
      expect(flowFile.skippedCount).toBe(1);
      expect(flowFile.importedAt).toBeInstanceOf(Date);
    });

    it('should import a file from a path using its basename', async () => {
      const result = await service.importFile(fixturePath);

      expect(result).toMatchObject({
        filename: 'sample-d0010.uff',
        linesRead: 11,
        meterPointsCreated: 2,
        metersCreated: 3,
        readingsCreated: 4,
        errors: [],
        warnings: [],
      });
    });

    it('should map reading type codes', async () => {
      await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading('S', '1', '20230601000000', 'C'),
        d0010.reading('S', '2', '20230602000000', 'ESTIMATED'),
        d0010.reading('S', '3', '20230603000000', 'A'),
      ]);

      const readings = await dataSource
        .getRepository(Reading)
        .find({ order: { id: 'ASC' } });
      expect(readings.map((r) => r.readingType)).toEqual([
        'CUSTOMER',
        'ESTIMATED',
        'ACTUAL',
      ]);
    });

    it('should accept CRLF line endings and skip blank lines silently', async () => {
      const result = await service.importFile(
        Readable.from([
          createFlowBuffer(
            [d0010.meterPoint(), '', d0010.meter(), '   ', d0010.reading(), ''],
            '\r\n',
          ),
        ]),
        { filename: 'crlf.uff' },
      );

      expect(result.linesRead).toBe(3);
      expect(result.readingsCreated).toBe(1);
      expect(result.errors).toEqual([]);
    });

    it('should flush readings in batches beyond the batch size', async () => {
      const result = await importLines(wellFormedFile(501));

      expect(result.readingsCreated).toBe(501);
      expect(await dataSource.getRepository(Reading).count()).toBe(501);
    });
  });

  describe('importFile - entity reuse', () => {
    it('should reuse meter points and meters across files', async () => {
      await importLines(wellFormedFile(2), 'first.uff');
      const second = await importLines(wellFormedFile(2), 'second.uff');

      expect(second.meterPointsCreated).toBe(0);
      expect(second.metersCreated).toBe(0);
      expect(second.readingsCreated).toBe(2);
      // Identical readings from two files are both kept
      expect(await countRows()).toEqual({
        flowFiles: 2,
        meterPoints: 1,
        meters: 1,
        readings: 4,
      });
    });

    it('should reuse a meter point repeated within one file', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading(),
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading(),
      ]);

      expect(result.meterPointsCreated).toBe(1);
      expect(result.metersCreated).toBe(1);
      expect(result.readingsCreated).toBe(2);
    });

    it('should create separate meters for one serial under two meter points', async () => {
      const result = await importLines([
        d0010.meterPoint(MPAN),
        d0010.meter(SERIAL),
        d0010.meterPoint(OTHER_MPAN),
        d0010.meter(SERIAL),
      ]);

      expect(result.meterPointsCreated).toBe(2);
      expect(result.metersCreated).toBe(2);
    });
  });

  describe('importFile - recoverable errors', () => {
    it('should skip a reading with no preceding meter as OrphanReading', async () => {
      const result = await importLines([
        d0010.header(),
        d0010.reading(),
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading(),
      ]);

      expect(result.errors).toEqual([
        {
          lineNo: 2,
          kind: 'OrphanReading',
          message: 'Reading record (030) has no preceding meter record (028)',
        },
      ]);
      expect(result.readingsCreated).toBe(1);
      expect(result.recordsSkipped).toBe(1);
      expect(await dataSource.getRepository(Reading).count()).toBe(1);
    });

    it('should skip a meter with no preceding meter point as OrphanMeter', async () => {
      const result = await importLines([d0010.meter(), d0010.reading()]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [1, 'OrphanMeter'],
        [2, 'OrphanReading'],
      ]);
      expect(await countRows()).toEqual({
        flowFiles: 1,
        meterPoints: 0,
        meters: 0,
        readings: 0,
      });
    });

    it('should orphan the children of an invalid meter point', async () => {
      const result = await importLines([
        d0010.meterPoint(MPAN),
        d0010.meter(SERIAL),
        d0010.meterPoint('12000233059'),
        d0010.meter('S95B01447'),
        d0010.reading(),
      ]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [3, 'InvalidMPAN'],
        [4, 'OrphanMeter'],
        [5, 'OrphanReading'],
      ]);
      expect(result.meterPointsCreated).toBe(1);
      expect(result.metersCreated).toBe(1);
      expect(result.readingsCreated).toBe(0);
    });

    it('should orphan the readings of a meter with an empty serial', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter('  '),
        d0010.reading(),
      ]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [2, 'EmptySerial'],
        [3, 'OrphanReading'],
      ]);
    });

    it('should report field validation failures with their line numbers', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading('S', 'abc'),
        d0010.reading('S', '12', '2023-06-15'),
        d0010.reading('S', '12', FUTURE_DATETIME),
        d0010.reading('S', '12'),
      ]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [3, 'InvalidValue'],
        [4, 'InvalidDateFormat'],
        [5, 'FutureDate'],
      ]);
      expect(result.readingsCreated).toBe(1);
      expect(result.recordsSkipped).toBe(3);
    });

    it('should commit the valid reading and report one error for an unknown record type', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        '999|mystery|',
        d0010.reading(),
      ]);

      expect(result.errors).toEqual([
        {
          lineNo: 3,
          kind: 'UnknownRecordType',
          message: "Unknown record type '999'",
        },
      ]);
      expect(result.readingsCreated).toBe(1);
      expect(result.flowFileId).not.toBeNull();
      expect(await dataSource.getRepository(Reading).count()).toBe(1);
    });

    it('should commit the flow file even when every record fails', async () => {
      const result = await importLines([
        d0010.reading(),
        d0010.reading(),
      ]);

      expect(result.readingsCreated).toBe(0);
      expect(result.recordsSkipped).toBe(2);
      expect(await countRows()).toEqual({
        flowFiles: 1,
        meterPoints: 0,
        meters: 0,
        readings: 0,
      });
    });

    it('should accept and flag unrecognized codes without skipping the record', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(SERIAL, 'H'),
        d0010.reading('ZZ', '10', '20230601000000', 'X'),
      ]);

      expect(result.errors).toEqual([]);
      expect(result.readingsCreated).toBe(1);
      expect(result.warnings.map((w) => [w.lineNo, w.kind])).toEqual([
        [2, 'UnrecognizedMeterType'],
        [3, 'UnrecognizedRegisterId'],
        [3, 'UnrecognizedReadingType'],
      ]);

      const [reading] = await dataSource
        .getRepository(Reading)
        .find({ relations: { meter: true } });
      expect(reading.registerId).toBe('ZZ');
      expect(reading.readingType).toBe('ACTUAL');
      expect(reading.meter.meterType).toBe('H');
    });
  });

  describe('importFile - column limits', () => {
    it('should skip records whose fields exceed the columns and keep the rest', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter(),
        d0010.reading('REGISTER9'),
        d0010.reading('S', '100000000000'),
        d0010.reading('S', '1.23456'),
        d0010.reading('S', '99999999999.9999'),
      ]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [3, 'FieldTooLong'],
        [4, 'InvalidValue'],
        [5, 'InvalidValue'],
      ]);
      expect(result.readingsCreated).toBe(1);
      expect(await dataSource.getRepository(Reading).count()).toBe(1);
    });

    it('should orphan the readings of a meter with an over-long serial', async () => {
      const result = await importLines([
        d0010.meterPoint(),
        d0010.meter('S'.repeat(65)),
        d0010.reading(),
      ]);

      expect(result.errors.map((e) => [e.lineNo, e.kind])).toEqual([
        [2, 'FieldTooLong'],
        [3, 'OrphanReading'],
      ]);
      expect(result.metersCreated).toBe(0);
    });

    it('should reject a filename longer than the column', async () => {
      await expect(
        importLines(wellFormedFile(1), `${'f'.repeat(252)}.uff`),
      ).rejects.toThrow('Filename exceeds 255 characters');
      expect((await countRows()).flowFiles).toBe(0);
    });
  });

  describe('importFile - concurrent imports', () => {
    it('should commit two files imported at the same time', async () => {
      const [first, second] = await Promise.all([
        importLines(wellFormedFile(2), 'first.uff'),
        importLines(wellFormedFile(3), 'second.uff'),
      ]);

      expect(first.readingsCreated).toBe(2);
      expect(second.readingsCreated).toBe(3);
      expect(first.meterPointsCreated + second.meterPointsCreated).toBe(1);
      expect(await countRows()).toEqual({
        flowFiles: 2,
        meterPoints: 1,
        meters: 1,
        readings: 5,
      });
    });

    it('should keep a real import when a dry run rolls back alongside it', async () => {
      const [preview, real] = await Promise.all([
        service.importFile(createFlowStream(wellFormedFile(2)), {
          filename: 'preview.uff',
          dryRun: true,
        }),
        importLines(wellFormedFile(3), 'real.uff'),
      ]);

      expect(preview.flowFileId).toBeNull();
      expect(real.flowFileId).not.toBeNull();
      const flowFiles = await dataSource.getRepository(FlowFile).find();
      expect(flowFiles.map((f) => f.filename)).toEqual(['real.uff']);
      expect(await dataSource.getRepository(Reading).count()).toBe(3);
    });

    it('should let only one of two concurrent imports of a filename succeed', async () => {
      const outcomes = await Promise.allSettled([
        importLines(wellFormedFile(2), 'same.uff'),
        importLines(wellFormedFile(2), 'same.uff'),
      ]);

      expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'rejected']);
      const [, second] = outcomes;
      expect(second.status === 'rejected' && second.reason).toBeInstanceOf(
        DuplicateFileError,
      );
      expect(await countRows()).toEqual({
        flowFiles: 1,
        meterPoints: 1,
        meters: 1,
        readings: 2,
      });
    });

    it('should run the next import after one fails', async () => {
      const outcomes = await Promise.allSettled([
        service.importFile(path.join(__dirname, 'no-such-file.uff')),
        importLines(wellFormedFile(1), 'after.uff'),
      ]);

      expect(outcomes.map((o) => o.status)).toEqual(['rejected', 'fulfilled']);
      expect((await countRows()).readings).toBe(1);
    });
  });

  describe('importFile - fatal errors', () => {
    it('should reject a re-import of the same filename and create no rows', async () => {
      await importLines(wellFormedFile(3));
      const before = await countRows();

      await expect(importLines(wellFormedFile(3))).rejects.toBeInstanceOf(
        DuplicateFileError,
      );
      expect(await countRows()).toEqual(before);
    });

    it('should reject a duplicate before reading the source', async () => {
      await importLines(wellFormedFile(1));
      const unreadable = new Readable({
        read() {
          this.destroy(new Error('should not be read'));
        },
      });

      await expect(
        service.importFile(unreadable, { filename: 'DR1234_20230616.uff' }),
      ).rejects.toThrow("File 'DR1234_20230616.uff' has already been imported");
    });

    it('should roll back everything when the file is not valid UTF-8', async () => {
      const stream = Readable.from([
        createFlowBuffer([d0010.meterPoint(), d0010.meter(), '']),
        Buffer.from([0x30, 0x33, 0x30, 0xff, 0x0a]),
      ]);

      const failure = service.importFile(stream, { filename: 'bad.uff' });
      await expect(failure).rejects.toBeInstanceOf(StructuralError);
      await expect(failure).rejects.toThrow('[bad.uff] File is not valid UTF-8');
      expect(await countRows()).toEqual({
        flowFiles: 0,
        meterPoints: 0,
        meters: 0,
        readings: 0,
      });
    });

    it('should roll back when the stream fails mid-file', async () => {
      let sent = false;
      const stream = new Readable({
        read() {
          if (sent) {
            this.destroy(new Error('connection reset'));
            return;
          }
          sent = true;
          this.push(createFlowBuffer([...wellFormedFile(2), '']));
        },
      });

      await expect(
        service.importFile(stream, { filename: 'partial.uff' }),
      ).rejects.toThrow('[partial.uff] Unable to read file: connection reset');
      expect((await countRows()).readings).toBe(0);
      expect((await countRows()).flowFiles).toBe(0);
    });

    it('should fail with StructuralError for a missing path', async () => {
      await expect(
        service.importFile(path.join(__dirname, 'no-such-file.uff')),
      ).rejects.toBeInstanceOf(StructuralError);
      expect((await countRows()).flowFiles).toBe(0);
    });

    it('should require a filename for stream sources', async () => {
      await expect(
        service.importFile(createFlowStream(wellFormedFile(1))),
      ).rejects.toThrow('A filename is required when importing from a stream');
    });
  });

  describe('importFile - dry run', () => {
    it('should leave no rows but report the counts of a real import', async () => {
      const lines = [...wellFormedFile(3), d0010.reading('S', '-1')];

      const preview = await service.importFile(createFlowStream(lines), {
        filename: 'preview.uff',
        dryRun: true,
      });
      expect(await countRows()).toEqual({
        flowFiles: 0,
        meterPoints: 0,
        meters: 0,
        readings: 0,
      });

      const real = await service.importFile(createFlowStream(lines), {
        filename: 'preview.uff',
      });

      expect(preview.dryRun).toBe(true);
      expect(preview.flowFileId).toBeNull();
      expect(real.flowFileId).not.toBeNull();
      expect(counts(preview)).toEqual(counts(real));
      expect(preview.readingsCreated).toBe(3);
      expect(preview.errors).toHaveLength(1);
    });

    it('should still reject a filename that was already imported', async () => {
      await importLines(wellFormedFile(1));

      await expect(
        service.importFile(createFlowStream(wellFormedFile(1)), {
          filename: 'DR1234_20230616.uff',
          dryRun: true,
        }),
      ).rejects.toBeInstanceOf(DuplicateFileError);
    });
  });
});
