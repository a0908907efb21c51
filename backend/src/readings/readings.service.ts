import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MeterPoint } from '../database/entities/meter-point.entity';
import { Reading } from '../database/entities/reading.entity';
import type { ReadingType } from '../ingestion/d0010/field-validators';

/**
 * Reading row joined with its meter, meter point and source file
 */
export interface ReadingView {
  id: number;
  mpan: string;
  serialNumber: string;
  meterType: string | null;
  registerId: string;
  value: number;
  readingAt: Date;
  readingType: ReadingType;
  filename: string;
}

export interface MeterPointView {
  id: number;
  mpan: string;
  createdAt: Date;
  meters: Array<{
    id: number;
    serialNumber: string;
    meterType: string | null;
  }>;
}

export interface ReadingSearch {
  mpan?: string;
  serial?: string;
  limit: number;
}

@Injectable()
export class ReadingsService {
  private readonly logger = new Logger(ReadingsService.name);

  constructor(
    @InjectRepository(Reading)
    private readonly readingRepository: Repository<Reading>,
    @InjectRepository(MeterPoint)
    private readonly meterPointRepository: Repository<MeterPoint>,
  ) {}

  /**
   * Readings by MPAN and/or meter serial number, newest first.
   * Callers supply at least one of the two filters.
   */
  async searchReadings(search: ReadingSearch): Promise<ReadingView[]> {
    const query = this.readingRepository
      .createQueryBuilder('reading')
      .innerJoinAndSelect('reading.meter', 'meter')
      .innerJoinAndSelect('meter.meterPoint', 'meterPoint')
      .innerJoinAndSelect('reading.flowFile', 'flowFile')
      .orderBy('reading.readingAt', 'DESC')
      .addOrderBy('reading.id', 'DESC')
      .take(search.limit);

    if (search.mpan) {
      query.andWhere('meterPoint.mpan = :mpan', { mpan: search.mpan });
    }
    if (search.serial) {
      query.andWhere('meter.serialNumber = :serial', { serial: search.serial });
    }

    const readings = await query.getMany();
    this.logger.debug(
      `Found ${readings.length} readings for ${JSON.stringify(search)}`,
    );

    return readings.map((reading) => ({
      id: reading.id,
      mpan: reading.meter.meterPoint.mpan,
      serialNumber: reading.meter.serialNumber,
      meterType: reading.meter.meterType,
      registerId: reading.registerId,
      value: reading.value,
      readingAt: reading.readingAt,
      readingType: reading.readingType,
      filename: reading.flowFile.filename,
    }));
  }

  async getMeterPoint(mpan: string): Promise<MeterPointView> {
    const meterPoint = await this.meterPointRepository.findOne({
      where: { mpan },
      relations: { meters: true },
      order: { meters: { serialNumber: 'ASC' } },
    });
    if (!meterPoint) {
      throw new NotFoundException(`Meter point ${mpan} not found`);
    }

    return {
      id: meterPoint.id,
      mpan: meterPoint.mpan,
      createdAt: meterPoint.createdAt,
      meters: meterPoint.meters.map((meter) => ({
        id: meter.id,
        serialNumber: meter.serialNumber,
        meterType: meter.meterType,
      })),
    };
  }
}
