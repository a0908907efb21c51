import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Param,
  Query,
} from '@nestjs/common';
import { ValidationError } from '../ingestion/errors/import.errors';
import { validateMpan } from '../ingestion/d0010/field-validators';
import {
  MeterPointView,
  ReadingsService,
  ReadingView,
} from './readings.service';

/**
 * Query parameters for the readings endpoint
 */
interface ReadingsQuery {
  mpan?: string;
  serial?: string;
  limit?: string;
}

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

/**
 * ReadingsController
 *
 * Lookup endpoints for the admin surface.
 *
 * Endpoints:
 * - GET /readings?mpan=&serial=&limit= - Readings for a meter point and/or meter
 * - GET /meter-points/:mpan - A meter point with its meters
 */
@Controller()
export class ReadingsController {
  private readonly logger = new Logger(ReadingsController.name);

  constructor(private readonly readingsService: ReadingsService) {}

  /**
   * @example
   * GET /readings?mpan=1200023305967
   * GET /readings?serial=F75A00802&limit=20
   */
  @Get('readings')
  async searchReadings(
    @Query() query: ReadingsQuery,
  ): Promise<{ readings: ReadingView[] }> {
    this.logger.log(`GET /readings with query: ${JSON.stringify(query)}`);

    const mpan = query.mpan?.trim() || undefined;
    const serial = query.serial?.trim() || undefined;
    if (!mpan && !serial) {
      throw new BadRequestException('Provide an mpan or serial query parameter');
    }
    if (mpan) {
      this.parseMpan(mpan);
    }

    let limit = DEFAULT_LIMIT;
    if (query.limit !== undefined) {
      limit = Number(query.limit);
      if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
        throw new BadRequestException(
          `limit must be an integer between 1 and ${MAX_LIMIT}`,
        );
      }
    }

    const readings = await this.readingsService.searchReadings({
      mpan,
      serial,
      limit,
    });
    return { readings };
  }

  @Get('meter-points/:mpan')
  async getMeterPoint(@Param('mpan') mpan: string): Promise<MeterPointView> {
    return this.readingsService.getMeterPoint(this.parseMpan(mpan));
  }

  private parseMpan(raw: string): string {
    try {
      return validateMpan(raw);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }
}
