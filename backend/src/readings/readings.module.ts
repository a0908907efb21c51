import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MeterPoint } from '../database/entities/meter-point.entity';
import { Reading } from '../database/entities/reading.entity';
import { ReadingsController } from './readings.controller';
import { ReadingsService } from './readings.service';

/**
 * ReadingsModule
 *
 * Read endpoints over imported readings and meter points.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Reading, MeterPoint])],
  controllers: [ReadingsController],
  providers: [ReadingsService],
  exports: [ReadingsService],
})
export class ReadingsModule {}
