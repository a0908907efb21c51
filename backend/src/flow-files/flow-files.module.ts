import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FlowFile } from '../database/entities/flow-file.entity';
import { FlowFilesController } from './flow-files.controller';
import { FlowFilesService } from './flow-files.service';

/**
 * FlowFilesModule
 *
 * Administrative listing and purge of imported flow files.
 */
@Module({
  imports: [TypeOrmModule.forFeature([FlowFile])],
  controllers: [FlowFilesController],
  providers: [FlowFilesService],
  exports: [FlowFilesService],
})
export class FlowFilesModule {}
