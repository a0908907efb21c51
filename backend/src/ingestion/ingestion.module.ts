import { Module } from '@nestjs/common';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';

/**
 * IngestionModule
 *
 * D0010 flow file import: the parsing pipeline (tokenizer, validators,
 * hierarchy tracker) behind IngestionService, and the upload endpoint.
 * IngestionService is exported for the command-line importer.
 *
 * Works against the application DataSource, so TypeOrmModule.forRoot must be
 * registered by the importing module.
 */
@Module({
  controllers: [IngestionController],
  providers: [IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}
