import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvConfig, validateEnv } from '../config/env.validation';
import { buildTypeOrmOptions } from '../database/database.config';
import { IngestionModule } from '../ingestion';

/**
 * Application context for the command-line importer: configuration,
 * database and the import pipeline, without the HTTP layer.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<EnvConfig, true>) =>
        buildTypeOrmOptions(configService),
      inject: [ConfigService],
    }),
    IngestionModule,
  ],
})
export class CliModule {}
