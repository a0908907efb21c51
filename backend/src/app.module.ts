import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { validateEnv, EnvConfig } from './config/env.validation';
import { buildTypeOrmOptions } from './database/database.config';
import { FlowFilesModule } from './flow-files/flow-files.module';
import { HealthModule } from './health/health.module';
import { IngestionModule } from './ingestion/ingestion.module';
import { ReadingsModule } from './readings/readings.module';

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
    FlowFilesModule,
    ReadingsModule,
    HealthModule,
  ],
})
export class AppModule {}
