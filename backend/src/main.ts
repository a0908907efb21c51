import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { Server } from 'node:http';
import { AppModule } from './app.module';
import type { EnvConfig } from './config/env.validation';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigService<EnvConfig, true>>(ConfigService);

  const corsOrigin = config.get('CORS_ORIGIN', { infer: true });
  if (corsOrigin) {
    app.enableCors({
      origin: corsOrigin,
      methods: ['GET', 'POST', 'DELETE'],
      credentials: true,
    });
  }

  // Large flow files take a while to upload and import (5 minutes)
  const server = app.getHttpServer() as Server;
  server.setTimeout(300000);

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? (error.stack ?? error.message) : String(error),
  );
  process.exit(1);
});
