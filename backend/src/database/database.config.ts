import { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { EnvConfig } from '../config/env.validation';
import { ENTITIES } from './entities';

/**
 * Build TypeORM options from validated configuration.
 *
 * Postgres is the production store; better-sqlite3 serves local use and the
 * test suite. The entities stick to column types both drivers map.
 */
export function buildTypeOrmOptions(
  configService: ConfigService<EnvConfig, true>,
): TypeOrmModuleOptions {
  const synchronize = configService.get('DB_SYNCHRONIZE', { infer: true });
  const logging = configService.get('NODE_ENV', { infer: true }) === 'development';

  if (configService.get('DB_TYPE', { infer: true }) === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: configService.get('DB_SQLITE_PATH', { infer: true }),
      entities: ENTITIES,
      synchronize,
      logging,
    };
  }

  return {
    type: 'postgres',
    host: configService.get('DB_HOST', { infer: true }),
    port: configService.get('DB_PORT', { infer: true }),
    username: configService.get('DB_USERNAME', { infer: true }),
    password: configService.get('DB_PASSWORD', { infer: true }),
    database: configService.get('DB_DATABASE', { infer: true }),
    entities: ENTITIES,
    synchronize,
    logging,
  };
}
