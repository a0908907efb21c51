import {
  EntityTarget,
  FindOptionsWhere,
  ObjectLiteral,
  QueryFailedError,
  QueryRunner,
} from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

export interface Resolved<T> {
  entity: T;
  created: boolean;
}

/** Postgres unique_violation, SQLite unique / primary key constraint */
const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return UNIQUE_VIOLATION_CODES.has(driverError.code);
  }
  return false;
}

/**
 * Look up a row by its natural key, creating it when absent.
 *
 * Creation is optimistic: the insert runs inside a savepoint so that a
 * unique violation (another import created the same row after our lookup)
 * only rolls back the insert, not the surrounding file transaction. The
 * lookup is then retried and the concurrent creator's row returned.
 *
 * Must be called with a query runner that already has an open transaction.
 */
export async function findOrCreate<T extends ObjectLiteral>(
  queryRunner: QueryRunner,
  target: EntityTarget<T>,
  where: FindOptionsWhere<T>,
  values: QueryDeepPartialEntity<T>,
): Promise<Resolved<T>> {
  const { manager } = queryRunner;

  const existing = await manager.findOneBy(target, where);
  if (existing) {
    return { entity: existing, created: false };
  }

  await queryRunner.startTransaction();
  try {
    await manager.insert(target, values);
    await queryRunner.commitTransaction();
  } catch (error) {
    await queryRunner.rollbackTransaction();
    if (!isUniqueViolation(error)) {
      throw error;
    }
    const winner = await manager.findOneByOrFail(target, where);
    return { entity: winner, created: false };
  }

  const created = await manager.findOneByOrFail(target, where);
  return { entity: created, created: true };
}
