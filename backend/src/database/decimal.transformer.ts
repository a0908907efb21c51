import type { ValueTransformer } from 'typeorm';

/**
 * Postgres returns DECIMAL columns as strings to preserve precision; SQLite
 * returns numbers. Normalize both to number on the way out.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null): number | null =>
    value === null ? null : Number(value),
};
