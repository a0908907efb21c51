import { ValidationError } from '../errors/import.errors';
import {
  civilTimeToInstant,
  daysInMonth,
  READING_TIME_ZONE,
} from './civil-time';

/**
 * Field Validators
 *
 * Pure functions, one per semantic field. Hard failures throw
 * `ValidationError`; enumerated codes that are not recognized are returned
 * with `flagged: true` instead.
 */

export const METER_TYPES = ['D', 'C', 'P'] as const;
export type MeterTypeCode = (typeof METER_TYPES)[number];

export const REGISTER_IDS = [
  'S',
  'DY',
  'NT',
  'TO',
  'A1',
  'A2',
  'E7',
  '01',
  '02',
  '03',
  '04',
  '05',
  '06',
] as const;

export const READING_TYPES = ['ACTUAL', 'CUSTOMER', 'ESTIMATED'] as const;
export type ReadingType = (typeof READING_TYPES)[number];

/** Column limits of the readings and meters tables */
export const MAX_SERIAL_LENGTH = 64;
export const MAX_CODE_LENGTH = 8;
export const VALUE_PRECISION = 15;
export const VALUE_SCALE = 4;
const MAX_VALUE_INTEGER_DIGITS = VALUE_PRECISION - VALUE_SCALE;

/**
 * Result of checking a value against an enumerated code list
 */
export interface CodeCheck<T extends string> {
  value: T;
  flagged: boolean;
}

const MPAN_PATTERN = /^\d{13}$/;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;
const DATETIME_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

const READING_TYPE_ALIASES: Record<string, ReadingType> = {
  A: 'ACTUAL',
  ACTUAL: 'ACTUAL',
  C: 'CUSTOMER',
  CUSTOMER: 'CUSTOMER',
  E: 'ESTIMATED',
  ESTIMATED: 'ESTIMATED',
};

const registerIds: ReadonlySet<string> = new Set(REGISTER_IDS);
const meterTypes: ReadonlySet<string> = new Set(METER_TYPES);

/**
 * MPAN: exactly 13 ASCII digits.
 */
export function validateMpan(raw: string | undefined): string {
  const mpan = (raw ?? '').trim();
  if (!MPAN_PATTERN.test(mpan)) {
    throw new ValidationError(
      'InvalidMPAN',
      `MPAN must be exactly 13 digits, got '${mpan}'`,
    );
  }
  return mpan;
}

export function validateSerial(raw: string | undefined): string {
  const serial = (raw ?? '').trim();
  if (!serial) {
    throw new ValidationError('EmptySerial', 'Meter serial number is empty');
  }
  requireMaxLength('Meter serial number', serial, MAX_SERIAL_LENGTH);
  return serial;
}

function requireMaxLength(label: string, value: string, max: number): void {
  if (value.length > max) {
    throw new ValidationError(
      'FieldTooLong',
      `${label} '${value}' exceeds ${max} characters`,
    );
  }
}

/**
 * Non-negative plain decimal ("0", "123", "8123.5"). Signs and exponents
 * are rejected, as are values the decimal(15,4) column cannot hold exactly.
 * Leading zeros and trailing fractional zeros do not count as digits.
 */
export function validateReadingValue(raw: string | undefined): number {
  const text = (raw ?? '').trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(
      'InvalidValue',
      `Reading value must be a non-negative decimal, got '${text}'`,
    );
  }

  const integerDigits = match[1].replace(/^0+/, '').length;
  const fractionDigits = (match[2] ?? '').replace(/0+$/, '').length;
  if (integerDigits > MAX_VALUE_INTEGER_DIGITS) {
    throw new ValidationError(
      'InvalidValue',
      `Reading value '${text}' has more than ${MAX_VALUE_INTEGER_DIGITS} integer digits`,
    );
  }
  if (fractionDigits > VALUE_SCALE) {
    throw new ValidationError(
      'InvalidValue',
      `Reading value '${text}' has more than ${VALUE_SCALE} decimal places`,
    );
  }
  return Number.parseFloat(text);
}

/**
 * Parse a `YYYYMMDDHHMMSS` reading datetime as UK civil time.
 *
 * @param now - Instant the reading must not be later than
 */
export function validateReadingDatetime(
  raw: string | undefined,
  now: Date,
): Date {
  const text = (raw ?? '').trim();
  const match = DATETIME_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(
      'InvalidDateFormat',
      `Reading datetime must be 14 digits (YYYYMMDDHHMMSS), got '${text}'`,
    );
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => Number.parseInt(part, 10));

  const inRange =
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59;
  if (!inRange) {
    throw new ValidationError(
      'InvalidDateFormat',
      `Reading datetime '${text}' is not a valid calendar date and time`,
    );
  }

  const instant = civilTimeToInstant(
    { year, month, day, hour, minute, second },
    READING_TIME_ZONE,
  );
  if (instant.getTime() > now.getTime()) {
    throw new ValidationError(
      'FutureDate',
      `Reading datetime ${instant.toISOString()} is in the future`,
    );
  }
  return instant;
}

/**
 * Unknown ids are flagged; ids longer than the column are rejected.
 */
export function checkRegisterId(raw: string | undefined): CodeCheck<string> {
  const value = (raw ?? '').trim().toUpperCase();
  requireMaxLength('Register id', value, MAX_CODE_LENGTH);
  return { value, flagged: !registerIds.has(value) };
}

/**
 * Meter type is optional in practice; an absent code resolves to null and
 * is flagged like an unknown one. Codes longer than the column are rejected.
 */
export function checkMeterType(
  raw: string | undefined,
): CodeCheck<string> | { value: null; flagged: true } {
  const value = (raw ?? '').trim().toUpperCase();
  if (!value) {
    return { value: null, flagged: true };
  }
  requireMaxLength('Meter type', value, MAX_CODE_LENGTH);
  return { value, flagged: !meterTypes.has(value) };
}

/**
 * Optional fourth 030 field. Missing means ACTUAL; unknown codes fall back
 * to ACTUAL and are flagged.
 */
export function parseReadingType(
  raw: string | undefined,
): CodeCheck<ReadingType> {
  const code = (raw ?? '').trim().toUpperCase();
  if (!code) {
    return { value: 'ACTUAL', flagged: false };
  }
  const value = READING_TYPE_ALIASES[code];
  if (value === undefined) {
    return { value: 'ACTUAL', flagged: true };
  }
  return { value, flagged: false };
}
