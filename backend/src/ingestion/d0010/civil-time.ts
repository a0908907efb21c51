/**
 * Civil (wall-clock) time conversion for a fixed IANA time zone.
 *
 * Reading datetimes carry no offset; they are local UK time, so
 * 2023-06-15 12:00:00 is 11:00:00Z (BST) and 2023-01-15 12:00:00 is
 * 12:00:00Z (GMT).
 */

export const READING_TIME_ZONE = 'Europe/London';

export interface CivilDateTime {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds.
 */
export function zoneOffsetMs(instantMs: number, timeZone: string): number {
  const parts: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(instantMs)) {
    if (part.type !== 'literal') {
      parts[part.type] = Number.parseInt(part.value, 10);
    }
  }

  const asUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
  );
  const truncated = instantMs - (((instantMs % 1000) + 1000) % 1000);
  return asUtc - truncated;
}

/**
 * Resolve a wall-clock time in `timeZone` to an instant.
 *
 * Times skipped by a spring-forward transition resolve past the gap; times
 * repeated by an autumn transition resolve to the first occurrence.
 */
export function civilTimeToInstant(
  civil: CivilDateTime,
  timeZone: string = READING_TIME_ZONE,
): Date {
  const wallMs = Date.UTC(
    civil.year,
    civil.month - 1,
    civil.day,
    civil.hour,
    civil.minute,
    civil.second,
  );

  const firstOffset = zoneOffsetMs(wallMs, timeZone);
  const firstGuess = wallMs - firstOffset;
  const secondOffset = zoneOffsetMs(firstGuess, timeZone);
  if (secondOffset === firstOffset) {
    // Repeated hour: an hour earlier may map to the same wall time
    const hourBefore = zoneOffsetMs(firstGuess - 3_600_000, timeZone);
    const earlier = wallMs - Math.max(firstOffset, hourBefore);
    if (
      earlier < firstGuess &&
      earlier + zoneOffsetMs(earlier, timeZone) === wallMs
    ) {
      return new Date(earlier);
    }
    return new Date(firstGuess);
  }

  // Either the second guess is exact, or the wall time falls in a gap and
  // the second guess lands just past it
  return new Date(wallMs - secondOffset);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
