/**
 * D0010 Record Tokenizer
 *
 * One line is one record: `<type code>|<field>|<field>|...`. Most producers
 * terminate every line with a trailing `|`, which yields one empty field that
 * is dropped here.
 *
 * Record types:
 * - ZHV: file header (ignored beyond presence)
 * - 026: meter point (MPAN)
 * - 028: meter (serial number, meter type)
 * - 030: register reading (register id, value, datetime, [reading type])
 * - ZPT: file trailer (optional)
 */

export const FIELD_DELIMITER = '|';

export type RecordType = 'ZHV' | '026' | '028' | '030' | 'ZPT' | 'UNKNOWN';

export interface TokenizedRecord {
  type: RecordType;
  /** Record-type code exactly as it appeared in the line */
  code: string;
  fields: string[];
}

const KNOWN_CODES: ReadonlySet<string> = new Set([
  'ZHV',
  '026',
  '028',
  '030',
  'ZPT',
]);

function isKnownCode(code: string): code is Exclude<RecordType, 'UNKNOWN'> {
  return KNOWN_CODES.has(code);
}

/**
 * Split a raw line into its record type and ordered field values.
 *
 * @returns null for blank lines, which are skipped silently
 */
export function tokenizeLine(line: string): TokenizedRecord | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  const [rawCode, ...fields] = trimmed.split(FIELD_DELIMITER);
  if (fields.length > 0 && fields[fields.length - 1] === '') {
    fields.pop();
  }

  const code = rawCode.trim().toUpperCase();
  return {
    type: isKnownCode(code) ? code : 'UNKNOWN',
    code: rawCode.trim(),
    fields,
  };
}
