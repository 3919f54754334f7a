/**
 * Escaping for iCalendar TEXT values.
 *
 * Only backslash, semicolon, comma and newline are reserved. Backslash must be
 * escaped first, otherwise the escapes added for the other characters would
 * themselves be doubled.
 */

const ESCAPE_SEQUENCE = /\\([\\;,n])/g;

export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n');
}

/**
 * Inverse of {@link escapeText}. Decoding happens in a single scan so that an
 * escaped backslash followed by a literal `n` is not read as a newline.
 * Unknown escapes are kept as they are.
 */
export function unescapeText(value: string): string {
  return value.replace(ESCAPE_SEQUENCE, (_match, escaped: string) => (escaped === 'n' ? '\n' : escaped));
}
