/**
 * ISO-8601 instant parsing for stored timestamps
 */

const ZONE_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Parse a stored timestamp. Values without a zone designator are read as
 * UTC and sub-millisecond digits are dropped. Returns an invalid Date when
 * the text is not a timestamp.
 */
export function parseInstant(text: string): Date {
  let value = text
    .trim()
    .replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, '$1T')
    .replace(/(\.\d{3})\d+/, '$1');
  if (!ZONE_SUFFIX.test(value)) value += 'Z';
  return new Date(value);
}
