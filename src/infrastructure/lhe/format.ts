/**
 * Token-level helpers shared by the decoder and the encoder.
 */

/** Splits a data line on runs of whitespace. */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/**
 * Parses a Fortran-style real (`1.0d+03` is accepted).
 * Returns null for anything that is not a finite number.
 */
export function parseReal(token: string): number | null {
  if (token.trim() === '') return null;
  const value = Number(token.replace(/[dD]/, 'e'));
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(token: string): number | null {
  const value = parseReal(token);
  return value !== null && Number.isInteger(value) ? value : null;
}

/**
 * Shortest exponent form that parses back to the same double,
 * with a two-digit exponent: 6500 → `6.5e+03`, 1 → `1.0e+00`.
 */
export function formatReal(value: number): string {
  const [mantissa = '0', exponent = '+0'] = value.toExponential().split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  return `${mantissa.includes('.') ? mantissa : `${mantissa}.0`}e${sign}${digits}`;
}

/** Like `formatReal` but always carries a sign. */
export function formatSignedReal(value: number): string {
  const text = formatReal(value);
  return text.startsWith('-') ? text : `+${text}`;
}

export function formatInteger(value: number, width: number): string {
  return String(value).padStart(width, ' ');
}

const ATTRIBUTE_PATTERN = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

/** Reads `key="value"` / `key='value'` pairs from the inside of a tag. */
export function parseAttributes(text: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of text.matchAll(ATTRIBUTE_PATTERN)) {
    const key = match[1];
    if (key === undefined) continue;
    attributes[key] = match[2] ?? match[3] ?? '';
  }
  return attributes;
}

/** Writes attributes back, choosing the quote that the value does not contain. */
export function formatAttributes(attributes: Record<string, string>): string {
  return Object.entries(attributes)
    .map(([key, value]) => (value.includes('"') ? ` ${key}='${value}'` : ` ${key}="${value}"`))
    .join('');
}
