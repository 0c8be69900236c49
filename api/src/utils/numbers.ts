const DECIMAL = /^[+-]?(\d+([.,]\d*)?|[.,]\d+)$/;

/**
 * Parses a plain decimal as typed into spreadsheets: `15`, `11.9` or `11,9`.
 * Returns null for anything else, including exponents and thousands separators.
 */
export function parseDecimal(raw: string): number | null {
  const s = raw.trim();
  if (!DECIMAL.test(s)) return null;
  const value = Number(s.replace(',', '.'));
  return Number.isFinite(value) ? value : null;
}
