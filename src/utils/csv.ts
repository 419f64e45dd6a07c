export type CsvValue = string | number | boolean | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvValue(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** One CSV record terminated by `\r\n`. */
export function toCsvLine(values: readonly CsvValue[]): string {
  return values.map(escapeCsvValue).join(',') + '\r\n';
}
