const NEEDS_QUOTING = /[",\r\n]/;

export const CSV_LINE_END = "\r\n";

export function escapeCsvValue(value: string | undefined): string {
  if (value === undefined) {
    return "";
  }
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvLine(values: readonly (string | undefined)[]): string {
  return values.map(escapeCsvValue).join(",") + CSV_LINE_END;
}

export function formatCsv<F extends string>(fields: readonly F[], rows: Partial<Record<F, string>>[]): string {
  let content = formatCsvLine(fields);
  for (const row of rows) {
    content += formatCsvLine(fields.map((field) => row[field]));
  }
  return content;
}
