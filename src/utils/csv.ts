export type CsvCell = string | number | boolean | null;

export const escapeCsv = (value: CsvCell): string => {
  if (value === null) return '';
  const text = String(value);
  if (text.includes(',') || text.includes('"') || text.includes('\n')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
};

export const toCsv = (headers: readonly string[], rows: readonly (readonly CsvCell[])[]): string =>
  [headers, ...rows].map((row) => row.map(escapeCsv).join(',')).join('\n');
