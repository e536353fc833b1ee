import * as Papa from 'papaparse';
import { RecordShapeError } from './errors';

export type CsvRow = string[];

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Parses comma-separated text into rows. Quoted fields may contain commas,
 * quotes and line breaks; fully empty lines are skipped.
 */
export function parseCsv(text: string): CsvRow[] {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  const result = Papa.parse<CsvRow>(input, {
    delimiter: ',',
    skipEmptyLines: true,
  });

  const [firstError] = result.errors;
  if (firstError) {
    const rowNumber = (firstError.row ?? 0) + 1;
    throw new RecordShapeError(`Malformed CSV at row ${rowNumber}: ${firstError.message}`, rowNumber, 'csv');
  }

  return result.data;
}

/** Serialises rows as CSV, one row per line, each line ending with `\n`. */
export function serializeCsv(rows: CsvRow[]): string {
  if (rows.length === 0) {
    return '';
  }
  return `${Papa.unparse(rows, { delimiter: ',', newline: '\n' })}\n`;
}
