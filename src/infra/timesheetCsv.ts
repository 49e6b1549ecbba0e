import Papa from 'papaparse';
import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '../domain/errors.js';
import type { RawTimesheetRow } from '../domain/entities/TimesheetRow.js';

/**
 * Header names the timesheet CSV must carry (order does not matter, extra columns are ignored)
 */
export const TIMESHEET_COLUMNS = {
  date: 'Date',
  ticket: 'Jira Ticket Number',
  description: 'Work Description',
  hours: 'Hours',
} as const satisfies Record<keyof RawTimesheetRow, string>;

type CsvRecord = Record<string, string | undefined>;

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Parses CSV text into typed rows.
 * Throws ConfigurationError on quoting errors or missing required columns.
 */
export function parseTimesheetCsv(content: string): RawTimesheetRow[] {
  const result = Papa.parse<CsvRecord>(content, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: (header: string) => header.replace(/^\uFEFF/, '').trim(),
  });

  // Short or long rows are tolerated; their absent values fail row validation instead
  const fatal = result.errors.find((error) => error.type !== 'FieldMismatch');
  if (fatal) {
    const where = typeof fatal.row === 'number' ? ` at data row ${fatal.row + 1}` : '';
    throw new ConfigurationError(`Malformed CSV${where}: ${fatal.message}`, { code: fatal.code });
  }

  const fields = result.meta.fields ?? [];
  const missing = Object.values(TIMESHEET_COLUMNS).filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new ConfigurationError(`CSV is missing required columns: ${missing.join(', ')}`, {
      missing,
      found: fields,
    });
  }

  return result.data.map((record) => ({
    date: record[TIMESHEET_COLUMNS.date] ?? '',
    ticket: record[TIMESHEET_COLUMNS.ticket] ?? '',
    description: record[TIMESHEET_COLUMNS.description] ?? '',
    hours: record[TIMESHEET_COLUMNS.hours] ?? '',
  }));
}

/**
 * Reads and parses the timesheet file at the given path
 */
export async function readTimesheetCsv(filePath: string): Promise<RawTimesheetRow[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`CSV file not found: ${filePath}`, { filePath });
    }
    throw new ConfigurationError(
      `Cannot read CSV file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  return parseTimesheetCsv(content);
}
