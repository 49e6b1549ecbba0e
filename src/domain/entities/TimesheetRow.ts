import { ValidationError } from '../errors.js';

/**
 * Raw timesheet row as read from the CSV file.
 * All four columns are present by construction; values may be empty.
 */
export interface RawTimesheetRow {
  date: string;
  ticket: string;
  description: string;
  hours: string;
}

/**
 * TimesheetEntry - a validated row ready to become a worklog
 */
export interface TimesheetEntry {
  readonly row: number;
  /** Calendar date, YYYY-MM-DD */
  readonly date: string;
  /** Upper-cased issue key, e.g. PROJ-123 */
  readonly ticket: string;
  readonly description: string;
  /** 0 < hours <= 24 */
  readonly hours: number;
}

export const MAX_HOURS_PER_ENTRY = 24;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TICKET_PATTERN = /^[A-Za-z]+-[0-9]+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function isCalendarDate(text: string): boolean {
  const match = DATE_PATTERN.exec(text);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 as given; Date.UTC would map them to 19xx
  const parsed = new Date(0);
  parsed.setUTCFullYear(year, month - 1, day);

  return (
    year >= 1 &&
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

/**
 * Validates a raw row and builds an entry.
 * Checks run in the order date, ticket, hours; the first failure is reported.
 */
export function validateTimesheetRow(raw: RawTimesheetRow, row: number): TimesheetEntry {
  const date = raw.date.trim();
  if (!isCalendarDate(date)) {
    throw new ValidationError(row, 'invalid date format', date);
  }

  const ticketText = raw.ticket.trim();
  if (!TICKET_PATTERN.test(ticketText)) {
    throw new ValidationError(row, 'invalid ticket format', ticketText);
  }
  const ticket = ticketText.toUpperCase();

  const hoursText = raw.hours.trim();
  if (!DECIMAL_PATTERN.test(hoursText)) {
    throw new ValidationError(row, 'invalid hours format', hoursText);
  }
  const hours = Number(hoursText);
  if (hours <= 0) {
    throw new ValidationError(row, 'hours must be positive', hoursText);
  }
  if (hours > MAX_HOURS_PER_ENTRY) {
    throw new ValidationError(row, 'hours exceeds maximum', hoursText);
  }

  const descriptionText = raw.description.trim();
  const description = descriptionText.length > 0 ? descriptionText : `Work on ${ticket}`;

  return { row, date, ticket, description, hours };
}

function localDay(now: Date): string {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * True when the entry's date lies after the local calendar day of `now`
 */
export function isFutureEntry(entry: TimesheetEntry, now: Date): boolean {
  return entry.date > localDay(now);
}
