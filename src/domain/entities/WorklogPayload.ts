import type { TimesheetEntry } from './TimesheetRow.js';

/**
 * Worklog body for Jira Cloud's POST /rest/api/3/issue/{key}/worklog.
 * The comment is an Atlassian Document Format (ADF) document.
 */
export interface AdfTextNode {
  type: 'text';
  text: string;
}

export interface AdfParagraphNode {
  type: 'paragraph';
  content: AdfTextNode[];
}

export interface AdfDocument {
  type: 'doc';
  version: 1;
  content: AdfParagraphNode[];
}

export interface WorklogPayload {
  started: string;
  timeSpentSeconds: number;
  comment: AdfDocument;
}

export type DurationRounding = 'half-up' | 'ceil';

export const WORKLOG_START_TIME = '09:00:00.000';

const SECONDS_PER_HOUR = 3600;

/**
 * Formats a YYYY-MM-DD date as Jira's worklog timestamp at the fixed start time, in UTC
 */
export function formatStarted(date: string): string {
  return `${date}T${WORKLOG_START_TIME}+0000`;
}

/**
 * Converts hours to whole seconds.
 * The product is rounded to 6 decimals first so 0.1h is 360s, not 360.00000000000006s.
 */
export function hoursToSeconds(hours: number, rounding: DurationRounding = 'half-up'): number {
  const exact = Math.round(hours * SECONDS_PER_HOUR * 1e6) / 1e6;
  return rounding === 'ceil' ? Math.ceil(exact) : Math.floor(exact + 0.5);
}

export function toAdfDocument(text: string): AdfDocument {
  return {
    type: 'doc',
    version: 1,
    content: [
      {
        type: 'paragraph',
        content: [{ type: 'text', text }],
      },
    ],
  };
}

export function toWorklogPayload(
  entry: TimesheetEntry,
  rounding: DurationRounding = 'half-up'
): WorklogPayload {
  return {
    started: formatStarted(entry.date),
    timeSpentSeconds: hoursToSeconds(entry.hours, rounding),
    comment: toAdfDocument(entry.description),
  };
}
