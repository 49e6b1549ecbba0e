import { ApiError, ConfigurationError, TransportError, ValidationError } from '../domain/errors.js';
import {
  isFutureEntry,
  validateTimesheetRow,
  type RawTimesheetRow,
  type TimesheetEntry,
} from '../domain/entities/TimesheetRow.js';
import { toWorklogPayload, type DurationRounding } from '../domain/entities/WorklogPayload.js';
import {
  createFailedOutcome,
  createPreviewedOutcome,
  createSubmittedOutcome,
  exitCodeFor,
  summarizeOutcomes,
  type RunSummary,
  type SubmissionOutcome,
} from '../domain/entities/SubmissionOutcome.js';
import type { WorklogSubmitter } from '../infra/JiraWorklogAdapter.js';
import { readTimesheetCsv } from '../infra/timesheetCsv.js';
import { logger } from '../infra/logger.js';
import type { RunReporter } from './RunReporter.js';

export interface TimesheetRunOptions {
  csvPath: string;
  dryRun: boolean;
  /** Process only the first N data rows */
  limit?: number;
}

export interface TimesheetRunResult {
  outcomes: SubmissionOutcome[];
  summary: RunSummary;
  exitCode: number;
}

export interface TimesheetRunnerSettings {
  durationRounding: DurationRounding;
  now?: () => Date;
}

/**
 * TimesheetRunner - reads the CSV and processes rows one at a time, in file order
 * Row-level failures become outcomes; only file and configuration problems throw.
 */
export class TimesheetRunner {
  private readonly now: () => Date;

  constructor(
    private submitter: WorklogSubmitter,
    private reporter: RunReporter,
    private settings: TimesheetRunnerSettings
  ) {
    this.now = settings.now ?? (() => new Date());
  }

  async run(options: TimesheetRunOptions): Promise<TimesheetRunResult> {
    const { limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ConfigurationError(`Limit must be a positive integer, got ${limit}`);
    }

    const rows = await readTimesheetCsv(options.csvPath);
    this.reporter.processing(options.csvPath, rows.length);

    let selected = rows;
    if (limit !== undefined && rows.length > limit) {
      selected = rows.slice(0, limit);
      this.reporter.limitReached(limit, rows.length - limit);
    }

    logger.debug('Starting timesheet run', {
      csvPath: options.csvPath,
      dryRun: options.dryRun,
      rows: selected.length,
    });

    const outcomes: SubmissionOutcome[] = [];
    for (const [index, raw] of selected.entries()) {
      outcomes.push(await this.processRow(raw, index + 1, options.dryRun));
    }

    const summary = summarizeOutcomes(outcomes);
    this.reporter.summary(summary, options.dryRun);

    return { outcomes, summary, exitCode: exitCodeFor(summary, options.dryRun) };
  }

  private async processRow(raw: RawTimesheetRow, row: number, dryRun: boolean): Promise<SubmissionOutcome> {
    let entry: TimesheetEntry;
    try {
      entry = validateTimesheetRow(raw, row);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      const outcome = createFailedOutcome({
        row,
        ticket: raw.ticket.trim(),
        failureKind: 'validation',
        message: error.message,
      });
      this.reporter.failure(outcome);
      return outcome;
    }

    this.reporter.entry(entry);
    if (isFutureEntry(entry, this.now())) {
      this.reporter.futureDate(entry);
    }

    const payload = toWorklogPayload(entry, this.settings.durationRounding);

    if (dryRun) {
      this.reporter.preview(entry, payload);
      return createPreviewedOutcome({
        row,
        ticket: entry.ticket,
        message: `Would log ${entry.hours}h to ${entry.ticket} on ${entry.date}`,
      });
    }

    try {
      const result = await this.submitter.submitWorklog(entry.ticket, payload);
      const outcome = createSubmittedOutcome({
        row,
        ticket: entry.ticket,
        httpStatus: result.status,
        message: result.worklogId
          ? `Logged ${entry.hours}h to ${entry.ticket} (worklog ${result.worklogId})`
          : `Logged ${entry.hours}h to ${entry.ticket}`,
      });
      this.reporter.success(outcome);
      return outcome;
    } catch (error) {
      const outcome = this.failureOutcome(error, entry);
      this.reporter.failure(outcome);
      return outcome;
    }
  }

  private failureOutcome(error: unknown, entry: TimesheetEntry): SubmissionOutcome {
    if (error instanceof ApiError) {
      return createFailedOutcome({
        row: entry.row,
        ticket: entry.ticket,
        failureKind: error.kind,
        httpStatus: error.status,
        message: error.message,
      });
    }
    if (error instanceof TransportError) {
      return createFailedOutcome({
        row: entry.row,
        ticket: entry.ticket,
        failureKind: 'transport',
        message: error.message,
      });
    }
    throw error;
  }
}
