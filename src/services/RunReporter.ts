import { logger } from '../infra/logger.js';
import type { TimesheetEntry } from '../domain/entities/TimesheetRow.js';
import type { WorklogPayload } from '../domain/entities/WorklogPayload.js';
import type { RunSummary, SubmissionOutcome } from '../domain/entities/SubmissionOutcome.js';

const COMMENT_PREVIEW_LENGTH = 100;

export const API_TOKEN_URL = 'https://id.atlassian.com/manage-profile/security/api-tokens';

export function truncateComment(text: string): string {
  return text.length > COMMENT_PREVIEW_LENGTH ? `${text.slice(0, COMMENT_PREVIEW_LENGTH)}...` : text;
}

/**
 * RunReporter - console presentation of a run
 * Every line goes through the logger; level decides the colour (info green, warn yellow, error red).
 */
export class RunReporter {
  banner(params: { dryRun: boolean; domain: string; email: string }): void {
    logger.info('Jira Timesheet Logger');
    logger.info('=====================');
    if (params.dryRun) {
      logger.warn('DRY RUN MODE - No actual changes will be made');
    }
    logger.info(`Jira Domain: ${params.domain}`);
    logger.info(`Email: ${params.email}`);
  }

  processing(csvPath: string, rowCount: number): void {
    logger.info(`Processing CSV file: ${csvPath} (${rowCount} rows)`);
  }

  limitReached(limit: number, skipped: number): void {
    logger.warn(`Limit of ${limit} rows applied; ${skipped} remaining rows ignored`);
  }

  entry(entry: TimesheetEntry): void {
    logger.info(`Row ${entry.row}: ${entry.ticket} - ${entry.hours}h - ${entry.date}`);
    logger.info(`    Comment: ${truncateComment(entry.description)}`);
  }

  futureDate(entry: TimesheetEntry): void {
    logger.warn(`    Warning: future date detected: ${entry.date}`);
  }

  preview(entry: TimesheetEntry, payload: WorklogPayload): void {
    logger.warn(`    [DRY RUN] Would log ${entry.hours}h (${payload.timeSpentSeconds}s) to ${entry.ticket}`);
  }

  success(outcome: SubmissionOutcome): void {
    logger.info(`    ✓ ${outcome.message}`);
  }

  failure(outcome: SubmissionOutcome): void {
    if (outcome.failureKind === 'auth') {
      logger.error(`    ✗ Row ${outcome.row} (${outcome.ticket}): ${outcome.message}`);
      logger.error(`      Every remaining row will likely fail too. API tokens: ${API_TOKEN_URL}`);
      return;
    }
    if (outcome.failureKind === 'validation') {
      logger.error(`  ✗ ${outcome.message}`);
      return;
    }
    logger.error(`    ✗ Row ${outcome.row} (${outcome.ticket}): ${outcome.message}`);
  }

  summary(summary: RunSummary, dryRun: boolean): void {
    logger.info('Summary:');
    logger.info(`  Total entries processed: ${summary.total}`);
    if (dryRun) {
      logger.info(`  Previewed: ${summary.previewed}`);
    } else {
      logger.info(`  Successfully logged: ${summary.submitted}`);
    }
    if (summary.failed > 0) {
      logger.error(`  Failed: ${summary.failed} (${summary.validationFailures} validation)`);
    }
    if (summary.authFailures > 0) {
      logger.error(
        `  ${summary.authFailures} rows were rejected for authentication or permission reasons; check JIRA_EMAIL and JIRA_API_TOKEN`
      );
    }
    if (dryRun) {
      logger.warn('This was a dry run. To actually log the entries, run without --dry-run');
    }
  }

  fatal(message: string): void {
    logger.error(`Error: ${message}`);
  }
}
