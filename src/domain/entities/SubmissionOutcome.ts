/**
 * SubmissionOutcome entity - result of processing one timesheet row
 */
export type OutcomeStatus = 'submitted' | 'previewed' | 'failed';
export type FailureKind = 'validation' | 'auth' | 'not_found' | 'rate_limited' | 'http' | 'transport';

export interface SubmissionOutcome {
  readonly row: number;
  readonly ticket: string;
  readonly status: OutcomeStatus;
  readonly failureKind: FailureKind | null;
  /** HTTP status of the Jira response; null for previews, validation and transport failures */
  readonly httpStatus: number | null;
  readonly message: string;
}

export interface RunSummary {
  total: number;
  submitted: number;
  previewed: number;
  failed: number;
  validationFailures: number;
  authFailures: number;
}

export function createSubmittedOutcome(params: {
  row: number;
  ticket: string;
  httpStatus: number;
  message: string;
}): SubmissionOutcome {
  return {
    row: params.row,
    ticket: params.ticket,
    status: 'submitted',
    failureKind: null,
    httpStatus: params.httpStatus,
    message: params.message,
  };
}

export function createPreviewedOutcome(params: { row: number; ticket: string; message: string }): SubmissionOutcome {
  return {
    row: params.row,
    ticket: params.ticket,
    status: 'previewed',
    failureKind: null,
    httpStatus: null,
    message: params.message,
  };
}

export function createFailedOutcome(params: {
  row: number;
  ticket: string;
  failureKind: FailureKind;
  httpStatus?: number | null;
  message: string;
}): SubmissionOutcome {
  return {
    row: params.row,
    ticket: params.ticket,
    status: 'failed',
    failureKind: params.failureKind,
    httpStatus: params.httpStatus ?? null,
    message: params.message,
  };
}

export function summarizeOutcomes(outcomes: readonly SubmissionOutcome[]): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    submitted: 0,
    previewed: 0,
    failed: 0,
    validationFailures: 0,
    authFailures: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'submitted':
        summary.submitted++;
        break;
      case 'previewed':
        summary.previewed++;
        break;
      case 'failed':
        summary.failed++;
        if (outcome.failureKind === 'validation') summary.validationFailures++;
        if (outcome.failureKind === 'auth') summary.authFailures++;
        break;
    }
  }

  return summary;
}

/**
 * Dry runs always exit 0; live runs exit 1 when any row failed
 */
export function exitCodeFor(summary: RunSummary, dryRun: boolean): number {
  if (dryRun) return 0;
  return summary.failed > 0 ? 1 : 0;
}
