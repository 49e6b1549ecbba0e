import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { ApiError, TransportError } from '../domain/errors.js';
import type { WorklogPayload } from '../domain/entities/WorklogPayload.js';
import { logger } from './logger.js';
import type { JiraConfig } from './env.js';

export interface SubmittedWorklog {
  status: number;
  /** Identifier of the created worklog, when Jira returned one */
  worklogId: string | null;
}

/**
 * Anything that can post a worklog for a ticket.
 * Implementations throw ApiError for non-2xx responses and TransportError when no response arrives.
 */
export interface WorklogSubmitter {
  submitWorklog(ticket: string, payload: WorklogPayload): Promise<SubmittedWorklog>;
}

export type FetchFn = typeof fetch;

export interface JiraWorklogAdapterOptions {
  /** Fixed pause after every request, successful or not */
  requestDelayMs: number;
  requestTimeoutMs: number;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

const ATLASSIAN_GATEWAY = 'https://api.atlassian.com/ex/jira';
const BODY_EXCERPT_LENGTH = 200;

const jiraErrorBodySchema = z.object({
  errorMessages: z.array(z.string()).optional(),
  errors: z.record(z.string()).optional(),
});

const createdWorklogSchema = z.object({
  id: z.string(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extracts Jira's error messages from a response body, falling back to the raw text
 */
export function excerptErrorBody(text: string): string {
  const parsed = jiraErrorBodySchema.safeParse(parseJson(text));
  let excerpt = text;

  if (parsed.success) {
    const messages = [
      ...(parsed.data.errorMessages ?? []),
      ...Object.entries(parsed.data.errors ?? {}).map(([field, message]) => `${field}: ${message}`),
    ];
    if (messages.length > 0) {
      excerpt = messages.join('; ');
    }
  }

  excerpt = excerpt.replace(/\s+/g, ' ').trim();
  return excerpt.length > BODY_EXCERPT_LENGTH ? `${excerpt.slice(0, BODY_EXCERPT_LENGTH)}...` : excerpt;
}

function describeTransportFailure(error: unknown, timeoutMs: number): string {
  if (typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `Request failed: ${error.message}${cause}`;
  }
  return `Request failed: ${String(error)}`;
}

/**
 * Jira Cloud worklog adapter
 * One HTTPS POST per call, Basic auth, bounded by a timeout, followed by a fixed delay.
 */
export class JiraWorklogAdapter implements WorklogSubmitter {
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly jira: JiraConfig,
    private readonly options: JiraWorklogAdapterOptions
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  /**
   * Worklog endpoint for a ticket; routed through the Atlassian gateway when a cloud id is configured
   */
  worklogUrl(ticket: string): string {
    const base = this.jira.cloudId
      ? `${ATLASSIAN_GATEWAY}/${encodeURIComponent(this.jira.cloudId)}`
      : `https://${this.jira.domain}`;
    return `${base}/rest/api/3/issue/${encodeURIComponent(ticket)}/worklog`;
  }

  async submitWorklog(ticket: string, payload: WorklogPayload): Promise<SubmittedWorklog> {
    try {
      return await this.post(ticket, payload);
    } finally {
      await this.sleep(this.options.requestDelayMs);
    }
  }

  private authorizationHeader(): string {
    const credentials = Buffer.from(`${this.jira.email}:${this.jira.apiToken}`).toString('base64');
    return `Basic ${credentials}`;
  }

  private async post(ticket: string, payload: WorklogPayload): Promise<SubmittedWorklog> {
    const url = this.worklogUrl(ticket);
    logger.debug('Posting worklog', {
      ticket,
      url,
      started: payload.started,
      timeSpentSeconds: payload.timeSpentSeconds,
    });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          Authorization: this.authorizationHeader(),
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      const message = describeTransportFailure(error, this.options.requestTimeoutMs);
      logger.debug('Worklog request failed', { ticket, message });
      throw new TransportError(message, { ticket });
    }

    const text = await this.readBody(response, ticket);
    logger.debug('Worklog response', { ticket, status: response.status });

    if (response.ok) {
      const created = createdWorklogSchema.safeParse(parseJson(text));
      return {
        status: response.status,
        worklogId: created.success ? created.data.id : null,
      };
    }

    throw this.classify(response.status, ticket, excerptErrorBody(text));
  }

  private async readBody(response: Response, ticket: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      logger.debug('Could not read Jira response body', {
        ticket,
        status: response.status,
        message: error instanceof Error ? error.message : String(error),
      });
      return '';
    }
  }

  private classify(status: number, ticket: string, excerpt: string): ApiError {
    switch (status) {
      case 401:
        return new ApiError(
          'Authentication failed (HTTP 401): check JIRA_EMAIL and JIRA_API_TOKEN',
          status,
          'auth',
          excerpt
        );
      case 403:
        return new ApiError(
          `Permission denied (HTTP 403): the account cannot log work on ${ticket}`,
          status,
          'auth',
          excerpt
        );
      case 404:
        return new ApiError(`Ticket ${ticket} not found (HTTP 404)`, status, 'not_found', excerpt);
      case 429:
        return new ApiError('Rate limited by Jira (HTTP 429)', status, 'rate_limited', excerpt);
      default:
        return new ApiError(
          `Jira returned HTTP ${status}${excerpt ? `: ${excerpt}` : ''}`,
          status,
          'http',
          excerpt
        );
    }
  }
}
