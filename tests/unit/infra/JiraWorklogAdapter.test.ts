import { describe, it, expect, vi } from 'vitest';
import {
  JiraWorklogAdapter,
  excerptErrorBody,
  type FetchFn,
} from '../../../src/infra/JiraWorklogAdapter.js';
import type { JiraConfig } from '../../../src/infra/env.js';
import { ApiError, TransportError } from '../../../src/domain/errors.js';
import { toWorklogPayload } from '../../../src/domain/entities/WorklogPayload.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const jira: JiraConfig = {
  email: 'user@example.com',
  apiToken: 'test-token',
  domain: 'company.atlassian.net',
  cloudId: '',
};

const payload = toWorklogPayload({
  row: 1,
  date: '2024-01-15',
  ticket: 'PROJ-123',
  description: 'Fixed OAuth bug',
  hours: 2.5,
});

function createAdapter(fetchFn: FetchFn, config: JiraConfig = jira) {
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const adapter = new JiraWorklogAdapter(config, {
    requestDelayMs: 1000,
    requestTimeoutMs: 15000,
    fetch: fetchFn,
    sleep,
  });
  return { adapter, sleep };
}

async function submitError(adapter: JiraWorklogAdapter): Promise<unknown> {
  try {
    await adapter.submitWorklog('PROJ-123', payload);
  } catch (error) {
    return error;
  }
  throw new Error('expected submitWorklog to fail');
}

describe('JiraWorklogAdapter', () => {
  it('should POST the payload with Basic auth over HTTPS', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('{"id":"10001"}', { status: 201 }));
    const { adapter } = createAdapter(fetchFn);

    const result = await adapter.submitWorklog('PROJ-123', payload);

    expect(result).toEqual({ status: 201, worklogId: '10001' });
    expect(fetchFn).toHaveBeenCalledOnce();
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://company.atlassian.net/rest/api/3/issue/PROJ-123/worklog');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: `Basic ${Buffer.from('user@example.com:test-token').toString('base64')}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    });
    expect(init?.body).toBe(JSON.stringify(payload));
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should route through the Atlassian gateway when a cloud id is set', () => {
    const { adapter } = createAdapter(vi.fn<FetchFn>(), { ...jira, cloudId: 'cloud-1' });

    expect(adapter.worklogUrl('PROJ-9')).toBe(
      'https://api.atlassian.com/ex/jira/cloud-1/rest/api/3/issue/PROJ-9/worklog'
    );
  });

  it('should treat a 2xx response without an id as success', async () => {
    const { adapter } = createAdapter(vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 200 })));

    await expect(adapter.submitWorklog('PROJ-123', payload)).resolves.toEqual({ status: 200, worklogId: null });
  });

  it('should wait the fixed delay after a successful request', async () => {
    const { adapter, sleep } = createAdapter(
      vi.fn<FetchFn>().mockResolvedValue(new Response('{}', { status: 201 }))
    );

    await adapter.submitWorklog('PROJ-123', payload);

    expect(sleep).toHaveBeenCalledOnce();
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('should wait the fixed delay after a failed request', async () => {
    const { adapter, sleep } = createAdapter(
      vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 500 }))
    );

    await submitError(adapter);

    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it.each([
    [401, 'auth', 'Authentication failed (HTTP 401): check JIRA_EMAIL and JIRA_API_TOKEN'],
    [403, 'auth', 'Permission denied (HTTP 403): the account cannot log work on PROJ-123'],
    [404, 'not_found', 'Ticket PROJ-123 not found (HTTP 404)'],
    [429, 'rate_limited', 'Rate limited by Jira (HTTP 429)'],
  ])('should classify HTTP %i as %s', async (status, kind, message) => {
    const { adapter } = createAdapter(vi.fn<FetchFn>().mockResolvedValue(new Response('nope', { status })));

    const error = await submitError(adapter);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status, kind, message, bodyExcerpt: 'nope' });
  });

  it('should report other statuses with the Jira error messages', async () => {
    const body = JSON.stringify({
      errorMessages: ['Worklog must not be null'],
      errors: { timeSpentSeconds: 'Invalid time duration entered.' },
    });
    const { adapter } = createAdapter(vi.fn<FetchFn>().mockResolvedValue(new Response(body, { status: 400 })));

    const error = await submitError(adapter);

    expect(error).toMatchObject({
      status: 400,
      kind: 'http',
      message:
        'Jira returned HTTP 400: Worklog must not be null; timeSpentSeconds: Invalid time duration entered.',
    });
  });

  it('should not retry a rate-limited request', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 429 }));
    const { adapter } = createAdapter(fetchFn);

    await submitError(adapter);

    expect(fetchFn).toHaveBeenCalledOnce();
  });

  it('should turn network failures into transport errors', async () => {
    const failure = new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND company.atlassian.net') });
    const { adapter, sleep } = createAdapter(vi.fn<FetchFn>().mockRejectedValue(failure));

    const error = await submitError(adapter);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Request failed: fetch failed (getaddrinfo ENOTFOUND company.atlassian.net)',
    });
    expect(sleep).toHaveBeenCalledOnce();
  });

  it('should report timeouts as transport errors', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const { adapter } = createAdapter(vi.fn<FetchFn>().mockRejectedValue(timeout));

    const error = await submitError(adapter);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Request timed out after 15000ms' });
  });

  it('should never log the API token', async () => {
    const { adapter } = createAdapter(vi.fn<FetchFn>().mockResolvedValue(new Response('{}', { status: 201 })));

    await adapter.submitWorklog('PROJ-123', payload);

    const logged = JSON.stringify(loggerMock.logger.debug.mock.calls);
    expect(logged).not.toContain('test-token');
  });
});

describe('excerptErrorBody', () => {
  it('should fall back to the raw text', () => {
    expect(excerptErrorBody('<html>\n  Bad Gateway\n</html>')).toBe('<html> Bad Gateway </html>');
  });

  it('should keep JSON bodies without Jira messages as text', () => {
    expect(excerptErrorBody('{"message":"oops"}')).toBe('{"message":"oops"}');
  });

  it('should truncate long bodies to 200 characters', () => {
    expect(excerptErrorBody('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
  });
});
