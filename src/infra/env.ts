import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';
import type { DurationRounding } from '../domain/entities/WorklogPayload.js';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const DOMAIN_PATTERN = /^[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

/** Trims strings; empty values count as absent */
function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Strips a leading http:// or https:// and any trailing slashes
 */
export function normalizeDomain(value: string): string {
  return value
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/\/+$/, '');
}

const envSchema = z.object({
  JIRA_EMAIL: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: 'is required' })
      .regex(EMAIL_PATTERN, { message: 'must be an email address' })
  ),
  JIRA_API_TOKEN: z.preprocess(blankToUndefined, z.string({ required_error: 'is required' })),
  JIRA_DOMAIN: z.preprocess(
    (value) => {
      const text = blankToUndefined(value);
      return typeof text === 'string' ? normalizeDomain(text) : text;
    },
    z.string({ required_error: 'is required' }).regex(DOMAIN_PATTERN, {
      message: 'must be a hostname like yourcompany.atlassian.net',
    })
  ),
  JIRA_CLOUD_ID: z.preprocess(blankToUndefined, z.string().default('')),

  // Rate limiting and timeouts (per request)
  JIRA_REQUEST_DELAY_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0, { message: 'must be 0 or more' }).default(1000)
  ),
  JIRA_REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1, { message: 'must be at least 1' }).default(15000)
  ),
  WORKLOG_DURATION_ROUNDING: z.preprocess(
    blankToUndefined,
    z.enum(['half-up', 'ceil']).default('half-up')
  ),

  // Logging
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['error', 'warn', 'info', 'debug']).default('info')),
  LOG_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export interface JiraConfig {
  readonly email: string;
  readonly apiToken: string;
  /** Bare hostname, no scheme or path */
  readonly domain: string;
  /** Empty when requests go straight to the site domain */
  readonly cloudId: string;
}

export interface AppConfig {
  readonly jira: JiraConfig;
  readonly requestDelayMs: number;
  readonly requestTimeoutMs: number;
  readonly durationRounding: DurationRounding;
  readonly logLevel: LogLevel;
  readonly logFile?: string;
}

/**
 * Validates environment values and builds the run configuration.
 * Every invalid field is reported in a single ConfigurationError; secret values are never echoed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, {
      fields: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const env = result.data;

  return Object.freeze({
    jira: Object.freeze({
      email: env.JIRA_EMAIL,
      apiToken: env.JIRA_API_TOKEN,
      domain: env.JIRA_DOMAIN,
      cloudId: env.JIRA_CLOUD_ID,
    }),
    requestDelayMs: env.JIRA_REQUEST_DELAY_MS,
    requestTimeoutMs: env.JIRA_REQUEST_TIMEOUT_MS,
    durationRounding: env.WORKLOG_DURATION_ROUNDING,
    logLevel: env.LOG_LEVEL,
    logFile: env.LOG_FILE,
  });
}
