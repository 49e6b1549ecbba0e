import path from 'node:path';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './domain/errors.js';
import { loadConfig } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { JiraWorklogAdapter } from './infra/JiraWorklogAdapter.js';
import { RunReporter, API_TOKEN_URL } from './services/RunReporter.js';
import { TimesheetRunner } from './services/TimesheetRunner.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_CSV = 'timesheet_data.csv';

export interface CliOptions {
  dryRun: boolean;
  csv: string;
  limit?: number;
  envFile: string;
}

function readPackageVersion(): string {
  const packageJson = readFileSync(path.resolve(__dirname, '../package.json'), 'utf8');
  return z.object({ version: z.string() }).parse(JSON.parse(packageJson)).version;
}

export function parseLimit(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new InvalidArgumentError('must be a positive integer.');
  }
  return Number(value);
}

export function createProgram(): Command {
  return new Command()
    .name('jira-timesheet-logger')
    .description('Log timesheet entries from a CSV file to Jira')
    .version(readPackageVersion())
    .option('--dry-run', 'show what would be logged without actually doing it', false)
    .option('--csv <path>', 'CSV file to read', DEFAULT_CSV)
    .option('--limit <n>', 'limit number of entries to process', parseLimit)
    .option('--env-file <path>', 'environment file to load before reading configuration', '.env')
    .exitOverride();
}

/**
 * Reads KEY=value pairs from an env file; a missing file yields no values
 */
export function readEnvFile(filePath: string): Record<string, string> {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(
      `Cannot read env file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return dotenv.parse(content);
}

/**
 * Runs the CLI and resolves with the process exit code.
 * Variables already present in `env` win over values from the env file.
 */
export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  setLogger(createLogger({ logLevel: 'info' }));

  const program = createProgram();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  const options = program.opts<CliOptions>();
  const reporter = new RunReporter();

  try {
    const config = loadConfig({ ...readEnvFile(path.resolve(options.envFile)), ...env });
    setLogger(createLogger(config));

    reporter.banner({ dryRun: options.dryRun, domain: config.jira.domain, email: config.jira.email });

    const adapter = new JiraWorklogAdapter(config.jira, {
      requestDelayMs: config.requestDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
    });
    const runner = new TimesheetRunner(adapter, reporter, { durationRounding: config.durationRounding });

    const result = await runner.run({
      csvPath: path.resolve(options.csv),
      dryRun: options.dryRun,
      limit: options.limit,
    });
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      reporter.fatal(error.message);
      if (error.message.includes('JIRA_API_TOKEN')) {
        reporter.fatal(`Create an API token at ${API_TOKEN_URL} and set it in ${options.envFile}`);
      }
      return 1;
    }
    throw error;
  }
}
