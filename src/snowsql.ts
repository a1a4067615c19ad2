import { spawn } from 'child_process';
import chalk from 'chalk';
import { ConnectionConfig, ExecutionOutcome, ExecutionResult, SfddlConfig } from './types';

export const PASSWORD_ENV_VAR = 'SNOWSQL_PWD';

export const CONNECTION_TEST_QUERY = 'SELECT CURRENT_USER(), CURRENT_ACCOUNT(), CURRENT_REGION();';

// snowsql options for machine-readable listings: bare rows, no banners or timing
export const PLAIN_OUTPUT_OPTIONS = ['output_format=plain', 'friendly=false', 'timing=false', 'header=false'];

// snowsql can exit 0 even when a statement inside a batch failed
export const KNOWN_ERROR_MARKERS = ['SQL compilation error', 'does not exist'];

export type FailureDetector = (output: { stdout: string; stderr: string }) => boolean;
export type OutcomePolicy = (outcome: ExecutionOutcome) => boolean;

export const detectKnownErrors: FailureDetector = ({ stderr }) =>
  KNOWN_ERROR_MARKERS.some(marker => stderr.includes(marker));

// Only a clean run counts
export const strictOutcome: OutcomePolicy = outcome => outcome === 'SUCCESS';

// Trust the exit code alone
export const exitCodeOutcome: OutcomePolicy = outcome => outcome !== 'CLIENT_ERROR';

export interface ExecuteOptions {
  outputOptions?: string[];
  detectFailure?: FailureDetector;
  acceptOutcome?: OutcomePolicy;
  // Suppress the stdout/stderr echo, e.g. for listings parsed by the caller
  quiet?: boolean;
}

export function buildArgs(connection: ConnectionConfig, query: string, outputOptions: string[] = []): string[] {
  const args = [
    '-a', connection.account,
    '-u', connection.user,
    '-w', connection.warehouse,
    '-d', connection.database,
    '-r', connection.role,
  ];
  if (connection.region) {
    args.push('--region', connection.region);
  }
  args.push('-q', query);
  for (const option of outputOptions) {
    args.push('-o', option);
  }
  return args;
}

export function classifyOutcome(exitCode: number | null, output: { stdout: string; stderr: string }, detectFailure: FailureDetector): ExecutionOutcome {
  if (exitCode !== 0) {
    return 'CLIENT_ERROR';
  }
  return detectFailure(output) ? 'PROTOCOL_AMBIGUOUS' : 'SUCCESS';
}

/**
 * Runs queries through the snowsql binary, one subprocess per call.
 * The password reaches the child through its own environment only.
 */
export class SnowSql {
  private config: SfddlConfig;
  private verbose: boolean;

  constructor(config: SfddlConfig, options: { verbose?: boolean } = {}) {
    this.config = config;
    this.verbose = options.verbose ?? false;
  }

  async ping(acceptOutcome: OutcomePolicy = exitCodeOutcome): Promise<ExecutionResult> {
    return this.execute(CONNECTION_TEST_QUERY, { acceptOutcome });
  }

  async execute(query: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const {
      outputOptions = [],
      detectFailure = detectKnownErrors,
      acceptOutcome = exitCodeOutcome,
      quiet = false,
    } = options;
    const clientPath = this.config.client.path;
    const args = buildArgs(this.config.connection, query, outputOptions);

    console.log(chalk.gray(`Running: ${[clientPath, ...args.slice(0, args.indexOf('-q'))].join(' ')}... [query hidden]`));
    if (this.verbose) {
      console.log(chalk.gray('🔍 Query:'), chalk.gray(query.replace(/\n\s*/g, ' ').trim()));
    }

    const started = Date.now();
    const { stdout, stderr, exitCode } = await this.spawnClient(clientPath, args);
    const outcome = classifyOutcome(exitCode, { stdout, stderr }, detectFailure);
    const result: ExecutionResult = {
      success: acceptOutcome(outcome),
      outcome,
      stdout,
      stderr,
      exitCode,
      durationMs: Date.now() - started,
    };

    if (!quiet || this.verbose) {
      if (stdout) {
        console.log(chalk.gray('STDOUT:'));
        console.log(stdout);
      }
      if (stderr) {
        console.log(chalk.yellow('STDERR:'));
        console.log(stderr);
      }
    }
    return result;
  }

  private spawnClient(clientPath: string, args: string[]): Promise<{ stdout: string; stderr: string; exitCode: number | null }> {
    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const child = spawn(clientPath, args, {
        env: { ...process.env, [PASSWORD_ENV_VAR]: this.config.connection.password },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.once('error', (error: Error) => {
        if (settled) return;
        settled = true;
        console.error(chalk.bold.red(`❌ Failed to start ${clientPath}:`), error.message);
        resolve({ stdout, stderr: stderr + error.message, exitCode: null });
      });

      child.once('close', (code: number | null) => {
        if (settled) return;
        settled = true;
        resolve({ stdout, stderr, exitCode: code });
      });
    });
  }
}
