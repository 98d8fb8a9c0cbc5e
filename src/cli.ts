#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createAuthProvider, type AuthProvider } from './auth/auth.js';
import { loadConfig, loadEnvFile } from './config/load.js';
import type { AppConfig } from './config/types.js';
import { AppError, ConfigurationError, errorMessage } from './core/errors.js';
import { AxiosTransport, createHttpClient, type HttpTransport } from './core/http.js';
import { JsonLogger, type Logger, type LogSink } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { RetryPolicy } from './core/retry.js';
import { formatIssues } from './core/validation.js';
import { RequestExecutor } from './execution/requestExecutor.js';
import { buildReport, writeJsonReport } from './report/jsonReport.js';
import { buildRequestConfig } from './request/requestConfig.js';
import { loadSuiteFile } from './suite/load.js';
import { runSuite } from './suite/runner.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  env: NodeJS.ProcessEnv;
}

export interface CliDeps {
  transport?: HttpTransport;
  sleep?: (seconds: number) => Promise<void>;
  /** Skips reading `.env`; tests pass their environment explicitly. */
  skipEnvFile?: boolean;
}

const USAGE = `Usage:
  api-doctor request --method <METHOD> --url <URL> [--headers JSON] [--params JSON] [--body JSON]
                     [--bearer TOKEN | --api-key KEY [--api-key-header NAME]]
                     [--timeout SECONDS] [--retries N] [--verbose]
  api-doctor suite --file <suite.yaml> [--no-report] [--report-dir DIR] [--verbose]
`;

const jsonFlag = <T>(flag: string, raw: string | undefined, schema: z.ZodType<T>): T | undefined => {
  if (raw === undefined) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`--${flag} is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`--${flag}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

const numberFlag = (flag: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new ConfigurationError(`--${flag} must be a number, got '${raw}'`);
  }
  return n;
};

const parseFlags = <T>(parse: () => T): T => {
  try {
    return parse();
  } catch (err) {
    // util.parseArgs reports unknown or malformed flags as TypeError.
    if (err instanceof TypeError) throw new ConfigurationError(err.message);
    throw err;
  }
};

interface Runtime {
  config: AppConfig;
  logger: Logger;
  metrics: InMemoryMetrics;
}

const createExecutor = (
  runtime: Runtime,
  deps: CliDeps,
  auth: AuthProvider | undefined
): RequestExecutor => {
  const transport = deps.transport ?? new AxiosTransport(createHttpClient({ maxRedirects: runtime.config.http.maxRedirects }));
  return new RequestExecutor(transport, runtime.logger, runtime.metrics, {
    policy: new RetryPolicy(runtime.config.retry),
    defaultMaxRetries: runtime.config.retry.maxRetries,
    auth,
    sleep: deps.sleep
  });
};

const runRequestCommand = async (args: string[], io: CliIO, deps: CliDeps, boot: (verbose: boolean) => Runtime) => {
  const { values } = parseFlags(() =>
    parseArgs({
      args,
      strict: true,
      options: {
        method: { type: 'string' },
        url: { type: 'string' },
        headers: { type: 'string' },
        params: { type: 'string' },
        body: { type: 'string' },
        bearer: { type: 'string' },
        'api-key': { type: 'string' },
        'api-key-header': { type: 'string', default: 'X-API-Key' },
        timeout: { type: 'string' },
        retries: { type: 'string' },
        verbose: { type: 'boolean', default: false }
      }
    })
  );

  if (!values.method) throw new ConfigurationError('--method is required');
  if (!values.url) throw new ConfigurationError('--url is required');
  if (values.bearer && values['api-key']) {
    throw new ConfigurationError('--bearer and --api-key are mutually exclusive');
  }

  const runtime = boot(values.verbose ?? false);
  const request = buildRequestConfig({
    method: values.method,
    url: values.url,
    headers: jsonFlag('headers', values.headers, z.record(z.string())),
    params: jsonFlag('params', values.params, z.record(z.union([z.string(), z.number(), z.boolean()]))),
    body: jsonFlag('body', values.body, z.unknown()),
    timeoutSeconds: numberFlag('timeout', values.timeout) ?? runtime.config.http.timeoutSeconds,
    maxRetries: numberFlag('retries', values.retries)
  });

  let auth: AuthProvider | undefined;
  if (values.bearer) {
    auth = createAuthProvider({ type: 'bearer', token: values.bearer }, io.env);
  } else if (values['api-key']) {
    auth = createAuthProvider(
      { type: 'api_key', api_key: values['api-key'], header_name: values['api-key-header'] ?? 'X-API-Key' },
      io.env
    );
  }

  const result = await createExecutor(runtime, deps, auth).execute(request);
  io.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  runtime.logger.debug('metrics', { ...runtime.metrics.snapshot() });
  return result.success ? EXIT_OK : EXIT_FAILED;
};

const runSuiteCommand = async (args: string[], io: CliIO, deps: CliDeps, boot: (verbose: boolean) => Runtime) => {
  const { values } = parseFlags(() =>
    parseArgs({
      args,
      strict: true,
      options: {
        file: { type: 'string' },
        'no-report': { type: 'boolean', default: false },
        'report-dir': { type: 'string' },
        verbose: { type: 'boolean', default: false }
      }
    })
  );
  if (!values.file) throw new ConfigurationError('--file is required');

  const runtime = boot(values.verbose ?? false);
  const suite = await loadSuiteFile(values.file, { timeoutSeconds: runtime.config.http.timeoutSeconds });
  const auth = suite.auth ? createAuthProvider(suite.auth, io.env) : undefined;

  const run = await runSuite(suite, createExecutor(runtime, deps, auth), runtime.logger);

  let reportPath: string | undefined;
  if (!values['no-report']) {
    reportPath = await writeJsonReport(
      buildReport(run.name, run.cases),
      values['report-dir'] ?? runtime.config.reports.dir
    );
    runtime.logger.info('report written', { path: reportPath });
  }

  io.stdout.write(`${JSON.stringify({ suite: run.name, summary: run.summary, report: reportPath ?? null }, null, 2)}\n`);
  runtime.logger.debug('metrics', { ...runtime.metrics.snapshot() });
  return run.summary.failed === 0 ? EXIT_OK : EXIT_FAILED;
};

const defaultIO: CliIO = { stdout: process.stdout, stderr: process.stderr, env: process.env };

/** Runs one CLI invocation and resolves to its exit code. */
export const runCli = async (argv: string[], io: CliIO = defaultIO, deps: CliDeps = {}): Promise<number> => {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    (command === undefined ? io.stderr : io.stdout).write(USAGE);
    return command === undefined ? EXIT_USAGE : EXIT_OK;
  }

  const boot = (verbose: boolean): Runtime => {
    if (!deps.skipEnvFile) loadEnvFile(io.env);
    const config = loadConfig(io.env);
    const logger = new JsonLogger(verbose ? 'debug' : config.logLevel, io.stderr);
    return { config, logger, metrics: new InMemoryMetrics() };
  };

  try {
    switch (command) {
      case 'request':
        return await runRequestCommand(rest, io, deps, boot);
      case 'suite':
        return await runSuiteCommand(rest, io, deps, boot);
      default:
        throw new ConfigurationError(`Unknown command '${command}'`);
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      io.stderr.write(`error: ${err.message}\n${USAGE}`);
      return EXIT_USAGE;
    }
    const code = err instanceof AppError ? err.code : 'UNEXPECTED';
    io.stderr.write(`${JSON.stringify({ ts: new Date().toISOString(), level: 'error', message: errorMessage(err), code })}\n`);
    return EXIT_FAILED;
  }
};

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Fatal error: ${errorMessage(err)}\n`);
      process.exitCode = EXIT_FAILED;
    }
  );
}
