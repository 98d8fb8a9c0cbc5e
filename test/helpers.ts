/**
 * Shared test helpers — mock factories and scripted collaborators.
 */

import type { HttpTransport } from '../src/core/http.js';
import type { Logger, LogContext } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type {
  AttemptOutcome,
  FailedOutcome,
  RequestConfig,
  RespondedOutcome,
  TransportErrorKind
} from '../src/core/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: LogContext;
}

export const createMockLogger = (records: LogRecord[] = [], bindings: LogContext = {}): Logger & { records: LogRecord[] } => {
  const push = (level: LogRecord['level']) => (message: string, context?: LogContext) => {
    records.push({ level, message, context: { ...bindings, ...context } });
  };
  return {
    records,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child: (extra: LogContext) => createMockLogger(records, { ...bindings, ...extra })
  };
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number>; samples: Map<string, number[]> } => {
  const counters = new Map<string, number>();
  const samples = new Map<string, number[]>();
  return {
    counters,
    samples,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    observe(name: string, value: number) { samples.set(name, [...(samples.get(name) ?? []), value]); },
  };
};

// ── Outcome Factories ───────────────────────────────────────────────

export function responded(statusCode: number, overrides: Partial<RespondedOutcome> = {}): RespondedOutcome {
  const body = overrides.body ?? `{"status":${statusCode}}`;
  return {
    kind: 'responded',
    statusCode,
    elapsedSeconds: 0.25,
    body,
    size: Buffer.byteLength(body),
    headers: {},
    ...overrides,
  };
}

export function failed(errorKind: TransportErrorKind, overrides: Partial<FailedOutcome> = {}): FailedOutcome {
  return {
    kind: 'failed',
    errorKind,
    message: `${errorKind} error`,
    elapsedSeconds: 0.5,
    ...overrides,
  };
}

// ── Scripted Transport ──────────────────────────────────────────────

/**
 * Returns the scripted outcomes in order; the last one repeats once the script runs out.
 * Records every request it was asked to perform.
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: RequestConfig[] = [];
  private index = 0;

  constructor(private readonly script: AttemptOutcome[]) {
    if (script.length === 0) throw new Error('ScriptedTransport needs at least one outcome');
  }

  async perform(request: RequestConfig): Promise<AttemptOutcome> {
    this.requests.push(request);
    const outcome = this.script[Math.min(this.index, this.script.length - 1)];
    this.index += 1;
    if (!outcome) throw new Error('script exhausted');
    return outcome;
  }

  get calls(): number {
    return this.requests.length;
  }
}

// ── Recording Sleeper ───────────────────────────────────────────────

export const createRecordingSleep = (): { sleep: (seconds: number) => Promise<void>; delays: number[] } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (seconds: number) => { delays.push(seconds); },
  };
};

// ── Request Factory ─────────────────────────────────────────────────

export function makeRequest(overrides: Partial<RequestConfig> = {}): RequestConfig {
  return {
    method: 'GET',
    url: 'https://api.example.test/v1/items',
    headers: {},
    params: {},
    timeoutSeconds: 10,
    ...overrides,
  };
}

export const FIXED_DATE = new Date('2026-03-04T05:06:07.000Z');
