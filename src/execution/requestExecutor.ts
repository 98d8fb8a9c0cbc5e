import type { AuthProvider } from '../auth/auth.js';
import { redactHeaders } from '../auth/auth.js';
import { RetriesExhaustedError, errorMessage } from '../core/errors.js';
import type { HttpTransport } from '../core/http.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { RetryPolicy, sleep } from '../core/retry.js';
import {
  isSuccessStatus,
  type AttemptOutcome,
  type ExecutionState,
  type FailedResult,
  type RequestConfig,
  type RequestResult,
  type RespondedOutcome,
  type SucceededResult
} from '../core/types.js';
import { mustBeNonNegativeInteger } from '../core/validation.js';
import { diagnose } from '../diagnosis/diagnose.js';
import { buildRequestConfig, mergeHeaders } from '../request/requestConfig.js';

const VALID_TRANSITIONS: Record<ExecutionState, ExecutionState[]> = {
  pending: ['attempting'],
  attempting: ['retrying', 'succeeded', 'failed'],
  retrying: ['attempting'],
  succeeded: [],
  failed: []
};

export interface RequestExecutorOptions {
  policy?: RetryPolicy;
  /** Retry budget for requests that carry no `maxRetries` of their own. */
  defaultMaxRetries?: number;
  auth?: AuthProvider;
  /** Suspends the current execution only. Injected by tests to skip real waits. */
  sleep?: (seconds: number) => Promise<void>;
  clock?: () => Date;
}

/** Per-call bookkeeping. Never shared between executions. */
interface ExecutionRun {
  state: ExecutionState;
  attempts: number;
  attemptSeconds: number;
  delaySeconds: number;
}

const describeOutcome = (outcome: AttemptOutcome): Record<string, unknown> =>
  outcome.kind === 'responded'
    ? { statusCode: outcome.statusCode, elapsedSeconds: outcome.elapsedSeconds, size: outcome.size }
    : { errorKind: outcome.errorKind, error: outcome.message, elapsedSeconds: outcome.elapsedSeconds };

/**
 * Runs one logical request: attempt, consult the retry policy, wait, repeat.
 * Diagnoses the terminal outcome when the policy stops retrying.
 */
export class RequestExecutor {
  readonly policy: RetryPolicy;
  private readonly defaultMaxRetries: number;
  private readonly auth?: AuthProvider;
  private readonly sleep: (seconds: number) => Promise<void>;
  private readonly clock: () => Date;

  constructor(
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    options: RequestExecutorOptions = {}
  ) {
    this.policy = options.policy ?? new RetryPolicy();
    this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
    mustBeNonNegativeInteger(this.defaultMaxRetries, 'defaultMaxRetries');
    this.auth = options.auth;
    this.sleep = options.sleep ?? ((seconds) => sleep(seconds * 1000));
    this.clock = options.clock ?? (() => new Date());
  }

  /** Never throws for HTTP or network failures; only invalid configuration is thrown. */
  async execute(input: RequestConfig): Promise<RequestResult> {
    const config = buildRequestConfig(input);
    const maxRetries = config.maxRetries ?? this.defaultMaxRetries;
    const request = this.withAuth(config);
    const log = this.logger.child({ method: config.method, url: config.url });
    const run: ExecutionRun = { state: 'pending', attempts: 0, attemptSeconds: 0, delaySeconds: 0 };

    log.debug('request started', {
      maxRetries,
      timeoutSeconds: config.timeoutSeconds,
      headers: redactHeaders(request.headers, this.auth?.sensitiveHeaders)
    });

    for (;;) {
      this.transition(run, 'attempting');
      run.attempts += 1;
      const outcome = await this.attempt(request);
      run.attemptSeconds += outcome.elapsedSeconds;
      this.metrics.increment('request.attempt');
      this.metrics.observe('request.attempt_seconds', outcome.elapsedSeconds);

      if (outcome.kind === 'responded' && isSuccessStatus(outcome.statusCode)) {
        this.transition(run, 'succeeded');
        this.metrics.increment('request.succeeded');
        log.debug('attempt succeeded', { attempt: run.attempts, ...describeOutcome(outcome) });
        return this.succeeded(config, run, outcome);
      }

      const decision = this.policy.decide(run.attempts, outcome, maxRetries);
      log.warn('attempt failed', {
        attempt: run.attempts,
        maxAttempts: maxRetries + 1,
        retrying: decision.shouldRetry,
        delaySeconds: decision.delaySeconds,
        ...describeOutcome(outcome)
      });

      if (!decision.shouldRetry) {
        this.transition(run, 'failed');
        this.metrics.increment('request.failed');
        const result = this.failed(config, run, outcome);
        log.info('request failed', {
          attempts: run.attempts,
          category: result.diagnosis.category,
          severity: result.diagnosis.severity
        });
        return result;
      }

      this.transition(run, 'retrying');
      this.metrics.increment('request.retry');
      this.metrics.observe('request.retry_delay_seconds', decision.delaySeconds);
      await this.sleep(decision.delaySeconds);
      run.delaySeconds += decision.delaySeconds;
    }
  }

  /** Like `execute`, but a terminal failure is thrown as RetriesExhaustedError. */
  async executeOrThrow(input: RequestConfig): Promise<SucceededResult> {
    const result = await this.execute(input);
    if (!result.success) throw new RetriesExhaustedError(result);
    return result;
  }

  /** A transport that rejects counts as a failed attempt of kind `other`. */
  private async attempt(request: RequestConfig): Promise<AttemptOutcome> {
    const startedAt = performance.now();
    try {
      return await this.transport.perform(request);
    } catch (err) {
      return {
        kind: 'failed',
        errorKind: 'other',
        message: errorMessage(err),
        elapsedSeconds: (performance.now() - startedAt) / 1000
      };
    }
  }

  private withAuth(config: RequestConfig): RequestConfig {
    if (!this.auth) return config;
    return { ...config, headers: mergeHeaders(config.headers, this.auth.headers()) };
  }

  private transition(run: ExecutionRun, to: ExecutionState): void {
    if (!VALID_TRANSITIONS[run.state].includes(to)) {
      throw new Error(`Invalid execution transition: ${run.state} -> ${to}`);
    }
    run.state = to;
  }

  private base(config: RequestConfig, run: ExecutionRun) {
    return {
      method: config.method,
      url: config.url,
      totalElapsedSeconds: run.attemptSeconds + run.delaySeconds,
      totalDelaySeconds: run.delaySeconds,
      attempts: run.attempts,
      retries: run.attempts - 1,
      timestamp: this.clock().toISOString()
    };
  }

  private succeeded(
    config: RequestConfig,
    run: ExecutionRun,
    outcome: RespondedOutcome
  ): SucceededResult {
    return { ...this.base(config, run), success: true, statusCode: outcome.statusCode, outcome };
  }

  private failed(config: RequestConfig, run: ExecutionRun, outcome: AttemptOutcome): FailedResult {
    return {
      ...this.base(config, run),
      success: false,
      statusCode: outcome.kind === 'responded' ? outcome.statusCode : undefined,
      outcome,
      diagnosis: diagnose(outcome)
    };
  }
}
