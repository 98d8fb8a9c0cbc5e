export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type QueryValue = string | number | boolean;

export interface RequestConfig {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly params: Readonly<Record<string, QueryValue>>;
  readonly body?: unknown;
  readonly timeoutSeconds: number;
  /** Overrides the executor's default retry budget for this request only. */
  readonly maxRetries?: number;
}

export type TransportErrorKind = 'connection' | 'timeout' | 'other';

export interface RespondedOutcome {
  kind: 'responded';
  statusCode: number;
  elapsedSeconds: number;
  body: string;
  size: number;
  headers: Record<string, string>;
}

export interface FailedOutcome {
  kind: 'failed';
  errorKind: TransportErrorKind;
  message: string;
  elapsedSeconds: number;
}

export type AttemptOutcome = RespondedOutcome | FailedOutcome;

export interface RetryDecision {
  shouldRetry: boolean;
  delaySeconds: number;
}

export type Severity = 'low' | 'medium' | 'high' | 'critical';
export type DiagnosisCategory = 'auth' | 'network' | 'server' | 'client' | 'rate_limit' | 'unknown';

export interface Diagnosis {
  readonly issue: string;
  readonly cause: string;
  readonly suggestion: string;
  readonly severity: Severity;
  readonly category: DiagnosisCategory;
}

export type ExecutionState = 'pending' | 'attempting' | 'retrying' | 'succeeded' | 'failed';

interface RequestResultBase {
  method: HttpMethod;
  url: string;
  /** Attempt time plus retry delays, in seconds. */
  totalElapsedSeconds: number;
  totalDelaySeconds: number;
  attempts: number;
  retries: number;
  timestamp: string;
}

export interface SucceededResult extends RequestResultBase {
  success: true;
  statusCode: number;
  outcome: RespondedOutcome;
}

export interface FailedResult extends RequestResultBase {
  success: false;
  statusCode?: number;
  outcome: AttemptOutcome;
  diagnosis: Diagnosis;
}

export type RequestResult = SucceededResult | FailedResult;

export const isSuccessStatus = (statusCode: number): boolean => statusCode >= 200 && statusCode < 400;
