export * from './core/types.js';
export { AppError, ConfigurationError, RetriesExhaustedError } from './core/errors.js';
export { JsonLogger, type Logger, type LogLevel } from './core/logger.js';
export { InMemoryMetrics, type Metrics } from './core/metrics.js';
export {
  RetryPolicy,
  backoffDelay,
  isRetryableOutcome,
  DEFAULT_RETRY_POLICY_OPTIONS,
  DEFAULT_RETRYABLE_STATUS_CODES,
  type RetryPolicyOptions,
  type JitterMode
} from './core/retry.js';
export { AxiosTransport, createHttpClient, type HttpTransport } from './core/http.js';
export { diagnose, classifyOutcome, type FailureClass } from './diagnosis/diagnose.js';
export { summarize, groupBySeverity, type ResultSummary } from './diagnosis/summary.js';
export { RequestExecutor, type RequestExecutorOptions } from './execution/requestExecutor.js';
export { buildRequestConfig } from './request/requestConfig.js';
export { createAuthProvider, parseAuthConfig, redactHeaders, type AuthConfig, type AuthProvider } from './auth/auth.js';
export { loadConfig, loadEnvFile } from './config/load.js';
export type { AppConfig } from './config/types.js';
export { loadSuiteFile, parseSuiteYaml, type LoadedSuite, type SuiteCase } from './suite/load.js';
export { runSuite, type SuiteRun } from './suite/runner.js';
export { buildReport, writeJsonReport, type JsonReport } from './report/jsonReport.js';
