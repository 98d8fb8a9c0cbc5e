import type { AttemptOutcome, Diagnosis, DiagnosisCategory, Severity, TransportErrorKind } from '../core/types.js';

/** Every terminal outcome lands in exactly one of these classes. */
export type FailureClass =
  | 'bad_request'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'method_not_allowed'
  | 'unprocessable_entity'
  | 'rate_limited'
  | 'internal_server_error'
  | 'bad_gateway'
  | 'service_unavailable'
  | 'gateway_timeout'
  | 'connection_error'
  | 'timeout'
  | 'unknown';

const classifyTransportError = (errorKind: TransportErrorKind): FailureClass => {
  switch (errorKind) {
    case 'connection':
      return 'connection_error';
    case 'timeout':
      return 'timeout';
    case 'other':
      return 'unknown';
  }
};

export const classifyOutcome = (outcome: AttemptOutcome): FailureClass => {
  if (outcome.kind === 'failed') return classifyTransportError(outcome.errorKind);

  switch (outcome.statusCode) {
    case 400:
      return 'bad_request';
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    case 405:
      return 'method_not_allowed';
    case 422:
      return 'unprocessable_entity';
    case 429:
      return 'rate_limited';
    case 500:
      return 'internal_server_error';
    case 502:
      return 'bad_gateway';
    case 503:
      return 'service_unavailable';
    case 504:
      return 'gateway_timeout';
    default:
      return 'unknown';
  }
};

interface DiagnosisTemplate {
  issue: string;
  cause: string;
  suggestion: string;
  severity: Severity;
  category: DiagnosisCategory;
}

const TEMPLATES: Record<Exclude<FailureClass, 'unknown'>, DiagnosisTemplate> = {
  bad_request: {
    issue: 'Bad Request (400)',
    cause: 'Request syntax is malformed or contains invalid parameters',
    suggestion: 'Check the request body format, required fields and parameter types against the API documentation.',
    severity: 'medium',
    category: 'client'
  },
  unauthorized: {
    issue: 'Unauthorized (401)',
    cause: 'Authentication credentials are missing, invalid or expired',
    suggestion: 'Verify the API token or key is current and sent in the Authorization header (or the configured API key header).',
    severity: 'high',
    category: 'auth'
  },
  forbidden: {
    issue: 'Forbidden (403)',
    cause: 'Credentials are valid but lack permission for this resource',
    suggestion: 'Grant the API key the scopes this endpoint requires, or ask the provider to check the account access rights.',
    severity: 'high',
    category: 'auth'
  },
  not_found: {
    issue: 'Not Found (404)',
    cause: 'The requested resource or endpoint does not exist',
    suggestion: 'Verify the endpoint path, the resource ID and the API version in the base URL.',
    severity: 'medium',
    category: 'client'
  },
  method_not_allowed: {
    issue: 'Method Not Allowed (405)',
    cause: 'The HTTP method is not supported by this endpoint',
    suggestion: 'Switch to one of the methods the endpoint lists in its Allow header or documentation.',
    severity: 'low',
    category: 'client'
  },
  unprocessable_entity: {
    issue: 'Unprocessable Entity (422)',
    cause: 'The request is well-formed but fails semantic validation',
    suggestion: 'Validate field values, data types and formats against the API constraints and resend.',
    severity: 'medium',
    category: 'client'
  },
  rate_limited: {
    issue: 'Rate Limit Exceeded (429)',
    cause: 'Too many requests were sent in the allowed time window',
    suggestion: 'Wait for the window in the Retry-After or rate limit headers to reset, lower the request rate, or raise the plan quota.',
    severity: 'medium',
    category: 'rate_limit'
  },
  internal_server_error: {
    issue: 'Internal Server Error (500)',
    cause: 'The server hit an unexpected condition',
    suggestion: 'Retry after a short delay; if it persists, report the request ID to the API provider.',
    severity: 'high',
    category: 'server'
  },
  bad_gateway: {
    issue: 'Bad Gateway (502)',
    cause: 'An upstream server returned an invalid response to the gateway',
    suggestion: 'Retry after a short delay and check the provider status page for infrastructure incidents.',
    severity: 'high',
    category: 'server'
  },
  service_unavailable: {
    issue: 'Service Unavailable (503)',
    cause: 'The server is overloaded or down for maintenance',
    suggestion: 'Wait and retry later; check the provider status page for maintenance windows.',
    severity: 'high',
    category: 'server'
  },
  gateway_timeout: {
    issue: 'Gateway Timeout (504)',
    cause: 'An upstream server did not answer the gateway in time',
    suggestion: 'Retry later, or narrow the request (smaller page size, fewer fields) so the upstream answers faster.',
    severity: 'high',
    category: 'server'
  },
  connection_error: {
    issue: 'Connection Failed',
    cause: 'No connection could be established to the server',
    suggestion: 'Check the host name and DNS resolution, network connectivity, and any firewall or proxy in the path.',
    severity: 'high',
    category: 'network'
  },
  timeout: {
    issue: 'Request Timeout',
    cause: 'No response arrived within the configured timeout',
    suggestion: 'Increase timeout_seconds, or check whether the endpoint is under heavy load.',
    severity: 'medium',
    category: 'network'
  }
};

const describeUnknown = (outcome: AttemptOutcome): Diagnosis => {
  if (outcome.kind === 'responded') {
    return {
      issue: `Unexpected Status (${outcome.statusCode})`,
      cause: `The server answered with HTTP ${outcome.statusCode}, which has no specific diagnosis`,
      suggestion: 'Look up this status code in the API documentation and inspect the response body for details.',
      severity: 'low',
      category: 'unknown'
    };
  }
  return {
    issue: 'Request Error',
    cause: outcome.message || 'The request failed before a response was received',
    suggestion: 'Check the request configuration (URL scheme, headers, body encoding) and the logs for the underlying error.',
    severity: 'low',
    category: 'unknown'
  };
};

/** Maps a terminal outcome to a diagnosis. Total and deterministic. */
export const diagnose = (outcome: AttemptOutcome): Diagnosis => {
  const failureClass = classifyOutcome(outcome);
  if (failureClass === 'unknown') return Object.freeze(describeUnknown(outcome));
  return Object.freeze({ ...TEMPLATES[failureClass] });
};
