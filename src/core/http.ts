import axios, { type AxiosAdapter, type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { errorMessage } from './errors.js';
import type { AttemptOutcome, RequestConfig, TransportErrorKind } from './types.js';

/** Performs exactly one HTTP attempt. Network problems come back as `failed` outcomes, never as throws. */
export interface HttpTransport {
  perform(request: RequestConfig): Promise<AttemptOutcome>;
}

export interface HttpClientOptions {
  maxRedirects?: number;
  /** In-process adapter, mostly for tests. */
  adapter?: AxiosAdapter;
}

export const createHttpClient = (options: HttpClientOptions = {}): AxiosInstance => {
  const defaults: CreateAxiosDefaults = {
    maxRedirects: options.maxRedirects ?? 5,
    // `size` counts the raw bytes; the body is decoded after.
    responseType: 'arraybuffer',
    // Every status is a response; the executor decides what counts as failure.
    validateStatus: () => true
  };
  if (options.adapter) defaults.adapter = options.adapter;
  return axios.create(defaults);
};

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ERR_NETWORK'
]);

export const errorKindOf = (err: unknown): TransportErrorKind => {
  if (!axios.isAxiosError(err)) return 'other';
  const code = err.code ?? '';
  if (TIMEOUT_CODES.has(code)) return 'timeout';
  if (CONNECTION_CODES.has(code)) return 'connection';
  return 'other';
};

const flattenHeaders = (headers: object): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return out;
};

const bodyBytes = (data: unknown): Buffer => {
  if (data === undefined || data === null) return Buffer.alloc(0);
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return Buffer.from(JSON.stringify(data), 'utf8');
};

export class AxiosTransport implements HttpTransport {
  constructor(
    private readonly client: AxiosInstance = createHttpClient(),
    private readonly now: () => number = () => performance.now()
  ) {}

  async perform(request: RequestConfig): Promise<AttemptOutcome> {
    const startedAt = this.now();
    const elapsed = (): number => (this.now() - startedAt) / 1000;

    try {
      const res = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: { ...request.headers },
        params: { ...request.params },
        data: request.body,
        timeout: Math.round(request.timeoutSeconds * 1000)
      });
      const bytes = bodyBytes(res.data);
      return {
        kind: 'responded',
        statusCode: res.status,
        elapsedSeconds: elapsed(),
        body: bytes.toString('utf8'),
        size: bytes.length,
        headers: flattenHeaders(res.headers)
      };
    } catch (err) {
      return {
        kind: 'failed',
        errorKind: errorKindOf(err),
        message: errorMessage(err),
        elapsedSeconds: elapsed()
      };
    }
  }
}
