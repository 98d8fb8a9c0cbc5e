import { z } from 'zod';
import { LOG_LEVELS } from '../core/logger.js';

const positiveSeconds = (fallback: number) => z.coerce.number().finite().positive().default(fallback);

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  HTTP_TIMEOUT_SECONDS: positiveSeconds(10),
  HTTP_MAX_REDIRECTS: z.coerce.number().int().nonnegative().default(5),

  RETRY_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  RETRY_BASE_DELAY_SECONDS: positiveSeconds(1),
  RETRY_MAX_DELAY_SECONDS: positiveSeconds(30),
  RETRY_MULTIPLIER: z.coerce.number().finite().min(1).default(2),
  RETRY_JITTER: z.enum(['none', 'full']).default('none'),
  // Comma-separated, e.g. "429,500,502,503,504"
  RETRY_STATUS_CODES: z.string().optional(),

  REPORT_DIR: z.string().trim().min(1).default('reports')
});

const parseStatusCodes = (v: string | undefined, ctx: z.RefinementCtx): number[] | undefined => {
  if (v === undefined || v.trim() === '') return undefined;
  const codes = v.split(',').map((s) => s.trim()).filter(Boolean).map(Number);
  const invalid = codes.filter((c) => !Number.isInteger(c) || c < 100 || c > 599);
  if (invalid.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['RETRY_STATUS_CODES'],
      message: `not HTTP status codes: ${invalid.join(', ')}`
    });
    return undefined;
  }
  return codes;
};

export const configSchema = rawSchema
  .superRefine((raw, ctx) => {
    if (raw.RETRY_MAX_DELAY_SECONDS < raw.RETRY_BASE_DELAY_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RETRY_MAX_DELAY_SECONDS'],
        message: 'must be >= RETRY_BASE_DELAY_SECONDS'
      });
    }
  })
  .transform((raw, ctx) => {
    const retryableStatusCodes = parseStatusCodes(raw.RETRY_STATUS_CODES, ctx);

    return {
      nodeEnv: raw.NODE_ENV,
      logLevel: raw.LOG_LEVEL,

      http: {
        timeoutSeconds: raw.HTTP_TIMEOUT_SECONDS,
        maxRedirects: raw.HTTP_MAX_REDIRECTS
      },

      retry: {
        maxRetries: raw.RETRY_MAX_RETRIES,
        baseDelaySeconds: raw.RETRY_BASE_DELAY_SECONDS,
        maxDelaySeconds: raw.RETRY_MAX_DELAY_SECONDS,
        multiplier: raw.RETRY_MULTIPLIER,
        jitter: raw.RETRY_JITTER,
        ...(retryableStatusCodes ? { retryableStatusCodes } : {})
      },

      reports: {
        dir: raw.REPORT_DIR
      }
    };
  });
