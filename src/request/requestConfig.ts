import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { HTTP_METHODS, type RequestConfig } from '../core/types.js';
import { formatIssues } from '../core/validation.js';

const queryValue = z.union([z.string(), z.number(), z.boolean()]);

export const requestConfigSchema = z.object({
  method: z
    .string()
    .transform((m) => m.trim().toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
  url: z.string().trim().min(1, 'must not be empty').url('must be an absolute URL'),
  headers: z
    .record(z.string())
    .default({})
    .superRefine((headers, ctx) => {
      const seen = new Set<string>();
      for (const name of Object.keys(headers)) {
        const key = name.toLowerCase();
        if (seen.has(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate header ${name}` });
        }
        seen.add(key);
      }
    }),
  params: z.record(queryValue).default({}),
  body: z.unknown().optional(),
  timeoutSeconds: z.number().finite().positive(),
  maxRetries: z.number().int().nonnegative().optional()
});

/** Validates untrusted input once, at the boundary, into an immutable RequestConfig. */
export const buildRequestConfig = (input: unknown): RequestConfig => {
  const parsed = requestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid request config: ${formatIssues(parsed.error)}`);
  }
  const { headers, params, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    headers: Object.freeze({ ...headers }),
    params: Object.freeze({ ...params })
  });
};

/** Merges `override` over `base`, replacing headers that differ only in case. */
export const mergeHeaders = (
  base: Readonly<Record<string, string>>,
  override: Readonly<Record<string, string>>
): Record<string, string> => {
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(base)) {
    merged[name] = value;
  }
  for (const [name, value] of Object.entries(override)) {
    for (const existing of Object.keys(merged)) {
      if (existing.toLowerCase() === name.toLowerCase()) delete merged[existing];
    }
    merged[name] = value;
  }
  return merged;
};
