import { z } from 'zod';
import { authConfigSchema } from '../auth/auth.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const headerMap = z.record(scalar.transform(String)).default({});
const paramMap = z.record(scalar).default({});

// `auth:` left empty, or `auth: {}`, means the suite runs without auth.
const isEmptyAuth = (v: unknown): boolean =>
  v === null || v === undefined || (typeof v === 'object' && v !== null && !Array.isArray(v) && Object.keys(v).length === 0);

export const testCaseSchema = z.object({
  id: z.string().trim().min(1),
  method: z.string().default('GET'),
  path: z.string().default(''),
  headers: headerMap,
  params: paramMap,
  body: z.unknown().optional(),
  timeout_seconds: z.number().positive().optional(),
  retries: z.number().int().nonnegative().optional()
});

export const suiteSchema = z
  .object({
    name: z.string().trim().min(1).default('Unnamed Test Suite'),
    base_url: z.string().trim().default(''),
    defaults: z
      .object({
        headers: headerMap,
        timeout_seconds: z.number().positive().optional(),
        retries: z.number().int().nonnegative().optional()
      })
      .default({}),
    auth: z.preprocess((v) => (isEmptyAuth(v) ? undefined : v), authConfigSchema.optional()),
    tests: z.array(testCaseSchema).default([])
  })
  .superRefine((suite, ctx) => {
    const seen = new Set<string>();
    suite.tests.forEach((test, index) => {
      if (seen.has(test.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tests', index, 'id'],
          message: `duplicate test id ${test.id}`
        });
      }
      seen.add(test.id);
    });
  });

export type SuiteDefinition = z.infer<typeof suiteSchema>;
