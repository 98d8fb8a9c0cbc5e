import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AuthConfig } from '../auth/auth.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import type { RequestConfig } from '../core/types.js';
import { formatIssues } from '../core/validation.js';
import { buildRequestConfig, mergeHeaders } from '../request/requestConfig.js';
import { suiteSchema, type SuiteDefinition } from './schema.js';

export interface SuiteCase {
  id: string;
  path: string;
  request: RequestConfig;
}

export interface LoadedSuite {
  name: string;
  baseUrl: string;
  auth?: AuthConfig;
  cases: SuiteCase[];
}

export interface SuiteFallbacks {
  timeoutSeconds: number;
}

export const parseSuite = (document: unknown): SuiteDefinition => {
  const parsed = suiteSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid test suite: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

/** Resolves each test against the suite defaults into a validated RequestConfig. */
export const buildSuite = (suite: SuiteDefinition, fallbacks: SuiteFallbacks): LoadedSuite => {
  const cases = suite.tests.map((test, index): SuiteCase => {
    try {
      const request = buildRequestConfig({
        method: test.method,
        url: `${suite.base_url}${test.path}`,
        headers: mergeHeaders(suite.defaults.headers, test.headers),
        params: test.params,
        body: test.body ?? undefined,
        timeoutSeconds: test.timeout_seconds ?? suite.defaults.timeout_seconds ?? fallbacks.timeoutSeconds,
        maxRetries: test.retries ?? suite.defaults.retries
      });
      return { id: test.id, path: test.path, request };
    } catch (err) {
      throw new ConfigurationError(`tests[${index}] (${test.id}): ${errorMessage(err)}`, { testId: test.id });
    }
  });

  return { name: suite.name, baseUrl: suite.base_url, auth: suite.auth, cases };
};

export const parseSuiteYaml = (source: string, fallbacks: SuiteFallbacks): LoadedSuite => {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (err) {
    throw new ConfigurationError(`Test suite is not valid YAML: ${errorMessage(err)}`);
  }
  return buildSuite(parseSuite(document), fallbacks);
};

export const loadSuiteFile = async (filePath: string, fallbacks: SuiteFallbacks): Promise<LoadedSuite> => {
  const fullPath = resolve(filePath);
  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Test suite file not found: ${filePath}`, { path: fullPath });
  }
  let source: string;
  try {
    source = await readFile(fullPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Test suite file could not be read: ${filePath}: ${errorMessage(err)}`, { path: fullPath });
  }
  return parseSuiteYaml(source, fallbacks);
};
