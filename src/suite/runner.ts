import type { Logger } from '../core/logger.js';
import type { RequestResult } from '../core/types.js';
import type { RequestExecutor } from '../execution/requestExecutor.js';
import { summarize, type ResultSummary } from '../diagnosis/summary.js';
import type { LoadedSuite } from './load.js';

export interface CaseResult {
  id: string;
  result: RequestResult;
}

export interface SuiteRun {
  name: string;
  cases: CaseResult[];
  summary: ResultSummary;
}

/** Runs the suite's cases one after another through the executor. */
export const runSuite = async (suite: LoadedSuite, executor: RequestExecutor, logger: Logger): Promise<SuiteRun> => {
  const log = logger.child({ suite: suite.name });
  log.info('suite started', { baseUrl: suite.baseUrl, tests: suite.cases.length });

  const cases: CaseResult[] = [];
  for (const testCase of suite.cases) {
    const result = await executor.execute(testCase.request);
    cases.push({ id: testCase.id, result });
    if (result.success) {
      log.info('test passed', { id: testCase.id, statusCode: result.statusCode, attempts: result.attempts });
    } else {
      log.warn('test failed', {
        id: testCase.id,
        statusCode: result.statusCode,
        attempts: result.attempts,
        issue: result.diagnosis.issue
      });
    }
  }

  const summary = summarize(cases.map((c) => c.result));
  log.info('suite finished', { successful: summary.successful, failed: summary.failed });
  return { name: suite.name, cases, summary };
};
