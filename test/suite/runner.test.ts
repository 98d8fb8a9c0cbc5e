import { describe, expect, it } from 'vitest';
import { RequestExecutor } from '../../src/execution/requestExecutor.js';
import { parseSuiteYaml } from '../../src/suite/load.js';
import { runSuite } from '../../src/suite/runner.js';
import {
  FIXED_DATE,
  ScriptedTransport,
  createMockLogger,
  createMockMetrics,
  createRecordingSleep,
  failed,
  responded
} from '../helpers.js';

const SUITE = `
name: Smoke
base_url: https://api.example.test
defaults:
  retries: 0
tests:
  - id: health
    path: /health
  - id: secret
    path: /admin
  - id: flaky
    path: /flaky
    retries: 1
`;

describe('runSuite', () => {
  it('runs every case in order and summarizes the results', async () => {
    const transport = new ScriptedTransport([responded(200), responded(403), failed('timeout'), responded(200)]);
    const logger = createMockLogger();
    const executor = new RequestExecutor(transport, logger, createMockMetrics(), {
      sleep: createRecordingSleep().sleep,
      clock: () => FIXED_DATE
    });

    const run = await runSuite(parseSuiteYaml(SUITE, { timeoutSeconds: 10 }), executor, logger);

    expect(transport.requests.map((r) => r.url)).toEqual([
      'https://api.example.test/health',
      'https://api.example.test/admin',
      'https://api.example.test/flaky',
      'https://api.example.test/flaky'
    ]);
    expect(run.name).toBe('Smoke');
    expect(run.cases.map((c) => [c.id, c.result.success])).toEqual([
      ['health', true],
      ['secret', false],
      ['flaky', true]
    ]);
    expect(run.summary.totalRequests).toBe(3);
    expect(run.summary.failed).toBe(1);
    expect(run.summary.totalAttempts).toBe(4);
    expect(run.summary.errorCounts).toEqual({ auth: 1 });

    const failures = logger.records.filter((r) => r.message === 'test failed');
    expect(failures).toHaveLength(1);
    expect(failures[0]?.context).toMatchObject({ suite: 'Smoke', id: 'secret', statusCode: 403 });
  });
});
