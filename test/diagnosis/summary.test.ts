import { describe, expect, it } from 'vitest';
import type { FailedResult, RequestResult, SucceededResult } from '../../src/core/types.js';
import { diagnose } from '../../src/diagnosis/diagnose.js';
import { groupBySeverity, summarize } from '../../src/diagnosis/summary.js';
import { failed, responded } from '../helpers.js';

const base = {
  method: 'GET' as const,
  url: 'https://api.example.test/x',
  totalDelaySeconds: 0,
  retries: 0,
  timestamp: '2026-03-04T05:06:07.000Z'
};

const ok = (elapsed: number): SucceededResult => ({
  ...base,
  success: true,
  statusCode: 200,
  outcome: responded(200),
  attempts: 1,
  totalElapsedSeconds: elapsed
});

const bad = (outcome: ReturnType<typeof responded> | ReturnType<typeof failed>, attempts: number, elapsed: number): FailedResult => ({
  ...base,
  success: false,
  statusCode: outcome.kind === 'responded' ? outcome.statusCode : undefined,
  outcome,
  attempts,
  totalElapsedSeconds: elapsed,
  diagnosis: diagnose(outcome)
});

describe('summarize', () => {
  it('aggregates totals, rates and error categories', () => {
    const results: RequestResult[] = [
      ok(0.5),
      ok(1.5),
      bad(responded(401), 1, 0.25),
      bad(failed('connection'), 4, 7.75)
    ];

    const summary = summarize(results);
    expect(summary.totalRequests).toBe(4);
    expect(summary.successful).toBe(2);
    expect(summary.failed).toBe(2);
    expect(summary.successRate).toBe(50);
    expect(summary.avgResponseSeconds).toBe(2.5);
    expect(summary.totalAttempts).toBe(7);
    expect(summary.errorCounts).toEqual({ auth: 1, network: 1 });
    expect(summary.diagnoses.map((d) => d.issue)).toEqual(['Unauthorized (401)', 'Connection Failed']);
  });

  it('handles an empty result list', () => {
    expect(summarize([])).toEqual({
      totalRequests: 0,
      successful: 0,
      failed: 0,
      successRate: 0,
      avgResponseSeconds: 0,
      totalAttempts: 0,
      errorCounts: {},
      diagnoses: []
    });
  });
});

describe('groupBySeverity', () => {
  it('buckets failed diagnoses and ignores successes', () => {
    const grouped = groupBySeverity([
      ok(1),
      bad(responded(503), 4, 8),
      bad(responded(405), 1, 1),
      bad(failed('timeout'), 2, 11)
    ]);
    expect(grouped.critical).toEqual([]);
    expect(grouped.high.map((d) => d.issue)).toEqual(['Service Unavailable (503)']);
    expect(grouped.medium.map((d) => d.issue)).toEqual(['Request Timeout']);
    expect(grouped.low.map((d) => d.issue)).toEqual(['Method Not Allowed (405)']);
  });
});
