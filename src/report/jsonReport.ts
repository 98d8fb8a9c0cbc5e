import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Diagnosis, HttpMethod } from '../core/types.js';
import { summarize, type ResultSummary } from '../diagnosis/summary.js';
import type { CaseResult } from '../suite/runner.js';

export interface ReportEntry {
  id: string;
  method: HttpMethod;
  url: string;
  success: boolean;
  statusCode: number | null;
  attempts: number;
  totalElapsedSeconds: number;
  responseSize: number;
  timestamp: string;
  diagnosis: Diagnosis | null;
}

export interface JsonReport {
  suite: string;
  generatedAt: string;
  summary: ResultSummary;
  results: ReportEntry[];
}

const toEntry = ({ id, result }: CaseResult): ReportEntry => ({
  id,
  method: result.method,
  url: result.url,
  success: result.success,
  statusCode: result.statusCode ?? null,
  attempts: result.attempts,
  totalElapsedSeconds: result.totalElapsedSeconds,
  responseSize: result.outcome.kind === 'responded' ? result.outcome.size : 0,
  timestamp: result.timestamp,
  diagnosis: result.success ? null : result.diagnosis
});

export const buildReport = (suite: string, cases: readonly CaseResult[], generatedAt: Date = new Date()): JsonReport => ({
  suite,
  generatedAt: generatedAt.toISOString(),
  summary: summarize(cases.map((c) => c.result)),
  results: cases.map(toEntry)
});

export const sanitizeFilename = (name: string): string => name.replace(/[<>:"/\\|?*\s]+/g, '_');

/** `2026-03-04T05:06:07.890Z` → `20260304_050607` (UTC). */
export const fileTimestamp = (date: Date): string => {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
};

/** Writes the report as pretty-printed JSON and returns the file path. */
export const writeJsonReport = async (report: JsonReport, dir: string): Promise<string> => {
  await mkdir(dir, { recursive: true });
  const file = join(dir, `${sanitizeFilename(report.suite)}_${fileTimestamp(new Date(report.generatedAt))}.json`);
  await writeFile(file, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return file;
};
