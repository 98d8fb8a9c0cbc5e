import type { Diagnosis, DiagnosisCategory, RequestResult, Severity } from '../core/types.js';

export type DiagnosesBySeverity = Record<Severity, Diagnosis[]>;

export interface ResultSummary {
  totalRequests: number;
  successful: number;
  failed: number;
  /** Percentage, 0 to 100. */
  successRate: number;
  avgResponseSeconds: number;
  totalAttempts: number;
  errorCounts: Partial<Record<DiagnosisCategory, number>>;
  diagnoses: Diagnosis[];
}

const failedDiagnoses = (results: readonly RequestResult[]): Diagnosis[] =>
  results.flatMap((r): Diagnosis[] => (r.success ? [] : [r.diagnosis]));

/** Groups the diagnoses of failed results by severity. */
export const groupBySeverity = (results: readonly RequestResult[]): DiagnosesBySeverity => {
  const grouped: DiagnosesBySeverity = { critical: [], high: [], medium: [], low: [] };
  for (const diagnosis of failedDiagnoses(results)) {
    grouped[diagnosis.severity].push(diagnosis);
  }
  return grouped;
};

export const summarize = (results: readonly RequestResult[]): ResultSummary => {
  const total = results.length;
  const successful = results.filter((r) => r.success).length;
  const diagnoses = failedDiagnoses(results);

  const errorCounts: Partial<Record<DiagnosisCategory, number>> = {};
  for (const d of diagnoses) {
    errorCounts[d.category] = (errorCounts[d.category] ?? 0) + 1;
  }

  const totalElapsed = results.reduce((sum, r) => sum + r.totalElapsedSeconds, 0);

  return {
    totalRequests: total,
    successful,
    failed: total - successful,
    successRate: total > 0 ? (successful / total) * 100 : 0,
    avgResponseSeconds: total > 0 ? totalElapsed / total : 0,
    totalAttempts: results.reduce((sum, r) => sum + r.attempts, 0),
    errorCounts,
    diagnoses
  };
};
