import { BatchSummary, ResultRecord } from '../../domain/types/types';

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Totals for the report header. An empty batch has a 0% success rate.
 */
export function summarizeResults(results: readonly ResultRecord[]): BatchSummary {
  const total = results.length;
  const succeeded = results.filter(record => record.succeeded).length;
  const failed = total - succeeded;
  const successRate = total === 0 ? 0 : roundTo((succeeded / total) * 100, 2);

  return { total, succeeded, failed, successRate };
}
