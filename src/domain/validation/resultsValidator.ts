// Saved results validation
// Lets a report be rendered again from results.json without re-running commands

import { SimulatorError, SimulatorErrorCode } from '../errors';
import { BatchResult, ResultRecord, isSeverity } from '../types/types';
import { isRecord } from './guards';

function invalid(message: string, context?: Record<string, unknown>): SimulatorError {
  return new SimulatorError(SimulatorErrorCode.RESULTS_INVALID, message, context);
}

function parseRecord(entry: unknown, index: number): ResultRecord {
  if (!isRecord(entry)) {
    throw invalid(`Result ${index} is not an object`, { index });
  }

  const { command, description, severity, mitreTag, succeeded, errorMessage } = entry;
  if (
    typeof command !== 'string' ||
    typeof description !== 'string' ||
    typeof mitreTag !== 'string' ||
    typeof errorMessage !== 'string'
  ) {
    throw invalid(`Result ${index} is missing a text field`, { index });
  }
  if (typeof succeeded !== 'boolean') {
    throw invalid(`Result ${index} field "succeeded" must be a boolean`, { index });
  }
  if (!isSeverity(severity)) {
    throw invalid(`Result ${index} has unknown severity "${String(severity)}"`, { index });
  }

  return Object.freeze({ command, description, severity, mitreTag, succeeded, errorMessage });
}

export function parseBatchResult(raw: unknown): BatchResult {
  const results: unknown = isRecord(raw) ? raw.results : undefined;
  if (!isRecord(raw) || !Array.isArray(results)) {
    throw invalid('Saved results must be an object with a "results" array');
  }
  const { startedAt, finishedAt } = raw;
  if (typeof startedAt !== 'string' || typeof finishedAt !== 'string') {
    throw invalid('Saved results are missing "startedAt"/"finishedAt"');
  }

  return {
    startedAt,
    finishedAt,
    results: results.map((entry: unknown, index: number) => parseRecord(entry, index)),
  };
}
