// Shared logging utilities for the simulator
// Progress and results go to stdout, errors to stderr; verbose output needs LOTL_VERBOSE=true

import { isSimulatorError } from '../../../domain/errors';

export type LogLevel = 'INFO' | 'VERBOSE' | 'PERFORMANCE' | 'ERROR';

export function isVerboseEnabled(): boolean {
  return process.env.LOTL_VERBOSE === 'true';
}

/**
 * One log line: `[time] [LEVEL] [component] message | detail`.
 */
export function formatLine(
  level: LogLevel,
  component: string,
  message: string,
  detail?: string,
  now: Date = new Date()
): string {
  const suffix = detail ? ` | ${detail}` : '';
  return `[${now.toISOString()}] [${level}] [${component}] ${message}${suffix}`;
}

/**
 * Simulator errors carry their code so a log reader can tell a missing
 * catalog from an unwritable report.
 */
export function describeError(error: unknown): string {
  if (isSimulatorError(error)) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? '' : JSON.stringify(error);
}

export function log(module: string, message: string, ...args: unknown[]): void {
  const detail = args.length > 0 ? JSON.stringify(args) : undefined;
  process.stdout.write(formatLine('INFO', module, message, detail) + '\n');
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  if (!isVerboseEnabled()) return;
  process.stdout.write(formatLine('VERBOSE', component, message, data && JSON.stringify(data)) + '\n');
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  if (!isVerboseEnabled()) return;
  process.stdout.write(
    formatLine('PERFORMANCE', operation, `took ${duration}ms`, metadata && JSON.stringify(metadata)) + '\n'
  );
}

export function logError(module: string, message: string, error?: unknown): void {
  process.stderr.write(formatLine('ERROR', module, message, describeError(error)) + '\n');
}
