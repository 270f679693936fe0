// Type definitions for command catalog, execution outcomes and results

export const SEVERITIES = ['Informational', 'Low', 'Medium', 'High', 'Critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some(severity => severity === value);
}

/**
 * One catalog entry: a command simulating an adversary technique.
 * Order in the catalog defines execution and report order.
 */
export interface CommandSpecification {
  readonly command: string;
  readonly description: string;
  readonly severity: Severity;
  readonly mitreTag: string;
}

// On-disk shape of a catalog entry (commands.json)
export interface CommandSpecificationRecord {
  Command: string;
  Description: string;
  Severity: string;
  MitreAttackTag: string;
}

/**
 * Outcome of one command. errorMessage is '' when no message exists,
 * which includes failed commands that produced no output.
 */
export interface ResultRecord {
  readonly command: string;
  readonly description: string;
  readonly severity: Severity;
  readonly mitreTag: string;
  readonly succeeded: boolean;
  readonly errorMessage: string;
}

export type ExecFaultReason = 'SPAWN_FAILED' | 'TIMEOUT' | 'CANCELLED' | 'OUTPUT_LIMIT';

export interface ExecutionOk {
  kind: 'OK';
  output: string; // Combined stdout + stderr
  exitCode: number;
  durationMs: number;
}

export interface ExecutionFault {
  kind: 'EXEC_FAULT';
  reason: ExecFaultReason;
  description: string;
  durationMs: number;
}

export type ExecutionOutcome = ExecutionOk | ExecutionFault;

export interface AccessRestrictionSignature {
  kind: 'ACCESS_RESTRICTION';
  name: string;
  pattern: string;
}

export interface SecurityInterceptionSignature {
  kind: 'SECURITY_INTERCEPTION';
  name: string;
  pattern: string;
  label: string; // Replaces the captured text in the result
}

export type FailureSignature = AccessRestrictionSignature | SecurityInterceptionSignature;

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  successRate: number; // Percentage, 2 decimals
}

export interface BatchResult {
  startedAt: string;
  finishedAt: string;
  results: ResultRecord[];
}
