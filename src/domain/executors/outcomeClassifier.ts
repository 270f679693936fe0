// Outcome Classification Logic
// Pure functions only - no side effects, no logging

import { findSignature } from '../policies/classification/failureSignatures';
import {
  CommandSpecification,
  ExecutionOutcome,
  FailureSignature,
  ResultRecord,
} from '../types/types';

export type FailureCategory =
  | 'EXIT_CODE'
  | 'ACCESS_RESTRICTION'
  | 'SECURITY_INTERCEPTION'
  | 'EXEC_FAULT';

export interface Classification {
  succeeded: boolean;
  errorMessage: string;
  category?: FailureCategory;
  signature?: string;
}

/**
 * Classify an execution outcome. First match wins:
 * 1. non-zero exit or access restriction -> failed, raw captured text
 * 2. security interception -> failed, fixed label
 * 3. execution fault -> failed, fault description
 * 4. succeeded
 *
 * Rule 1 is checked before rule 2, so a blocked run that also exits
 * non-zero reports the raw text rather than the label.
 */
export function classifyExecution(
  outcome: ExecutionOutcome,
  signatures: readonly FailureSignature[]
): Classification {
  if (outcome.kind === 'OK') {
    const accessRestriction = findSignature(signatures, 'ACCESS_RESTRICTION', outcome.output);
    if (outcome.exitCode !== 0 || accessRestriction) {
      return {
        succeeded: false,
        errorMessage: outcome.output,
        category: outcome.exitCode !== 0 ? 'EXIT_CODE' : 'ACCESS_RESTRICTION',
        signature: accessRestriction?.name,
      };
    }

    const interception = findSignature(signatures, 'SECURITY_INTERCEPTION', outcome.output);
    if (interception) {
      return {
        succeeded: false,
        errorMessage: interception.label,
        category: 'SECURITY_INTERCEPTION',
        signature: interception.name,
      };
    }

    return { succeeded: true, errorMessage: '' };
  }

  return {
    succeeded: false,
    errorMessage: outcome.description,
    category: 'EXEC_FAULT',
  };
}

export function buildResultRecord(
  spec: CommandSpecification,
  classification: Pick<Classification, 'succeeded' | 'errorMessage'>
): ResultRecord {
  return Object.freeze({
    command: spec.command,
    description: spec.description,
    severity: spec.severity,
    mitreTag: spec.mitreTag,
    succeeded: classification.succeeded,
    errorMessage: classification.succeeded ? '' : classification.errorMessage,
  });
}

export function classifyOutcome(
  spec: CommandSpecification,
  outcome: ExecutionOutcome,
  signatures: readonly FailureSignature[]
): ResultRecord {
  return buildResultRecord(spec, classifyExecution(outcome, signatures));
}
