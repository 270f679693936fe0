// Failure Signature Table
// Textual markers in captured output that turn an otherwise clean run into a failure

import { SimulatorError, SimulatorErrorCode } from '../../errors';
import { FailureSignature } from '../../types/types';
import { isRecord } from '../../validation/guards';

export const EDR_BLOCK_LABEL = 'ERROR MESSAGE: Blocked By EDR';

export const DEFAULT_FAILURE_SIGNATURES: readonly FailureSignature[] = [
  {
    kind: 'ACCESS_RESTRICTION',
    name: 'access-denied',
    pattern: 'failed to run: Access is denied',
  },
  {
    kind: 'SECURITY_INTERCEPTION',
    name: 'antivirus-block',
    pattern: 'malicious content.*blocked by your antivirus software',
    label: EDR_BLOCK_LABEL,
  },
];

const patternCache = new Map<string, RegExp>();

function compile(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern, 'is');
    patternCache.set(pattern, regex);
  }
  return regex;
}

export function matchesSignature(signature: FailureSignature, output: string): boolean {
  return compile(signature.pattern).test(output);
}

export function findSignature<K extends FailureSignature['kind']>(
  signatures: readonly FailureSignature[],
  kind: K,
  output: string
): Extract<FailureSignature, { kind: K }> | undefined {
  for (const signature of signatures) {
    if (isKind(signature, kind) && matchesSignature(signature, output)) {
      return signature;
    }
  }
  return undefined;
}

function isKind<K extends FailureSignature['kind']>(
  signature: FailureSignature,
  kind: K
): signature is Extract<FailureSignature, { kind: K }> {
  return signature.kind === kind;
}

function invalid(index: number, message: string): SimulatorError {
  return new SimulatorError(
    SimulatorErrorCode.CONFIG_INVALID,
    `Invalid failure signature at index ${index}: ${message}`,
    { index }
  );
}

function requireString(entry: Record<string, unknown>, field: string, index: number): string {
  const value = entry[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(index, `field "${field}" must be a non-empty string`);
  }
  return value;
}

/**
 * Validate a signature table loaded from JSON.
 * Patterns must compile as regular expressions.
 */
export function parseFailureSignatures(raw: unknown): FailureSignature[] {
  if (!Array.isArray(raw)) {
    throw new SimulatorError(SimulatorErrorCode.CONFIG_INVALID, 'Failure signature table must be a JSON array');
  }

  return raw.map((entry: unknown, index: number): FailureSignature => {
    if (!isRecord(entry)) {
      throw invalid(index, 'entry must be an object');
    }
    const record = entry;
    const name = requireString(record, 'name', index);
    const pattern = requireString(record, 'pattern', index);

    try {
      compile(pattern);
    } catch (error) {
      throw invalid(index, `pattern does not compile (${error instanceof Error ? error.message : String(error)})`);
    }

    switch (record.kind) {
      case 'ACCESS_RESTRICTION':
        return { kind: 'ACCESS_RESTRICTION', name, pattern };
      case 'SECURITY_INTERCEPTION':
        return { kind: 'SECURITY_INTERCEPTION', name, pattern, label: requireString(record, 'label', index) };
      default:
        throw invalid(index, 'field "kind" must be ACCESS_RESTRICTION or SECURITY_INTERCEPTION');
    }
  });
}
