// Catalog validation
// Converts the on-disk JSON catalog into typed specifications, failing loudly on bad entries

import { SimulatorError, SimulatorErrorCode } from '../errors';
import {
  CommandSpecification,
  CommandSpecificationRecord,
  SEVERITIES,
  isSeverity,
} from '../types/types';
import { isRecord } from './guards';

const REQUIRED_FIELDS = ['Command', 'Description', 'Severity', 'MitreAttackTag'] as const;

/**
 * Parse a decoded commands.json document.
 * Every entry must carry all four fields as strings; nothing is defaulted.
 */
export function parseSpecifications(raw: unknown, source = 'catalog'): CommandSpecification[] {
  if (!Array.isArray(raw)) {
    throw new SimulatorError(
      SimulatorErrorCode.CONFIG_INVALID,
      `${source}: expected a JSON array of command entries`,
      { source }
    );
  }

  return raw.map((entry: unknown, index: number) => parseSpecification(entry, index, source));
}

function parseSpecification(entry: unknown, index: number, source: string): CommandSpecification {
  if (!isRecord(entry)) {
    throw new SimulatorError(
      SimulatorErrorCode.CONFIG_INVALID,
      `${source}: entry ${index} is not an object`,
      { source, index }
    );
  }

  for (const field of REQUIRED_FIELDS) {
    if (!(field in entry)) {
      throw new SimulatorError(
        SimulatorErrorCode.CONFIG_INVALID,
        `${source}: entry ${index} is missing required field "${field}"`,
        { source, index, field }
      );
    }
    if (typeof entry[field] !== 'string') {
      throw new SimulatorError(
        SimulatorErrorCode.CONFIG_INVALID,
        `${source}: entry ${index} field "${field}" must be a string`,
        { source, index, field }
      );
    }
  }

  const severity = entry.Severity;
  if (!isSeverity(severity)) {
    throw new SimulatorError(
      SimulatorErrorCode.CONFIG_INVALID,
      `${source}: entry ${index} has unknown severity "${String(severity)}" (expected one of ${SEVERITIES.join(', ')})`,
      { source, index, field: 'Severity' }
    );
  }

  return Object.freeze({
    command: String(entry.Command),
    description: String(entry.Description),
    severity,
    mitreTag: String(entry.MitreAttackTag),
  });
}

export function toSpecificationRecord(spec: CommandSpecification): CommandSpecificationRecord {
  return {
    Command: spec.command,
    Description: spec.description,
    Severity: spec.severity,
    MitreAttackTag: spec.mitreTag,
  };
}

export function serializeSpecifications(specs: readonly CommandSpecification[]): string {
  return JSON.stringify(specs.map(toSpecificationRecord), null, 4) + '\n';
}
