// Catalog Importer
// Builds commands.json from a LOLBAS-style repository of YAML technique files

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { parse as parseYaml } from 'yaml';
import { SimulatorError, SimulatorErrorCode } from '../../domain/errors';
import { LoggerPort } from '../../domain/ports/logger';
import { CommandSpecification, Severity, isSeverity } from '../../domain/types/types';
import { isRecord } from '../../domain/validation/guards';

export const UNKNOWN_MITRE_TAG = 'N/A';
export const DEFAULT_IMPORT_SEVERITY: Severity = 'Informational';

export interface ImportReport {
  specs: CommandSpecification[];
  filesScanned: number;
  skippedEntries: number;
  failedFiles: string[];
}

function firstMitreId(value: unknown): string {
  const candidate = Array.isArray(value) ? value[0] : value;
  if (typeof candidate === 'string' && candidate.length > 0) {
    return candidate;
  }
  return UNKNOWN_MITRE_TAG;
}

/**
 * Extract catalog entries from one parsed YAML document.
 * Entries without Command/Description are reported through onSkip.
 */
export function extractCommands(
  document: unknown,
  onSkip: (entry: unknown) => void = () => {}
): CommandSpecification[] {
  const commands: unknown = isRecord(document) ? document.Commands : undefined;
  if (!Array.isArray(commands)) {
    return [];
  }

  const specs: CommandSpecification[] = [];
  for (const entry of commands) {
    const command: unknown = isRecord(entry) ? entry.Command : undefined;
    const description: unknown = isRecord(entry) ? entry.Description : undefined;
    if (!isRecord(entry) || typeof command !== 'string' || typeof description !== 'string') {
      onSkip(entry);
      continue;
    }
    const severity = entry.Severity;
    specs.push(
      Object.freeze({
        command: command.trim(),
        description: description.trim(),
        severity: isSeverity(severity) ? severity : DEFAULT_IMPORT_SEVERITY,
        mitreTag: firstMitreId(entry.MitreID),
      })
    );
  }
  return specs;
}

export class CatalogImporter {
  constructor(private logger: LoggerPort) {}

  async importCatalog(repoPath: string): Promise<ImportReport> {
    const ymlRoot = path.join(repoPath, 'yml');
    const files = (await glob('**/*.{yml,yaml}', { cwd: ymlRoot, absolute: true, nodir: true })).sort();

    if (files.length === 0) {
      throw new SimulatorError(
        SimulatorErrorCode.IMPORT_FAILED,
        `No YAML technique files found under ${ymlRoot}`,
        { repoPath }
      );
    }

    const report: ImportReport = { specs: [], filesScanned: files.length, skippedEntries: 0, failedFiles: [] };

    for (const file of files) {
      try {
        const document: unknown = parseYaml(await fs.readFile(file, 'utf-8'));
        report.specs.push(
          ...extractCommands(document, entry => {
            report.skippedEntries++;
            this.logger.log('Importer', `Skipping malformed command in ${file}`, entry);
          })
        );
      } catch (error) {
        report.failedFiles.push(file);
        this.logger.logError('Importer', `Failed to parse ${file}`, error);
      }
    }

    this.logger.log(
      'Importer',
      `Imported ${report.specs.length} commands from ${files.length} files (${report.skippedEntries} skipped, ${report.failedFiles.length} unreadable)`
    );
    return report;
  }
}
