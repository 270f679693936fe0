import { SimulatorError, SimulatorErrorCode } from '../../domain/errors';
import { LoggerPort } from '../../domain/ports/logger';
import { PersistencePort } from '../../domain/ports/persistence';
import { CommandSpecification, SEVERITIES, isSeverity } from '../../domain/types/types';

export interface CatalogEntryInput {
  command: string;
  description: string;
  severity?: string;
  mitreTag?: string;
}

/**
 * Editing operations on commands.json.
 * Every change is written back immediately.
 */
export class CatalogService {
  constructor(
    private catalogPath: string,
    private store: PersistencePort,
    private logger: LoggerPort
  ) {}

  async list(): Promise<CommandSpecification[]> {
    return this.store.readSpecifications(this.catalogPath);
  }

  async add(input: CatalogEntryInput): Promise<CommandSpecification> {
    const entry = validateEntry(input);
    const specs = await this.readOrEmpty();
    await this.store.writeSpecifications(this.catalogPath, [...specs, entry]);
    this.logger.log('Catalog', `Added command #${specs.length + 1}: ${entry.command}`);
    return entry;
  }

  /**
   * Remove by 1-based position, as shown by list().
   */
  async remove(position: number): Promise<CommandSpecification> {
    const specs = await this.list();
    if (!Number.isInteger(position) || position < 1 || position > specs.length) {
      throw new SimulatorError(
        SimulatorErrorCode.CATALOG_INVALID_ENTRY,
        `No command at position ${position} (catalog has ${specs.length})`,
        { position }
      );
    }
    const removed = specs[position - 1];
    await this.store.writeSpecifications(
      this.catalogPath,
      specs.filter((_, index) => index !== position - 1)
    );
    this.logger.log('Catalog', `Removed command #${position}: ${removed.command}`);
    return removed;
  }

  async export(targetPath: string): Promise<number> {
    const specs = await this.list();
    await this.store.writeSpecifications(targetPath, specs);
    this.logger.log('Catalog', `Exported ${specs.length} commands to ${targetPath}`);
    return specs.length;
  }

  private async readOrEmpty(): Promise<CommandSpecification[]> {
    try {
      return await this.list();
    } catch (error) {
      if (error instanceof SimulatorError && error.code === SimulatorErrorCode.CONFIG_NOT_FOUND) {
        return [];
      }
      throw error;
    }
  }
}

export function validateEntry(input: CatalogEntryInput): CommandSpecification {
  const command = input.command.trim();
  const description = input.description.trim();
  const severity = input.severity?.trim() || 'Informational';

  if (!command) {
    throw new SimulatorError(SimulatorErrorCode.CATALOG_INVALID_ENTRY, 'Command field is required', {
      field: 'command',
    });
  }
  if (!description) {
    throw new SimulatorError(SimulatorErrorCode.CATALOG_INVALID_ENTRY, 'Description field is required', {
      field: 'description',
    });
  }
  if (!isSeverity(severity)) {
    throw new SimulatorError(
      SimulatorErrorCode.CATALOG_INVALID_ENTRY,
      `Severity must be one of ${SEVERITIES.join(', ')}`,
      { field: 'severity' }
    );
  }

  return Object.freeze({
    command,
    description,
    severity,
    mitreTag: input.mitreTag?.trim() ?? '',
  });
}
