// Port: Persistence
// Interface for catalog, results and report storage

import { BatchResult, CommandSpecification, FailureSignature } from '../types/types';

export interface PersistencePort {
  /**
   * Read the command catalog. Missing file or bad entry throws.
   */
  readSpecifications(path: string): Promise<CommandSpecification[]>;

  /**
   * Persist the command catalog (full overwrite)
   */
  writeSpecifications(path: string, specs: readonly CommandSpecification[]): Promise<void>;

  readFailureSignatures(path: string): Promise<FailureSignature[]>;

  readResults(path: string): Promise<BatchResult>;

  writeResults(path: string, batch: BatchResult): Promise<void>;

  writeReport(path: string, html: string): Promise<void>;
}
