import { SimulatorError, SimulatorErrorCode, isSimulatorError } from '../../../domain/errors';
import { parseFailureSignatures } from '../../../domain/policies/classification/failureSignatures';
import { PersistencePort } from '../../../domain/ports/persistence';
import { BatchResult, CommandSpecification, FailureSignature } from '../../../domain/types/types';
import { parseBatchResult } from '../../../domain/validation/resultsValidator';
import {
  parseSpecifications,
  serializeSpecifications,
} from '../../../domain/validation/specificationValidator';
import { readJsonFile, writeTextFile } from '../../connectors/os/executors/fileSystem';

/**
 * JSON files on the local filesystem for the catalog and saved results,
 * plain HTML for the report.
 */
export class FileStoreAdapter implements PersistencePort {
  async readSpecifications(path: string): Promise<CommandSpecification[]> {
    return parseSpecifications(await readJsonFile(path), path);
  }

  async writeSpecifications(path: string, specs: readonly CommandSpecification[]): Promise<void> {
    await writeTextFile(path, serializeSpecifications(specs));
  }

  async readFailureSignatures(path: string): Promise<FailureSignature[]> {
    return parseFailureSignatures(await readJsonFile(path));
  }

  async readResults(path: string): Promise<BatchResult> {
    try {
      return parseBatchResult(await readJsonFile(path, SimulatorErrorCode.RESULTS_INVALID));
    } catch (error) {
      if (isSimulatorError(error, SimulatorErrorCode.CONFIG_INVALID)) {
        throw new SimulatorError(SimulatorErrorCode.RESULTS_INVALID, error.message, error.context);
      }
      throw error;
    }
  }

  async writeResults(path: string, batch: BatchResult): Promise<void> {
    try {
      await writeTextFile(path, JSON.stringify(batch, null, 2) + '\n');
    } catch (error) {
      throw new SimulatorError(
        SimulatorErrorCode.RESULTS_WRITE_FAILED,
        `Unable to write results to ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    }
  }

  async writeReport(path: string, html: string): Promise<void> {
    try {
      await writeTextFile(path, html);
    } catch (error) {
      throw new SimulatorError(
        SimulatorErrorCode.REPORT_WRITE_FAILED,
        `Unable to write report to ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { path }
      );
    }
  }
}
