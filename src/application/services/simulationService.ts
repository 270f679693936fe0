import { SimulatorConfig } from '../../config/simulatorConfig';
import { DEFAULT_FAILURE_SIGNATURES } from '../../domain/policies/classification/failureSignatures';
import { CommandExecutorPort } from '../../domain/ports/commandExecutor';
import { LoggerPort } from '../../domain/ports/logger';
import { PersistencePort } from '../../domain/ports/persistence';
import {
  BatchResult,
  CommandSpecification,
  FailureSignature,
  ResultRecord,
} from '../../domain/types/types';
import { BatchOrchestrator } from './batchOrchestrator';
import { CommandRunner } from './commandRunner';
import { renderHtmlReport } from './reportRenderer';

export interface SimulateOptions {
  signal?: AbortSignal;
  onResult?: (record: ResultRecord, index: number) => void;
}

/**
 * Load catalog -> run batch -> save results -> render report.
 * All paths come from the SimulatorConfig given at construction.
 */
export class SimulationService {
  constructor(
    private config: SimulatorConfig,
    private executor: CommandExecutorPort,
    private store: PersistencePort,
    private logger: LoggerPort
  ) {}

  async loadSpecifications(): Promise<CommandSpecification[]> {
    const startTime = Date.now();
    const specs = await this.store.readSpecifications(this.config.configPath);
    this.logger.logPerformance('LoadSpecifications', Date.now() - startTime, {
      path: this.config.configPath,
      count: specs.length,
    });
    this.logger.log('Simulation', `Loaded ${specs.length} commands from ${this.config.configPath}`);
    return specs;
  }

  async loadFailureSignatures(): Promise<readonly FailureSignature[]> {
    if (!this.config.signaturesPath) {
      return DEFAULT_FAILURE_SIGNATURES;
    }
    const signatures = await this.store.readFailureSignatures(this.config.signaturesPath);
    this.logger.log('Simulation', `Loaded ${signatures.length} failure signatures from ${this.config.signaturesPath}`);
    return signatures;
  }

  /**
   * Run the whole catalog. Load failures are fatal and nothing runs;
   * after loading, the batch is always returned, even when saving it fails.
   */
  async simulate(options: SimulateOptions = {}): Promise<BatchResult> {
    const specs = await this.loadSpecifications();
    const signatures = await this.loadFailureSignatures();

    const runner = new CommandRunner(this.executor, this.logger, {
      shell: this.config.shell,
      timeoutMs: this.config.commandTimeoutMs,
      signatures,
    });
    const orchestrator = new BatchOrchestrator(runner, this.logger);

    const batch = await orchestrator.runAll(specs, {
      concurrency: this.config.concurrency,
      signal: options.signal,
      onResult: options.onResult,
    });

    try {
      await this.store.writeResults(this.config.resultsPath, batch);
      this.logger.log('Simulation', `Saved results to ${this.config.resultsPath}`);
    } catch (error) {
      this.logger.logError('Simulation', `Results were not saved to ${this.config.resultsPath}`, error);
    }
    return batch;
  }

  /**
   * Render and write the report. The batch is left untouched, so a failed
   * write can be retried against another path.
   */
  async writeReport(batch: BatchResult, outputPath: string = this.config.outputPath): Promise<string> {
    const html = renderHtmlReport(batch, { title: this.config.reportTitle });
    await this.store.writeReport(outputPath, html);
    this.logger.log('Simulation', `Report written to ${outputPath}`);
    return outputPath;
  }

  async loadSavedResults(resultsPath: string = this.config.resultsPath): Promise<BatchResult> {
    return this.store.readResults(resultsPath);
  }
}
