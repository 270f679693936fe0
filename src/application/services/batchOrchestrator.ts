import { LoggerPort } from '../../domain/ports/logger';
import { BatchResult, CommandSpecification, ResultRecord } from '../../domain/types/types';
import { buildResultRecord } from '../../domain/executors/outcomeClassifier';
import { CommandRunner } from './commandRunner';

export interface RunAllOptions {
  /** Worker count; 1 runs the catalog strictly in order */
  concurrency?: number;
  signal?: AbortSignal;
  onResult?: (record: ResultRecord, index: number) => void;
}

/**
 * Runs every specification through the CommandRunner and returns the
 * records in specification order. One command failing never stops the rest.
 */
export class BatchOrchestrator {
  constructor(
    private runner: CommandRunner,
    private logger: LoggerPort
  ) {}

  async runAll(
    specs: readonly CommandSpecification[],
    options: RunAllOptions = {}
  ): Promise<BatchResult> {
    const startedAt = new Date().toISOString();
    const startTime = Date.now();
    const total = specs.length;
    const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, Math.max(total, 1)));

    this.logger.log('BatchOrchestrator', `Running ${total} commands (concurrency ${concurrency})`);

    const results = new Array<ResultRecord | undefined>(total).fill(undefined);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < total) {
        const index = next++;
        const spec = specs[index];
        let record: ResultRecord;

        if (options.signal?.aborted) {
          record = buildResultRecord(spec, { succeeded: false, errorMessage: 'Command cancelled' });
        } else {
          this.logger.log('BatchOrchestrator', `[${index + 1}/${total}] Running: ${spec.command}`);
          record = await this.runner.run(spec, options.signal);
        }

        results[index] = record;
        try {
          options.onResult?.(record, index);
        } catch (error) {
          // A listener never stops the batch
          this.logger.logError('BatchOrchestrator', `Result listener failed for command ${index + 1}`, error);
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, () => worker()));

    const ordered = results.map((record, index) => {
      if (!record) {
        // Unreachable while every index is claimed exactly once
        throw new Error(`No result recorded for command ${index + 1}`);
      }
      return record;
    });

    const duration = Date.now() - startTime;
    this.logger.logPerformance('BatchExecution', duration, {
      total,
      failed: ordered.filter(record => !record.succeeded).length,
    });

    return {
      startedAt,
      finishedAt: new Date().toISOString(),
      results: ordered,
    };
  }
}
