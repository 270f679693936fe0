import { classifyExecution, buildResultRecord } from '../../domain/executors/outcomeClassifier';
import { CommandExecutorPort } from '../../domain/ports/commandExecutor';
import { LoggerPort } from '../../domain/ports/logger';
import {
  CommandSpecification,
  ExecutionOutcome,
  FailureSignature,
  ResultRecord,
} from '../../domain/types/types';

export interface CommandRunnerOptions {
  shell: string;
  timeoutMs: number;
  signatures: readonly FailureSignature[];
}

/**
 * Executes one catalog entry and turns whatever happens into a ResultRecord.
 * run() never rejects; failures are data.
 */
export class CommandRunner {
  constructor(
    private executor: CommandExecutorPort,
    private logger: LoggerPort,
    private options: CommandRunnerOptions
  ) {}

  async run(spec: CommandSpecification, signal?: AbortSignal): Promise<ResultRecord> {
    const outcome = await this.execute(spec.command, signal);
    const classification = classifyExecution(outcome, this.options.signatures);

    this.logger.logPerformance('CommandExecution', outcome.durationMs, {
      command: spec.command,
      outcome: outcome.kind,
    });

    if (classification.succeeded) {
      this.logger.log('CommandRunner', `Succeeded: ${spec.command}`);
    } else {
      this.logger.log('CommandRunner', `Failed (${classification.category}): ${spec.command}`);
      this.logger.logVerbose('CommandRunner', 'Command classified as failed', {
        command: spec.command,
        category: classification.category,
        signature: classification.signature,
        error_message_length: classification.errorMessage.length,
      });
    }

    return buildResultRecord(spec, classification);
  }

  private async execute(command: string, signal?: AbortSignal): Promise<ExecutionOutcome> {
    if (signal?.aborted) {
      return { kind: 'EXEC_FAULT', reason: 'CANCELLED', description: 'Command cancelled', durationMs: 0 };
    }

    const startTime = Date.now();
    try {
      return await this.executor.execute(command, {
        shell: this.options.shell,
        timeoutMs: this.options.timeoutMs,
        signal,
      });
    } catch (error) {
      // Executors should not reject; keep the batch alive if one does
      this.logger.logError('CommandRunner', `Executor rejected for: ${command}`, error);
      return {
        kind: 'EXEC_FAULT',
        reason: 'SPAWN_FAILED',
        description: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime,
      };
    }
  }
}
