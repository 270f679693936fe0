import { CommandExecutorPort, ExecuteOptions } from '../../../domain/ports/commandExecutor';
import { executeCommand } from '../../connectors/os/executors/commandExecutor';
import { ExecutionOutcome } from '../../../domain/types/types';

export class CommandExecutorAdapter implements CommandExecutorPort {
  async execute(command: string, options: ExecuteOptions): Promise<ExecutionOutcome> {
    return executeCommand(command, options);
  }
}
