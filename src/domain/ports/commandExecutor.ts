// Port: Command Executor
// Interface for executing OS commands

import { ExecutionOutcome } from '../types/types';

export interface ExecuteOptions {
  shell: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CommandExecutorPort {
  /**
   * Execute a single shell expression and capture its combined output.
   * Implementations resolve with an EXEC_FAULT outcome instead of rejecting.
   */
  execute(command: string, options: ExecuteOptions): Promise<ExecutionOutcome>;
}
