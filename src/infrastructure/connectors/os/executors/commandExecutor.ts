// Command Executor - Run one shell expression, capture combined output and exit code
// Never rejects: spawn errors, timeouts and cancellation become EXEC_FAULT outcomes

import { exec, ExecException } from 'child_process';
import * as os from 'os';
import { ExecuteOptions } from '../../../../domain/ports/commandExecutor';
import { ExecFaultReason, ExecutionOutcome } from '../../../../domain/types/types';
import { logVerbose } from '../../../adapters/logging/logger';

const MAX_BUFFER_BYTES = 10 * 1024 * 1024; // 10MB buffer

export function defaultShell(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'powershell.exe' : '/bin/sh';
}

/**
 * Join stdout and stderr into the single blob the classifier inspects.
 */
export function combineOutput(stdout: string, stderr: string): string {
  return [stdout.trimEnd(), stderr.trimEnd()].filter(part => part.length > 0).join('\n');
}

/**
 * Exit status for a shell killed by a signal this process did not send
 * (a security product terminating it, a crash), using the 128+N convention.
 */
export function externalSignalExitCode(error: ExecException): number | undefined {
  if (error.killed || !error.signal) {
    return undefined;
  }
  const entry = Object.entries(os.constants.signals).find(([name]) => name === error.signal);
  return 128 + (entry ? entry[1] : 0);
}

function faultFor(error: ExecException, timeoutMs: number): { reason: ExecFaultReason; description: string } {
  if (error.name === 'AbortError') {
    return { reason: 'CANCELLED', description: 'Command cancelled' };
  }
  if (String(error.code) === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return { reason: 'OUTPUT_LIMIT', description: `Command output exceeded ${MAX_BUFFER_BYTES} bytes` };
  }
  if (error.killed && error.signal) {
    return { reason: 'TIMEOUT', description: `Command timed out after ${timeoutMs}ms` };
  }
  return { reason: 'SPAWN_FAILED', description: error.message };
}

// The shell ran and ended on its own (exit or outside signal): OK, classification decides the rest
function outcomeFor(
  error: ExecException | null,
  output: string,
  timeoutMs: number,
  durationMs: number
): ExecutionOutcome {
  if (!error) {
    return { kind: 'OK', output, exitCode: 0, durationMs };
  }
  if (error.name !== 'AbortError') {
    const exitCode = typeof error.code === 'number' ? error.code : externalSignalExitCode(error);
    if (exitCode !== undefined) {
      return { kind: 'OK', output, exitCode, durationMs };
    }
  }
  return { kind: 'EXEC_FAULT', ...faultFor(error, timeoutMs), durationMs };
}

export function executeCommand(command: string, options: ExecuteOptions): Promise<ExecutionOutcome> {
  const startTime = Date.now();

  return new Promise<ExecutionOutcome>(resolve => {
    exec(
      command,
      {
        shell: options.shell,
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: MAX_BUFFER_BYTES,
        windowsHide: true,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        const output = combineOutput(stdout ?? '', stderr ?? '');
        const outcome = outcomeFor(error, output, options.timeoutMs, Date.now() - startTime);

        if (outcome.kind === 'OK') {
          logVerbose('CommandExecutor', 'Command exited', {
            command,
            exit_code: outcome.exitCode,
            signal: error?.signal,
            output_length: output.length,
            duration_ms: outcome.durationMs,
          });
        } else {
          logVerbose('CommandExecutor', 'Command faulted', {
            command,
            reason: outcome.reason,
            error: error?.message,
            duration_ms: outcome.durationMs,
          });
        }
        resolve(outcome);
      }
    );
  });
}
