// Git connector - clone or fast-forward a technique catalog repository

import { execFile } from 'child_process';
import { promisify } from 'util';
import { SimulatorError, SimulatorErrorCode } from '../../../../domain/errors';
import { log as logShared } from '../../../adapters/logging/logger';
import { pathExists } from './fileSystem';

const execFileAsync = promisify(execFile);

function log(message: string, ...args: unknown[]): void {
  logShared('GitRepository', message, ...args);
}

export type SyncAction = 'cloned' | 'pulled';

export async function syncRepository(repoUrl: string, targetDir: string): Promise<SyncAction> {
  const exists = await pathExists(targetDir);
  const args = exists ? ['-C', targetDir, 'pull'] : ['clone', repoUrl, targetDir];

  log(`${exists ? 'Pulling' : 'Cloning'} ${repoUrl} -> ${targetDir}`);
  try {
    await execFileAsync('git', args, { timeout: 5 * 60 * 1000, maxBuffer: 10 * 1024 * 1024 });
  } catch (error) {
    throw new SimulatorError(
      SimulatorErrorCode.IMPORT_FAILED,
      `git ${args.join(' ')} failed: ${error instanceof Error ? error.message : String(error)}`,
      { repoUrl, targetDir }
    );
  }
  return exists ? 'pulled' : 'cloned';
}
