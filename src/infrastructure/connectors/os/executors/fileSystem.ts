import * as fs from 'fs/promises';
import * as path from 'path';
import { SimulatorError, SimulatorErrorCode } from '../../../../domain/errors';
import { logVerbose } from '../../../adapters/logging/logger';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read and decode a JSON document.
 * ENOENT maps to notFoundCode, anything unparsable to CONFIG_INVALID.
 */
export async function readJsonFile(
  filePath: string,
  notFoundCode: SimulatorErrorCode = SimulatorErrorCode.CONFIG_NOT_FOUND
): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new SimulatorError(notFoundCode, `File not found: ${filePath}`, { path: filePath });
    }
    throw new SimulatorError(notFoundCode, `Unable to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      path: filePath,
    });
  }

  logVerbose('FileSystem', 'Read file', { path: filePath, size: raw.length });

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new SimulatorError(
      SimulatorErrorCode.CONFIG_INVALID,
      `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { path: filePath }
    );
  }
}

/**
 * Write a text file, creating parent directories.
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  logVerbose('FileSystem', 'Wrote file', { path: filePath, size: content.length });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
