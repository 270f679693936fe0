// Configuration for the simulator
// CLI options override environment variables, which override defaults

import { SimulatorError, SimulatorErrorCode } from '../domain/errors';
import { defaultShell } from '../infrastructure/connectors/os/executors/commandExecutor';

export interface SimulatorConfig {
  configPath: string;
  outputPath: string;
  resultsPath: string;
  commandTimeoutMs: number;
  concurrency: number;
  shell: string;
  signaturesPath?: string;
  reportTitle: string;
}

export type SimulatorConfigOverrides = Partial<Record<keyof SimulatorConfig, string | number | undefined>>;

export const DEFAULT_CONFIG_PATH = './commands.json';
export const DEFAULT_OUTPUT_PATH = './report.html';
export const DEFAULT_RESULTS_PATH = './results.json';
export const DEFAULT_COMMAND_TIMEOUT_MS = 120000;
export const DEFAULT_REPORT_TITLE = 'Attack Simulation Report';

function pickString(...candidates: (string | number | undefined)[]): string | undefined {
  for (const candidate of candidates) {
    if (candidate !== undefined && String(candidate).length > 0) {
      return String(candidate);
    }
  }
  return undefined;
}

function positiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new SimulatorError(
      SimulatorErrorCode.CONFIG_INVALID,
      `${name} must be a positive integer (got "${value}")`,
      { option: name }
    );
  }
  return parsed;
}

export function loadSimulatorConfig(
  overrides: SimulatorConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): SimulatorConfig {
  return {
    configPath: pickString(overrides.configPath, env.LOTL_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH,
    outputPath: pickString(overrides.outputPath, env.LOTL_OUTPUT_PATH) ?? DEFAULT_OUTPUT_PATH,
    resultsPath: pickString(overrides.resultsPath, env.LOTL_RESULTS_PATH) ?? DEFAULT_RESULTS_PATH,
    commandTimeoutMs: positiveInteger(
      'commandTimeoutMs',
      pickString(overrides.commandTimeoutMs, env.LOTL_COMMAND_TIMEOUT_MS),
      DEFAULT_COMMAND_TIMEOUT_MS
    ),
    concurrency: positiveInteger(
      'concurrency',
      pickString(overrides.concurrency, env.LOTL_CONCURRENCY),
      1
    ),
    shell: pickString(overrides.shell, env.LOTL_SHELL) ?? defaultShell(),
    signaturesPath: pickString(overrides.signaturesPath, env.LOTL_SIGNATURES_PATH),
    reportTitle: pickString(overrides.reportTitle) ?? DEFAULT_REPORT_TITLE,
  };
}
