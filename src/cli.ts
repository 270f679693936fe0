#!/usr/bin/env node
// Operator CLI Entrypoint
// Runs the command catalog, renders reports, edits and imports the catalog

import { Command } from 'commander';
import inquirer from 'inquirer';
import { CatalogImporter } from './application/services/catalogImporter';
import { CatalogService } from './application/services/catalogService';
import { SimulationService } from './application/services/simulationService';
import { summarizeResults } from './application/services/summary';
import { loadSimulatorConfig, SimulatorConfigOverrides } from './config/simulatorConfig';
import { isSimulatorError, SimulatorErrorCode } from './domain/errors';
import { CommandExecutorPort } from './domain/ports/commandExecutor';
import { LoggerPort } from './domain/ports/logger';
import { PersistencePort } from './domain/ports/persistence';
import { BatchResult, ResultRecord, SEVERITIES } from './domain/types/types';
import { LoggerAdapter } from './infrastructure/adapters/logging/loggerAdapter';
import { CommandExecutorAdapter } from './infrastructure/adapters/os/commandExecutorAdapter';
import { FileStoreAdapter } from './infrastructure/adapters/persistence/fileStoreAdapter';
import { syncRepository } from './infrastructure/connectors/os/executors/gitRepository';

export interface CliDependencies {
  executor: CommandExecutorPort;
  store: PersistencePort;
  logger: LoggerPort;
}

export function defaultDependencies(): CliDependencies {
  return {
    executor: new CommandExecutorAdapter(),
    store: new FileStoreAdapter(),
    logger: new LoggerAdapter(),
  };
}

export interface RunCliOptions {
  configPath?: string;
  outputPath?: string;
  resultsPath?: string;
  timeoutMs?: string;
  concurrency?: string;
  shell?: string;
  signaturesPath?: string;
  title?: string;
}

export interface RenderCliOptions {
  resultsPath?: string;
  outputPath?: string;
  title?: string;
}

export interface AddCliOptions {
  configPath?: string;
  command?: string;
  description?: string;
  severity?: string;
  mitreTag?: string;
}

export interface ImportCliOptions {
  configPath?: string;
  repoPath: string;
  repoUrl?: string;
}

function toOverrides(options: RunCliOptions): SimulatorConfigOverrides {
  return {
    configPath: options.configPath,
    outputPath: options.outputPath,
    resultsPath: options.resultsPath,
    commandTimeoutMs: options.timeoutMs,
    concurrency: options.concurrency,
    shell: options.shell,
    signaturesPath: options.signaturesPath,
    reportTitle: options.title,
  };
}

function printSummary(batch: BatchResult): void {
  const summary = summarizeResults(batch.results);
  console.log(
    `Total: ${summary.total} | Succeeded: ${summary.succeeded} | Failed: ${summary.failed} | Success rate: ${summary.successRate.toFixed(2)}%`
  );
}

function printResult(record: ResultRecord, index: number): void {
  console.log(`  #${index + 1} ${record.succeeded ? 'SUCCESS' : 'FAILED'}: ${record.command}`);
}

function reportFailure(logger: LoggerPort, action: string, error: unknown): number {
  if (isSimulatorError(error)) {
    logger.logError('CLI', `${action} failed [${error.code}]`, error);
  } else {
    logger.logError('CLI', `${action} failed`, error);
  }
  return 1;
}

/**
 * Run the catalog and write the report. Returns the process exit code.
 * A report write failure still leaves results.json for `render`.
 */
export async function runSimulation(
  options: RunCliOptions,
  deps: CliDependencies = defaultDependencies(),
  signal?: AbortSignal
): Promise<number> {
  try {
    const config = loadSimulatorConfig(toOverrides(options));
    const service = new SimulationService(config, deps.executor, deps.store, deps.logger);
    const batch = await service.simulate({ signal, onResult: printResult });
    printSummary(batch);

    try {
      const outputPath = await service.writeReport(batch);
      console.log(`Report: ${outputPath}`);
      return 0;
    } catch (error) {
      if (isSimulatorError(error, SimulatorErrorCode.REPORT_WRITE_FAILED)) {
        console.error('Re-render from the saved results with `lotl-sim render --output-path <path>`.');
      }
      return reportFailure(deps.logger, 'Report', error);
    }
  } catch (error) {
    return reportFailure(deps.logger, 'Simulation', error);
  }
}

export async function renderSavedReport(
  options: RenderCliOptions,
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const config = loadSimulatorConfig({
      resultsPath: options.resultsPath,
      outputPath: options.outputPath,
      reportTitle: options.title,
    });
    const service = new SimulationService(config, deps.executor, deps.store, deps.logger);
    const batch = await service.loadSavedResults();
    printSummary(batch);
    const outputPath = await service.writeReport(batch);
    console.log(`Report: ${outputPath}`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Render', error);
  }
}

function catalogFor(configPath: string | undefined, deps: CliDependencies): CatalogService {
  const config = loadSimulatorConfig({ configPath });
  return new CatalogService(config.configPath, deps.store, deps.logger);
}

export async function listCatalog(
  options: { configPath?: string },
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const specs = await catalogFor(options.configPath, deps).list();
    specs.forEach((spec, index) => {
      console.log(`${index + 1}. [${spec.severity}] ${spec.mitreTag} ${spec.command}`);
      console.log(`   ${spec.description}`);
    });
    console.log(`${specs.length} commands`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Catalog list', error);
  }
}

async function promptMissingFields(options: AddCliOptions): Promise<AddCliOptions> {
  const missing = !options.command || !options.description;
  if (!missing || !process.stdin.isTTY) {
    return options;
  }

  const answers = await inquirer.prompt<{
    command?: string;
    description?: string;
    severity?: string;
    mitreTag?: string;
  }>([
    {
      type: 'input',
      name: 'command',
      message: 'Command:',
      when: !options.command,
      validate: (value: string) => value.trim().length > 0 || 'Command field is required',
    },
    {
      type: 'input',
      name: 'description',
      message: 'Description:',
      when: !options.description,
      validate: (value: string) => value.trim().length > 0 || 'Description field is required',
    },
    {
      type: 'list',
      name: 'severity',
      message: 'Severity:',
      choices: [...SEVERITIES],
      default: 'Informational',
      when: !options.severity,
    },
    {
      type: 'input',
      name: 'mitreTag',
      message: 'MITRE ATT&CK tag (e.g. T1059.001):',
      when: !options.mitreTag,
    },
  ]);

  return {
    ...options,
    command: options.command ?? answers.command,
    description: options.description ?? answers.description,
    severity: options.severity ?? answers.severity,
    mitreTag: options.mitreTag ?? answers.mitreTag,
  };
}

export async function addCatalogEntry(
  options: AddCliOptions,
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const filled = await promptMissingFields(options);
    const entry = await catalogFor(filled.configPath, deps).add({
      command: filled.command ?? '',
      description: filled.description ?? '',
      severity: filled.severity,
      mitreTag: filled.mitreTag,
    });
    console.log(`Added: ${entry.command}`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Catalog add', error);
  }
}

export async function removeCatalogEntry(
  position: string,
  options: { configPath?: string },
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const removed = await catalogFor(options.configPath, deps).remove(Number(position));
    console.log(`Removed: ${removed.command}`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Catalog remove', error);
  }
}

export async function exportCatalog(
  targetPath: string,
  options: { configPath?: string },
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const count = await catalogFor(options.configPath, deps).export(targetPath);
    console.log(`Exported ${count} commands to ${targetPath}`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Catalog export', error);
  }
}

export async function importRepository(
  options: ImportCliOptions,
  deps: CliDependencies = defaultDependencies()
): Promise<number> {
  try {
    const config = loadSimulatorConfig({ configPath: options.configPath });
    if (options.repoUrl) {
      const action = await syncRepository(options.repoUrl, options.repoPath);
      console.log(`Repository ${action}: ${options.repoPath}`);
    }
    const report = await new CatalogImporter(deps.logger).importCatalog(options.repoPath);
    await deps.store.writeSpecifications(config.configPath, report.specs);
    console.log(`Successfully parsed ${report.specs.length} commands and saved to ${config.configPath}`);
    return 0;
  } catch (error) {
    return reportFailure(deps.logger, 'Import', error);
  }
}

export function buildProgram(deps: CliDependencies = defaultDependencies()): Command {
  const program = new Command();

  program
    .name('lotl-sim')
    .description('Run living-off-the-land technique commands and report which ones succeed');

  program
    .command('run', { isDefault: true })
    .description('Execute every command in the catalog and write the HTML report')
    .option('--config-path <path>', 'Command catalog JSON (env LOTL_CONFIG_PATH)')
    .option('--output-path <path>', 'HTML report destination (env LOTL_OUTPUT_PATH)')
    .option('--results-path <path>', 'Saved results JSON (env LOTL_RESULTS_PATH)')
    .option('--timeout-ms <ms>', 'Per-command timeout (env LOTL_COMMAND_TIMEOUT_MS)')
    .option('--concurrency <n>', 'Commands run at once; 1 keeps strict order (env LOTL_CONCURRENCY)')
    .option('--shell <path>', 'Shell used to run commands (env LOTL_SHELL)')
    .option('--signatures-path <path>', 'Failure signature table JSON (env LOTL_SIGNATURES_PATH)')
    .option('--title <title>', 'Report title')
    .action(async (options: RunCliOptions) => {
      const controller = new AbortController();
      const onInterrupt = (): void => {
        console.error('Interrupted; cancelling remaining commands...');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);
      try {
        process.exitCode = await runSimulation(options, deps, controller.signal);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });

  program
    .command('render')
    .description('Render the HTML report from saved results without re-running commands')
    .option('--results-path <path>', 'Saved results JSON')
    .option('--output-path <path>', 'HTML report destination')
    .option('--title <title>', 'Report title')
    .action(async (options: RenderCliOptions) => {
      process.exitCode = await renderSavedReport(options, deps);
    });

  const catalog = program.command('catalog').description('Inspect and edit the command catalog');

  catalog
    .command('list')
    .option('--config-path <path>', 'Command catalog JSON')
    .action(async (options: { configPath?: string }) => {
      process.exitCode = await listCatalog(options, deps);
    });

  catalog
    .command('add')
    .description('Append a command; prompts for missing fields when interactive')
    .option('--config-path <path>', 'Command catalog JSON')
    .option('--command <command>', 'Command to execute')
    .option('--description <text>', 'What the command simulates')
    .option('--severity <level>', `One of ${SEVERITIES.join(', ')}`)
    .option('--mitre-tag <tag>', 'MITRE ATT&CK technique id')
    .action(async (options: AddCliOptions) => {
      process.exitCode = await addCatalogEntry(options, deps);
    });

  catalog
    .command('remove <position>')
    .description('Remove the command at a 1-based position from `catalog list`')
    .option('--config-path <path>', 'Command catalog JSON')
    .action(async (position: string, options: { configPath?: string }) => {
      process.exitCode = await removeCatalogEntry(position, options, deps);
    });

  catalog
    .command('export <path>')
    .option('--config-path <path>', 'Command catalog JSON')
    .action(async (targetPath: string, options: { configPath?: string }) => {
      process.exitCode = await exportCatalog(targetPath, options, deps);
    });

  program
    .command('import')
    .description('Build the catalog from a LOLBAS-style repository (yml/**/*.yml)')
    .requiredOption('--repo-path <dir>', 'Local repository checkout')
    .option('--repo-url <url>', 'Clone (or pull) this repository into --repo-path first')
    .option('--config-path <path>', 'Command catalog JSON to write')
    .action(async (options: ImportCliOptions) => {
      process.exitCode = await importRepository(options, deps);
    });

  return program;
}

// Only parse if this file is being run directly (not imported)
if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('Fatal:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
