// lotl-simulator - Main Entry Point
// Exports all public APIs

// Execution and classification
export { CommandRunner } from './src/application/services/commandRunner';
export type { CommandRunnerOptions } from './src/application/services/commandRunner';
export { BatchOrchestrator } from './src/application/services/batchOrchestrator';
export type { RunAllOptions } from './src/application/services/batchOrchestrator';
export { classifyOutcome, classifyExecution } from './src/domain/executors/outcomeClassifier';
export type { Classification, FailureCategory } from './src/domain/executors/outcomeClassifier';
export {
  DEFAULT_FAILURE_SIGNATURES,
  EDR_BLOCK_LABEL,
  parseFailureSignatures,
} from './src/domain/policies/classification/failureSignatures';

// Reporting
export { renderHtmlReport, escapeHtml } from './src/application/services/reportRenderer';
export { summarizeResults } from './src/application/services/summary';

// Orchestration with configuration and storage
export { SimulationService } from './src/application/services/simulationService';
export { CatalogService } from './src/application/services/catalogService';
export { CatalogImporter, extractCommands } from './src/application/services/catalogImporter';
export { loadSimulatorConfig } from './src/config/simulatorConfig';
export type { SimulatorConfig } from './src/config/simulatorConfig';
export { parseSpecifications, serializeSpecifications } from './src/domain/validation/specificationValidator';

// Adapters
export { CommandExecutorAdapter } from './src/infrastructure/adapters/os/commandExecutorAdapter';
export { FileStoreAdapter } from './src/infrastructure/adapters/persistence/fileStoreAdapter';
export { LoggerAdapter } from './src/infrastructure/adapters/logging/loggerAdapter';

// Errors
export { SimulatorError, SimulatorErrorCode } from './src/domain/errors';

// Types
export type { CommandExecutorPort, ExecuteOptions } from './src/domain/ports/commandExecutor';
export type { LoggerPort } from './src/domain/ports/logger';
export type { PersistencePort } from './src/domain/ports/persistence';
export type {
  BatchResult,
  BatchSummary,
  CommandSpecification,
  ExecutionOutcome,
  FailureSignature,
  ResultRecord,
  Severity,
} from './src/domain/types/types';
