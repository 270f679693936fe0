export enum SimulatorErrorCode {
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  CONFIG_INVALID = 'CONFIG_INVALID',
  REPORT_WRITE_FAILED = 'REPORT_WRITE_FAILED',
  RESULTS_WRITE_FAILED = 'RESULTS_WRITE_FAILED',
  RESULTS_INVALID = 'RESULTS_INVALID',
  CATALOG_INVALID_ENTRY = 'CATALOG_INVALID_ENTRY',
  IMPORT_FAILED = 'IMPORT_FAILED',
}

export class SimulatorError extends Error {
  readonly code: SimulatorErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SimulatorErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SimulatorError';
    this.code = code;
    this.context = context;
  }
}

export function isSimulatorError(error: unknown, code?: SimulatorErrorCode): error is SimulatorError {
  return error instanceof SimulatorError && (code === undefined || error.code === code);
}
