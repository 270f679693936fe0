import { SimulationService } from '@/application/services/simulationService';
import { loadSimulatorConfig } from '@/config/simulatorConfig';
import { SimulatorErrorCode } from '@/domain/errors';
import { FileStoreAdapter } from '@/infrastructure/adapters/persistence/fileStoreAdapter';
import { CommandExecutorMock } from '@mocks/infrastructure/executor/command-executor.mock';
import { FileSystemMock } from '@mocks/infrastructure/filesystem/fs.mock';
import { fsRegistry } from '../../helpers/fs-registry';
import { MockLogger, createMockLogger } from '../../helpers/logger';
import { SpecBuilder } from '../../helpers/spec-builders';

describe('SimulationService', () => {
  let fsMock: FileSystemMock;
  let executor: CommandExecutorMock;

  const config = loadSimulatorConfig(
    {
      configPath: '/work/commands.json',
      outputPath: '/work/out/report.html',
      resultsPath: '/work/out/results.json',
      shell: '/bin/sh',
      commandTimeoutMs: 750,
    },
    {}
  );

  let logger: MockLogger;

  const createService = (overrides: Partial<typeof config> = {}) =>
    new SimulationService({ ...config, ...overrides }, executor, new FileStoreAdapter(), logger);

  beforeEach(() => {
    fsMock = new FileSystemMock();
    fsRegistry.setMock(fsMock);
    executor = new CommandExecutorMock();
    logger = createMockLogger();
  });

  it('should fail before running anything when the catalog is missing', async () => {
    await expect(createService().simulate()).rejects.toMatchObject({ code: SimulatorErrorCode.CONFIG_NOT_FOUND });
    expect(executor.getExecutedCommands()).toEqual([]);
    expect(fsMock.read('/work/out/results.json')).toBeUndefined();
  });

  it('should run the catalog with configured shell and timeout and save results', async () => {
    fsMock.seedJson('/work/commands.json', [
      SpecBuilder.command('whoami').toRecord(),
      SpecBuilder.command('net user').toRecord(),
    ]);
    executor.setOutput('net user', '', 2);

    const batch = await createService().simulate();

    expect(batch.results.map(r => r.succeeded)).toEqual([true, false]);
    expect(executor.getCallHistory()[0].options).toMatchObject({ shell: '/bin/sh', timeoutMs: 750 });
    expect(fsMock.readJson('/work/out/results.json')).toEqual(JSON.parse(JSON.stringify(batch)));
  });

  it('should return the batch and log the error when results cannot be saved', async () => {
    fsMock.seedJson('/work/commands.json', [SpecBuilder.command('whoami').toRecord()]);
    fsMock.denyWritesUnder('/work/out');
    const service = createService();

    const batch = await service.simulate();

    expect(executor.getExecutedCommands()).toEqual(['whoami']);
    expect(batch.results).toHaveLength(1);
    expect(logger.logError).toHaveBeenCalledWith(
      'Simulation',
      'Results were not saved to /work/out/results.json',
      expect.objectContaining({ code: SimulatorErrorCode.RESULTS_WRITE_FAILED })
    );
    await expect(service.writeReport(batch, '/work/report.html')).resolves.toBe('/work/report.html');
  });

  it('should apply a custom signature table', async () => {
    fsMock.seedJson('/work/commands.json', [SpecBuilder.command('rundll32 payload.dll').toRecord()]);
    fsMock.seedJson('/work/signatures.json', [
      { kind: 'SECURITY_INTERCEPTION', name: 'quarantine', pattern: 'quarantined', label: 'Blocked By AV' },
    ]);
    executor.setOutput('rundll32', 'The file was quarantined.');

    const batch = await createService({ signaturesPath: '/work/signatures.json' }).simulate();

    expect(batch.results[0]).toMatchObject({ succeeded: false, errorMessage: 'Blocked By AV' });
  });

  it('should allow retrying a failed report write at another path', async () => {
    const service = createService();
    const batch = { startedAt: 'a', finishedAt: 'b', results: [] };
    fsMock.denyWritesUnder('/work/out');

    await expect(service.writeReport(batch)).rejects.toMatchObject({ code: SimulatorErrorCode.REPORT_WRITE_FAILED });
    await expect(service.writeReport(batch, '/work/retry/report.html')).resolves.toBe('/work/retry/report.html');
    expect(fsMock.read('/work/retry/report.html')).toContain('<span class="value">0.00%</span>');
  });
});
