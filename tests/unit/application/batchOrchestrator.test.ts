import { BatchOrchestrator } from '@/application/services/batchOrchestrator';
import { CommandRunner } from '@/application/services/commandRunner';
import { DEFAULT_FAILURE_SIGNATURES } from '@/domain/policies/classification/failureSignatures';
import { ResultRecord } from '@/domain/types/types';
import { CommandExecutorMock } from '@mocks/infrastructure/executor/command-executor.mock';
import { createMockLogger, MockLogger } from '../../helpers/logger';
import { SpecBuilder } from '../../helpers/spec-builders';

describe('BatchOrchestrator', () => {
  let executor: CommandExecutorMock;
  let logger: MockLogger;
  let orchestrator: BatchOrchestrator;

  const specs = [
    SpecBuilder.command('whoami').build(),
    SpecBuilder.command('net user').withSeverity('Medium').build(),
    SpecBuilder.command('Invoke-Mimikatz').withSeverity('Critical').build(),
    SpecBuilder.command('hostname').build(),
  ];

  beforeEach(() => {
    executor = new CommandExecutorMock();
    logger = createMockLogger();
    const runner = new CommandRunner(executor, logger, {
      shell: '/bin/sh',
      timeoutMs: 1000,
      signatures: DEFAULT_FAILURE_SIGNATURES,
    });
    orchestrator = new BatchOrchestrator(runner, logger);
  });

  it('should return an empty batch for an empty catalog', async () => {
    const batch = await orchestrator.runAll([]);

    expect(batch.results).toEqual([]);
    expect(executor.getExecutedCommands()).toEqual([]);
  });

  it('should keep going after failures and preserve order', async () => {
    executor.setOutput('net user', "Program 'net.exe' failed to run: Access is denied");
    executor.setRejection('Invoke-Mimikatz', new Error('executor crashed'));

    const batch = await orchestrator.runAll(specs);

    expect(batch.results.map(r => [r.command, r.succeeded, r.errorMessage])).toEqual([
      ['whoami', true, ''],
      ['net user', false, "Program 'net.exe' failed to run: Access is denied"],
      ['Invoke-Mimikatz', false, 'executor crashed'],
      ['hostname', true, ''],
    ]);
    expect(executor.getExecutedCommands()).toEqual(['whoami', 'net user', 'Invoke-Mimikatz', 'hostname']);
  });

  it('should log progress for every command', async () => {
    await orchestrator.runAll(specs.slice(0, 2));

    expect(logger.log).toHaveBeenCalledWith('BatchOrchestrator', '[1/2] Running: whoami');
    expect(logger.log).toHaveBeenCalledWith('BatchOrchestrator', '[2/2] Running: net user');
  });

  it('should report each result with its index', async () => {
    const seen: [number, string][] = [];

    await orchestrator.runAll(specs, {
      onResult: (record: ResultRecord, index: number) => seen.push([index, record.command]),
    });

    expect(seen).toEqual([
      [0, 'whoami'],
      [1, 'net user'],
      [2, 'Invoke-Mimikatz'],
      [3, 'hostname'],
    ]);
  });

  it('should finish the batch when a result listener throws', async () => {
    const listenerError = new Error('listener failed');

    const batch = await orchestrator.runAll(specs, {
      concurrency: 2,
      onResult: (_record, index) => {
        if (index === 1) throw listenerError;
      },
    });

    expect(batch.results.map(r => r.command)).toEqual(['whoami', 'net user', 'Invoke-Mimikatz', 'hostname']);
    expect(executor.getExecutedCommands()).toHaveLength(4);
    expect(logger.logError).toHaveBeenCalledWith(
      'BatchOrchestrator',
      'Result listener failed for command 2',
      listenerError
    );
  });

  it('should restore specification order when running concurrently', async () => {
    executor.setDelay('whoami', 40);
    executor.setDelay('net user', 5);

    const completion: string[] = [];
    const batch = await orchestrator.runAll(specs, {
      concurrency: 3,
      onResult: record => completion.push(record.command),
    });

    expect(completion[0]).not.toBe('whoami');
    expect(batch.results.map(r => r.command)).toEqual(specs.map(s => s.command));
  });

  it('should cancel commands that have not started once the signal aborts', async () => {
    const controller = new AbortController();

    const batch = await orchestrator.runAll(specs, {
      signal: controller.signal,
      onResult: (_record, index) => {
        if (index === 1) controller.abort();
      },
    });

    expect(batch.results).toHaveLength(4);
    expect(batch.results.map(r => r.errorMessage)).toEqual(['', '', 'Command cancelled', 'Command cancelled']);
    expect(executor.getExecutedCommands()).toEqual(['whoami', 'net user']);
  });
});
