import { parseBatchResult } from '@/domain/validation/resultsValidator';

describe('ResultsValidator', () => {
  const record = {
    command: 'whoami',
    description: 'Current user',
    severity: 'Low',
    mitreTag: 'T1033',
    succeeded: false,
    errorMessage: '',
  };

  it('should restore a saved batch', () => {
    const batch = parseBatchResult({
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:01:00.000Z',
      results: [record],
    });

    expect(batch).toEqual({
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T00:01:00.000Z',
      results: [record],
    });
  });

  it('should reject documents without a results array', () => {
    expect(() => parseBatchResult({ results: 'none' })).toThrow(
      'Saved results must be an object with a "results" array'
    );
  });

  it('should reject records with a non-boolean status', () => {
    expect(() =>
      parseBatchResult({
        startedAt: 'a',
        finishedAt: 'b',
        results: [{ ...record, succeeded: 'yes' }],
      })
    ).toThrow('Result 0 field "succeeded" must be a boolean');
  });
});
