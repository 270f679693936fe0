import {
  DEFAULT_FAILURE_SIGNATURES,
  findSignature,
  parseFailureSignatures,
} from '@/domain/policies/classification/failureSignatures';
import { SimulatorErrorCode } from '@/domain/errors';

describe('FailureSignatures', () => {
  describe('findSignature', () => {
    it('should only consider signatures of the requested kind', () => {
      const output = 'This script contains malicious content and has been blocked by your antivirus software.';

      expect(findSignature(DEFAULT_FAILURE_SIGNATURES, 'ACCESS_RESTRICTION', output)).toBeUndefined();
      expect(findSignature(DEFAULT_FAILURE_SIGNATURES, 'SECURITY_INTERCEPTION', output)?.name).toBe('antivirus-block');
    });

    it('should match the interception pattern across line breaks', () => {
      const output = 'This script contains malicious content\nand has been blocked by your antivirus software.';
      expect(findSignature(DEFAULT_FAILURE_SIGNATURES, 'SECURITY_INTERCEPTION', output)?.name).toBe('antivirus-block');
    });
  });

  describe('parseFailureSignatures', () => {
    it('should accept both signature kinds', () => {
      const parsed = parseFailureSignatures([
        { kind: 'ACCESS_RESTRICTION', name: 'denied', pattern: 'Access is denied' },
        { kind: 'SECURITY_INTERCEPTION', name: 'av', pattern: 'quarantined', label: 'Blocked' },
      ]);

      expect(parsed).toEqual([
        { kind: 'ACCESS_RESTRICTION', name: 'denied', pattern: 'Access is denied' },
        { kind: 'SECURITY_INTERCEPTION', name: 'av', pattern: 'quarantined', label: 'Blocked' },
      ]);
    });

    it('should reject a non-array table', () => {
      expect(() => parseFailureSignatures({})).toThrow('Failure signature table must be a JSON array');
    });

    it('should reject an interception without a label', () => {
      expect(() =>
        parseFailureSignatures([{ kind: 'SECURITY_INTERCEPTION', name: 'av', pattern: 'blocked' }])
      ).toThrow('Invalid failure signature at index 0: field "label" must be a non-empty string');
    });

    it('should reject an unknown kind', () => {
      expect(() => parseFailureSignatures([{ kind: 'OTHER', name: 'x', pattern: 'y' }])).toThrow(
        'Invalid failure signature at index 0: field "kind" must be ACCESS_RESTRICTION or SECURITY_INTERCEPTION'
      );
    });

    it('should reject a pattern that does not compile', () => {
      expect(() =>
        parseFailureSignatures([{ kind: 'ACCESS_RESTRICTION', name: 'bad', pattern: '(unclosed' }])
      ).toThrow(
        expect.objectContaining({
          code: SimulatorErrorCode.CONFIG_INVALID,
          message: expect.stringContaining('pattern does not compile'),
        })
      );
    });
  });
});
