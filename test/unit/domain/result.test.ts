import { describe, it, expect } from '@jest/globals';
import { Failure, Success, isFail, isOk, type Result } from '../../../src/domain/types/result';

describe('Result', () => {
  it('should narrow a success', () => {
    const result: Result<number> = Success(3);

    expect(isOk(result)).toBe(true);
    expect(isFail(result)).toBe(false);
    expect(isOk(result) && result.value).toBe(3);
  });

  it('should narrow a failure', () => {
    const result: Result<number> = Failure('pod has no spec');

    expect(isFail(result)).toBe(true);
    expect(isFail(result) && result.error).toBe('pod has no spec');
  });
});
