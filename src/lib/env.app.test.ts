import { describe, it, expect } from 'vitest';
import { ValiError } from 'valibot';
import { loadTrackerEnv } from './env.app';
import { DEFAULT_CSV_SIZE_LIMIT_MB, DEFAULT_TXT_SIZE_LIMIT_MB } from './games-constants';

describe('loadTrackerEnv', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadTrackerEnv({})).toEqual({
      CSV_SIZE_LIMIT_MB: DEFAULT_CSV_SIZE_LIMIT_MB,
      TXT_SIZE_LIMIT_MB: DEFAULT_TXT_SIZE_LIMIT_MB,
    });
  });

  it('reads numeric overrides and treats blanks as unset', () => {
    expect(loadTrackerEnv({ CSV_SIZE_LIMIT_MB: ' 10 ', TXT_SIZE_LIMIT_MB: '' })).toEqual({
      CSV_SIZE_LIMIT_MB: 10,
      TXT_SIZE_LIMIT_MB: DEFAULT_TXT_SIZE_LIMIT_MB,
    });
  });

  it('rejects values that are not positive numbers', () => {
    expect(() => loadTrackerEnv({ CSV_SIZE_LIMIT_MB: 'lots' })).toThrow(ValiError);
    expect(() => loadTrackerEnv({ TXT_SIZE_LIMIT_MB: '0' })).toThrow(ValiError);
  });
});
