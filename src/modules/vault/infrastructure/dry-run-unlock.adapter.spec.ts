import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '@nestjs/common';
import { DryRunUnlockAdapter } from './dry-run-unlock.adapter';

describe('DryRunUnlockAdapter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should succeed and warn that no command was issued', async () => {
    const warn = vi
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);

    const result = await new DryRunUnlockAdapter().requestUnlock();

    expect(result).toEqual({ success: true });
    expect(warn).toHaveBeenCalledWith(
      'Dry run: unlock requested, no device command issued',
    );
  });
});
