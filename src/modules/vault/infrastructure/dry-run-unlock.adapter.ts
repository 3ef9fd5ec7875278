import { Injectable, Logger } from '@nestjs/common';
import type { UnlockPort, UnlockResult } from '../domain/unlock.port';

/**
 * Development stand-in: records the request and always succeeds.
 */
@Injectable()
export class DryRunUnlockAdapter implements UnlockPort {
  private readonly logger = new Logger(DryRunUnlockAdapter.name);

  async requestUnlock(): Promise<UnlockResult> {
    this.logger.warn('Dry run: unlock requested, no device command issued');
    return { success: true };
  }
}
