import { Inject, Injectable } from '@nestjs/common';
import { GUARD_CONFIG } from '../../shared/config/guard.config';
import type { GuardConfig } from '../../shared/config/guard.config';
import { GuardStatusService } from '../guard/application/guard-status.service';

@Injectable()
export class HealthService {
  constructor(
    @Inject(GUARD_CONFIG) private readonly config: GuardConfig,
    private readonly guardStatusService: GuardStatusService,
  ) {}

  check() {
    try {
      const status = this.guardStatusService.getStatus();

      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        tokenMode: this.config.token.mode,
        vaultDriver: this.config.vault.driver,
        gate: status.phase,
      };
    } catch (error) {
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
