import { Module } from '@nestjs/common';
import { GUARD_CONFIG } from '../../shared/config/guard.config';
import type { GuardConfig } from '../../shared/config/guard.config';
import { UNLOCK_PORT } from './domain/unlock.port';
import type { UnlockPort } from './domain/unlock.port';
import { DeviceUnlockAdapter } from './infrastructure/device-unlock.adapter';
import { DryRunUnlockAdapter } from './infrastructure/dry-run-unlock.adapter';

@Module({
  providers: [
    DeviceUnlockAdapter,
    DryRunUnlockAdapter,

    // Unlock port (infrastructure adapter chosen by VAULT_DRIVER)
    {
      provide: UNLOCK_PORT,
      inject: [GUARD_CONFIG, DeviceUnlockAdapter, DryRunUnlockAdapter],
      useFactory: (
        config: GuardConfig,
        device: DeviceUnlockAdapter,
        dryRun: DryRunUnlockAdapter,
      ): UnlockPort => (config.vault.driver === 'dry-run' ? dryRun : device),
    },
  ],
  exports: [UNLOCK_PORT],
})
export class VaultModule {}
