import { Module } from '@nestjs/common';
import { GUARD_CONFIG } from '../../shared/config/guard.config';
import type { GuardConfig } from '../../shared/config/guard.config';
import { TokenModule } from '../token/token.module';
import { VaultModule } from '../vault/vault.module';
import { GuardController } from './infrastructure/guard.controller';
import { GuardStatusService } from './application/guard-status.service';
import { GuardAuditEventHandlers } from './application/event-handlers/guard-audit.event-handlers';
import { ProcessCandidateUseCase } from './application/use-cases';
import { UNLOCK_GATE, UnlockGate } from './domain/unlock-gate.entity';

@Module({
  imports: [TokenModule, VaultModule],
  controllers: [GuardController],
  providers: [
    // One gate per process: single writer of the gate state
    {
      provide: UNLOCK_GATE,
      inject: [GUARD_CONFIG],
      useFactory: (config: GuardConfig) => new UnlockGate(config.gate),
    },

    // Use Cases
    ProcessCandidateUseCase,

    GuardStatusService,
    GuardAuditEventHandlers,
  ],
  exports: [GuardStatusService],
})
export class GuardModule {}
