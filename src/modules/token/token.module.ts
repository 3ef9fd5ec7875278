import { Module } from '@nestjs/common';
import { GUARD_CONFIG } from '../../shared/config/guard.config';
import type { GuardConfig } from '../../shared/config/guard.config';
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';
import { PROOF_SOURCE, createProofSource } from './domain/proof-source';
import { TokenGeneratorService } from './application/token-generator.service';
import { TokenValidatorService } from './application/token-validator.service';
import { TokenDisplayScheduler } from './application/token-display.scheduler';

@Module({
  providers: [
    // Clock (infrastructure adapter)
    {
      provide: CLOCK,
      useClass: SystemClock,
    },

    // Proof source built from the token policy (totp or static)
    {
      provide: PROOF_SOURCE,
      inject: [GUARD_CONFIG],
      useFactory: (config: GuardConfig) => createProofSource(config.token),
    },

    TokenGeneratorService,
    TokenValidatorService,
    TokenDisplayScheduler,
  ],
  exports: [CLOCK, PROOF_SOURCE, TokenGeneratorService, TokenValidatorService],
})
export class TokenModule {}
