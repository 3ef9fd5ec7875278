import { Inject, Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { GUARD_CONFIG } from '../../../shared/config/guard.config';
import type { GuardConfig } from '../../../shared/config/guard.config';
import { TokenGeneratorService } from './token-generator.service';

/**
 * Token-holder display loop.
 *
 * Ticks every second like the holder's screen refresh. The proof is logged
 * only when it rotates; the countdown goes to debug.
 */
@Injectable()
export class TokenDisplayScheduler {
  private readonly logger = new Logger(TokenDisplayScheduler.name);

  constructor(
    @Inject(GUARD_CONFIG) private readonly config: GuardConfig,
    private readonly generator: TokenGeneratorService,
  ) {}

  @Interval(1000)
  refresh(): void {
    if (!this.config.display.enabled) {
      return;
    }

    const rotation = this.generator.pollRotation();
    if (rotation) {
      this.logger.log({
        message: `Present proof ${rotation.proof}`,
        step: rotation.step,
        secondsUntilRotation: rotation.secondsUntilRotation,
      });
      return;
    }

    const remaining = this.generator.secondsUntilRotation();
    if (remaining !== null) {
      this.logger.debug(`Refreshing token in: ${remaining}s`);
    }
  }
}
