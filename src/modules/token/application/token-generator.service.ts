import { Inject, Injectable } from '@nestjs/common';
import type { Clock } from '../../../shared/domain/clock.port';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { ProofSource } from '../domain/proof-source';
import { PROOF_SOURCE } from '../domain/proof-source';

export interface ProofRotation {
  proof: string;
  step: number;
  secondsUntilRotation: number | null;
}

/**
 * Produces the proof a token holder should display right now.
 */
@Injectable()
export class TokenGeneratorService {
  private lastReportedStep: number | null = null;

  constructor(
    @Inject(PROOF_SOURCE) private readonly source: ProofSource,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  currentProof(): string {
    return this.source.current(this.clock.now());
  }

  secondsUntilRotation(): number | null {
    return this.source.secondsUntilRotation(this.clock.now());
  }

  /**
   * Change detection for renderers: returns the proof only when the step
   * differs from the one last returned here, otherwise null.
   * Has no effect on what currentProof() or validation return.
   */
  pollRotation(): ProofRotation | null {
    const now = this.clock.now();
    const step = this.source.step(now);
    if (step === this.lastReportedStep) {
      return null;
    }
    this.lastReportedStep = step;
    return {
      proof: this.source.current(now),
      step,
      secondsUntilRotation: this.source.secondsUntilRotation(now),
    };
  }
}
