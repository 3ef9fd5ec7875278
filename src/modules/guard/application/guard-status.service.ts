import { Inject, Injectable } from '@nestjs/common';
import type { Clock } from '../../../shared/domain/clock.port';
import { CLOCK } from '../../../shared/domain/clock.port';
import { UNLOCK_GATE, UnlockGate } from '../domain/unlock-gate.entity';
import type { GateMode, GatePhase } from '../domain/unlock-gate.entity';

export interface GuardStatus {
  mode: GateMode;
  phase: GatePhase;
  cooldownRemainingMs: number;
}

/**
 * Read-only view of the gate for status and health endpoints.
 */
@Injectable()
export class GuardStatusService {
  constructor(
    @Inject(UNLOCK_GATE) private readonly gate: UnlockGate,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  getStatus(): GuardStatus {
    const cooldownRemainingMs = this.gate.cooldownRemainingMs({
      wallTime: this.clock.now(),
      monotonicMs: this.clock.monotonicMs(),
    });
    return {
      mode: this.gate.mode,
      phase: this.gate.phase,
      cooldownRemainingMs,
    };
  }
}
