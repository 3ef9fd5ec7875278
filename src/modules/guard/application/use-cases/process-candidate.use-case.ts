import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Clock } from '../../../../shared/domain/clock.port';
import { CLOCK } from '../../../../shared/domain/clock.port';
import { LogThrottle } from '../../../../shared/domain/log-throttle';
import { GUARD_CONFIG } from '../../../../shared/config/guard.config';
import type { GuardConfig } from '../../../../shared/config/guard.config';
import { EVENT_BUS } from '../../../../shared/events';
import type { IEventBus } from '../../../../shared/events';
import { TokenValidatorService } from '../../../token/application/token-validator.service';
import { UNLOCK_PORT } from '../../../vault/domain/unlock.port';
import type {
  UnlockPort,
  UnlockResult,
} from '../../../vault/domain/unlock.port';
import { UNLOCK_GATE, UnlockGate } from '../../domain/unlock-gate.entity';
import type { GatePhase } from '../../domain/unlock-gate.entity';
import {
  GuardStoppedEvent,
  UnlockFailedEvent,
  UnlockGrantedEvent,
} from '../../domain/events/guard.events';

/**
 * Input for the use case: one decoded string from the optical decoder.
 */
export interface ProcessCandidateInput {
  text: string;
  /** Corner points of the detected code, display only */
  points?: number[][];
}

/**
 * Result type using discriminated union on the verdict
 */
export type ProcessCandidateResult =
  | { verdict: 'REJECTED'; phase: GatePhase }
  | {
      verdict: 'ACCEPTED';
      triggered: false;
      reason: 'COOLING_DOWN' | 'STOPPED';
      phase: GatePhase;
    }
  | {
      verdict: 'ACCEPTED';
      triggered: true;
      unlock: UnlockResult;
      phase: GatePhase;
    };

/**
 * ProcessCandidate Use Case
 *
 * Runs one candidate through validator, gate and unlock port:
 * 1. Validate against the window for "now"
 * 2. Let the gate decide (synchronously) whether this is a new episode
 * 3. On a trigger, call the port once and report its outcome
 *
 * Port failures never escape: the gate is already cooling down, the failure
 * is logged once and returned to the caller.
 */
@Injectable()
export class ProcessCandidateUseCase {
  private readonly logger = new Logger(ProcessCandidateUseCase.name);
  private readonly rejectionLog: LogThrottle;

  constructor(
    private readonly validator: TokenValidatorService,
    @Inject(UNLOCK_GATE) private readonly gate: UnlockGate,
    @Inject(UNLOCK_PORT) private readonly unlockPort: UnlockPort,
    @Inject(EVENT_BUS) private readonly eventBus: IEventBus,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(GUARD_CONFIG) private readonly config: GuardConfig,
  ) {
    this.rejectionLog = new LogThrottle(config.rejectLogIntervalMs, clock);
  }

  async execute(input: ProcessCandidateInput): Promise<ProcessCandidateResult> {
    const wallTime = this.clock.now();
    const monotonicMs = this.clock.monotonicMs();

    const valid = this.validator.isValidAt(input.text, wallTime);
    const decision = this.gate.evaluate(valid, { wallTime, monotonicMs });

    if (decision.action === 'IGNORE') {
      if (decision.reason === 'INVALID') {
        this.logRejection(input.text);
        return { verdict: 'REJECTED', phase: this.gate.phase };
      }
      this.logger.debug(`Valid proof ignored: ${decision.reason}`);
      return {
        verdict: 'ACCEPTED',
        triggered: false,
        reason: decision.reason,
        phase: this.gate.phase,
      };
    }

    this.logger.log('Valid proof presented, requesting unlock');
    const unlock = await this.requestUnlock();

    if (unlock.success) {
      this.logger.log('Vault unlocked');
      await this.eventBus.publish(
        new UnlockGrantedEvent({ corners: input.points ?? null }, wallTime),
      );
    } else {
      this.logger.warn({
        message: `Unlock failed: ${unlock.error.message}`,
        code: unlock.error.code,
        cooldownDeadline: this.gate.cooldownDeadline?.toISOString() ?? null,
      });
      await this.eventBus.publish(
        new UnlockFailedEvent({ error: unlock.error }, wallTime),
      );
    }

    if (this.gate.phase === 'STOPPED') {
      this.logger.log('Single-shot guard finished, no further unlocks');
      await this.eventBus.publish(
        new GuardStoppedEvent({ mode: this.gate.mode }, wallTime),
      );
    }

    return {
      verdict: 'ACCEPTED',
      triggered: true,
      unlock,
      phase: this.gate.phase,
    };
  }

  private async requestUnlock(): Promise<UnlockResult> {
    try {
      return await this.unlockPort.requestUnlock(this.config.unlock.pin);
    } catch (error) {
      // Adapters report failures in the result; a throw is a bug in one
      return {
        success: false,
        error: {
          code: 'OTHER',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  private logRejection(candidate: string): void {
    const decision = this.rejectionLog.tryAcquire();
    if (!decision.allowed) {
      return;
    }
    const suppressed =
      decision.suppressedSinceLast > 0
        ? ` (${decision.suppressedSinceLast} more since last report)`
        : '';
    this.logger.log(
      `Invalid or expired token (${candidate.length} chars)${suppressed}`,
    );
  }
}
