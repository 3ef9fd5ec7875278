export type GatePhase = 'IDLE' | 'TRIGGERED' | 'COOLDOWN' | 'STOPPED';

export type GateMode = 'cooldown' | 'single-shot';

export type GatePolicy =
  | {
      mode: 'cooldown';
      /** Minimum spacing between two triggers */
      cooldownMs: number;
      /** Re-arm after this much monotonic time whatever the wall clock says */
      maxWaitMs: number;
    }
  | {
      /** Trigger once, then stop for good */
      mode: 'single-shot';
    };

/**
 * Mutable gate state. Owned by exactly one UnlockGate; pass a fresh object
 * per independent guard.
 */
export interface GateState {
  phase: GatePhase;
  cooldownDeadline: Date | null;
  /** Monotonic reading taken when the current cooldown began */
  cooldownStartedAtMs: number | null;
}

/**
 * A reading of both clocks for one evaluation.
 */
export interface GateInstant {
  wallTime: Date;
  monotonicMs: number;
}

export type GateDecision =
  | { action: 'TRIGGER' }
  | { action: 'IGNORE'; reason: 'INVALID' | 'COOLING_DOWN' | 'STOPPED' };

export function createIdleGateState(): GateState {
  return { phase: 'IDLE', cooldownDeadline: null, cooldownStartedAtMs: null };
}

/**
 * UnlockGate - turns a stream of validator verdicts into at most one
 * trigger per acceptance episode.
 *
 *   IDLE --valid--> TRIGGERED --> COOLDOWN --due--> IDLE
 *                            \--> STOPPED (single-shot)
 *
 * The transition is completed synchronously inside evaluate(), before the
 * caller performs the side effect, so overlapping callers cannot both see
 * IDLE.
 *
 * Cooldown ends when the wall clock has reached the deadline AND the
 * monotonic clock shows the full cooldown elapsed, or unconditionally once
 * the monotonic clock passes maxWaitMs. A backward wall-clock jump is
 * therefore bounded by maxWaitMs and a forward jump cannot shorten the
 * cooldown.
 */
export class UnlockGate {
  constructor(
    private readonly policy: GatePolicy,
    private readonly state: GateState = createIdleGateState(),
  ) {}

  // ============ GETTERS ============

  get phase(): GatePhase {
    return this.state.phase;
  }

  get cooldownDeadline(): Date | null {
    return this.state.cooldownDeadline;
  }

  get mode(): GateMode {
    return this.policy.mode;
  }

  // ============ DOMAIN METHODS ============

  /**
   * Feed one verdict. Returns TRIGGER exactly when the caller must issue
   * the unlock request.
   */
  evaluate(valid: boolean, at: GateInstant): GateDecision {
    this.rearmIfDue(at);

    switch (this.state.phase) {
      case 'STOPPED':
        return { action: 'IGNORE', reason: 'STOPPED' };
      case 'COOLDOWN':
      case 'TRIGGERED':
        return { action: 'IGNORE', reason: 'COOLING_DOWN' };
      case 'IDLE':
        if (!valid) {
          return { action: 'IGNORE', reason: 'INVALID' };
        }
        this.state.phase = 'TRIGGERED';
        this.leaveTriggered(at);
        return { action: 'TRIGGER' };
    }
  }

  /**
   * Time left before the gate re-arms, for status reporting.
   * Zero when not cooling down; never longer than the max wait.
   */
  cooldownRemainingMs(at: GateInstant): number {
    this.rearmIfDue(at);
    if (
      this.policy.mode !== 'cooldown' ||
      this.state.phase !== 'COOLDOWN' ||
      this.state.cooldownDeadline === null ||
      this.state.cooldownStartedAtMs === null
    ) {
      return 0;
    }

    const elapsed = at.monotonicMs - this.state.cooldownStartedAtMs;
    const untilDeadline =
      this.state.cooldownDeadline.getTime() - at.wallTime.getTime();
    const untilCooldown = this.policy.cooldownMs - elapsed;
    const untilMaxWait = this.policy.maxWaitMs - elapsed;

    return Math.max(
      0,
      Math.min(Math.max(untilDeadline, untilCooldown), untilMaxWait),
    );
  }

  snapshot(): Readonly<GateState> {
    return { ...this.state };
  }

  // ============ TRANSITIONS ============

  private leaveTriggered(at: GateInstant): void {
    if (this.policy.mode === 'single-shot') {
      this.state.phase = 'STOPPED';
      return;
    }
    this.state.phase = 'COOLDOWN';
    this.state.cooldownDeadline = new Date(
      at.wallTime.getTime() + this.policy.cooldownMs,
    );
    this.state.cooldownStartedAtMs = at.monotonicMs;
  }

  private rearmIfDue(at: GateInstant): void {
    if (this.state.phase !== 'COOLDOWN' || this.policy.mode !== 'cooldown') {
      return;
    }
    const { cooldownDeadline, cooldownStartedAtMs } = this.state;
    if (cooldownDeadline === null || cooldownStartedAtMs === null) {
      this.rearm();
      return;
    }

    const elapsed = at.monotonicMs - cooldownStartedAtMs;
    const deadlineReached = at.wallTime.getTime() >= cooldownDeadline.getTime();
    const cooldownElapsed = elapsed >= this.policy.cooldownMs;

    if ((deadlineReached && cooldownElapsed) || elapsed >= this.policy.maxWaitMs) {
      this.rearm();
    }
  }

  private rearm(): void {
    this.state.phase = 'IDLE';
    this.state.cooldownDeadline = null;
    this.state.cooldownStartedAtMs = null;
  }
}

export const UNLOCK_GATE = Symbol('UNLOCK_GATE');
