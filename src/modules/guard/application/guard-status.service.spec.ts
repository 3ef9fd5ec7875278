import { describe, it, expect, beforeEach } from 'vitest';
import { GuardStatusService } from './guard-status.service';
import { UnlockGate } from '../domain/unlock-gate.entity';
import { FakeClock } from '../../../../test/fake-clock';

describe('GuardStatusService', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock(Date.parse('2026-03-01T10:00:00Z'), 500);
  });

  it('should report an idle gate with no cooldown', () => {
    const gate = new UnlockGate({
      mode: 'cooldown',
      cooldownMs: 5000,
      maxWaitMs: 10000,
    });
    const service = new GuardStatusService(gate, clock);

    expect(service.getStatus()).toEqual({
      mode: 'cooldown',
      phase: 'IDLE',
      cooldownRemainingMs: 0,
    });
  });

  it('should report the remaining cooldown after a trigger', () => {
    const gate = new UnlockGate({
      mode: 'cooldown',
      cooldownMs: 5000,
      maxWaitMs: 10000,
    });
    const service = new GuardStatusService(gate, clock);
    gate.evaluate(true, { wallTime: clock.now(), monotonicMs: 500 });

    clock.advance(2000);

    expect(service.getStatus()).toEqual({
      mode: 'cooldown',
      phase: 'COOLDOWN',
      cooldownRemainingMs: 3000,
    });
  });

  it('should show the gate re-armed once the cooldown is over', () => {
    const gate = new UnlockGate({
      mode: 'cooldown',
      cooldownMs: 5000,
      maxWaitMs: 10000,
    });
    const service = new GuardStatusService(gate, clock);
    gate.evaluate(true, { wallTime: clock.now(), monotonicMs: 500 });

    clock.advance(5000);

    expect(service.getStatus().phase).toBe('IDLE');
  });

  it('should report a stopped single-shot gate', () => {
    const gate = new UnlockGate({ mode: 'single-shot' });
    const service = new GuardStatusService(gate, clock);
    gate.evaluate(true, { wallTime: clock.now(), monotonicMs: 500 });

    expect(service.getStatus()).toEqual({
      mode: 'single-shot',
      phase: 'STOPPED',
      cooldownRemainingMs: 0,
    });
  });
});
