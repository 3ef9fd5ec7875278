import { BaseDomainEvent } from '../../../../shared/events';
import type { UnlockError } from '../../../vault/domain/unlock.port';
import type { GateMode } from '../unlock-gate.entity';

// ============ Event Payload Types ============

export interface UnlockGrantedPayload {
  /** Corner points reported by the decoder, for overlays */
  corners: number[][] | null;
}

export interface UnlockFailedPayload {
  error: UnlockError;
}

export interface GuardStoppedPayload {
  mode: GateMode;
}

// ============ Event Classes ============

export class UnlockGrantedEvent extends BaseDomainEvent<UnlockGrantedPayload> {
  readonly eventType = 'guard.unlock-granted';
  readonly source = 'UnlockGate';
}

export class UnlockFailedEvent extends BaseDomainEvent<UnlockFailedPayload> {
  readonly eventType = 'guard.unlock-failed';
  readonly source = 'UnlockGate';
}

export class GuardStoppedEvent extends BaseDomainEvent<GuardStoppedPayload> {
  readonly eventType = 'guard.stopped';
  readonly source = 'UnlockGate';
}

export const GUARD_EVENTS = {
  UNLOCK_GRANTED: 'guard.unlock-granted',
  UNLOCK_FAILED: 'guard.unlock-failed',
  STOPPED: 'guard.stopped',
} as const;
