import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EVENT_BUS } from '../../../../shared/events';
import type { DomainEvent, IEventBus } from '../../../../shared/events';
import { GUARD_EVENTS } from '../../domain/events/guard.events';
import type {
  GuardStoppedPayload,
  UnlockFailedPayload,
  UnlockGrantedPayload,
} from '../../domain/events/guard.events';

/**
 * Writes one audit record per gate episode outcome.
 */
@Injectable()
export class GuardAuditEventHandlers implements OnModuleInit {
  private readonly logger = new Logger('GuardAudit');

  constructor(@Inject(EVENT_BUS) private readonly eventBus: IEventBus) {}

  onModuleInit() {
    this.eventBus.subscribe<UnlockGrantedPayload>(
      GUARD_EVENTS.UNLOCK_GRANTED,
      this.onUnlockGranted.bind(this),
    );
    this.eventBus.subscribe<UnlockFailedPayload>(
      GUARD_EVENTS.UNLOCK_FAILED,
      this.onUnlockFailed.bind(this),
    );
    this.eventBus.subscribe<GuardStoppedPayload>(
      GUARD_EVENTS.STOPPED,
      this.onGuardStopped.bind(this),
    );
  }

  private onUnlockGranted(event: DomainEvent<UnlockGrantedPayload>): void {
    this.logger.log({
      message: 'ACCESS GRANTED',
      at: event.occurredAt.toISOString(),
      corners: event.payload.corners?.length ?? 0,
    });
  }

  private onUnlockFailed(event: DomainEvent<UnlockFailedPayload>): void {
    this.logger.warn({
      message: 'ACCESS DENIED BY DEVICE',
      at: event.occurredAt.toISOString(),
      code: event.payload.error.code,
    });
  }

  private onGuardStopped(event: DomainEvent<GuardStoppedPayload>): void {
    this.logger.log({
      message: 'Guard stopped',
      at: event.occurredAt.toISOString(),
      mode: event.payload.mode,
    });
  }
}
