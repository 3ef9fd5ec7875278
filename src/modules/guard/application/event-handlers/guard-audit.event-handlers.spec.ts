import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { GuardAuditEventHandlers } from './guard-audit.event-handlers';
import { EVENT_BUS, InMemoryEventBus } from '../../../../shared/events';
import {
  UnlockFailedEvent,
  UnlockGrantedEvent,
  GuardStoppedEvent,
} from '../../domain/events/guard.events';

describe('GuardAuditEventHandlers', () => {
  let eventBus: InMemoryEventBus;
  const occurredAt = new Date('2026-03-01T10:00:00Z');

  beforeEach(async () => {
    vi.restoreAllMocks();
    eventBus = new InMemoryEventBus();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GuardAuditEventHandlers,
        { provide: EVENT_BUS, useValue: eventBus },
      ],
    }).compile();

    module.get(GuardAuditEventHandlers).onModuleInit();
  });

  it('should subscribe to every guard event', () => {
    expect(eventBus.hasHandlers('guard.unlock-granted')).toBe(true);
    expect(eventBus.hasHandlers('guard.unlock-failed')).toBe(true);
    expect(eventBus.hasHandlers('guard.stopped')).toBe(true);
  });

  it('should record granted access with the corner count', async () => {
    const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => {});

    await eventBus.publish(
      new UnlockGrantedEvent(
        { corners: [[0, 0], [10, 0], [10, 10], [0, 10]] },
        occurredAt,
      ),
    );

    expect(log).toHaveBeenCalledWith({
      message: 'ACCESS GRANTED',
      at: '2026-03-01T10:00:00.000Z',
      corners: 4,
    });
  });

  it('should record device failures with their classification', async () => {
    const warn = vi
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => {});

    await eventBus.publish(
      new UnlockFailedEvent(
        { error: { code: 'DEVICE_ABSENT', message: 'gone' } },
        occurredAt,
      ),
    );

    expect(warn).toHaveBeenCalledWith({
      message: 'ACCESS DENIED BY DEVICE',
      at: '2026-03-01T10:00:00.000Z',
      code: 'DEVICE_ABSENT',
    });
  });

  it('should record a stopped guard', async () => {
    const log = vi.spyOn(Logger.prototype, 'log').mockImplementation(() => {});

    await eventBus.publish(
      new GuardStoppedEvent({ mode: 'single-shot' }, occurredAt),
    );

    expect(log).toHaveBeenCalledWith({
      message: 'Guard stopped',
      at: '2026-03-01T10:00:00.000Z',
      mode: 'single-shot',
    });
  });
});
