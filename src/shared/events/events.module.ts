import { Global, Module } from '@nestjs/common';
import { EVENT_BUS } from './event-bus.interface';
import { InMemoryEventBus } from './in-memory-event-bus';

/**
 * EventsModule - provides the process-wide EVENT_BUS.
 *
 * Global so any module can publish or subscribe without importing it.
 */
@Global()
@Module({
  providers: [
    {
      provide: EVENT_BUS,
      useClass: InMemoryEventBus,
    },
  ],
  exports: [EVENT_BUS],
})
export class EventsModule {}
