import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import { TokenModule } from './modules/token/token.module';
import { GuardModule } from './modules/guard/guard.module';
import { VaultModule } from './modules/vault/vault.module';
import { HealthModule } from './modules/health/health.module';
import { EventsModule } from './shared/events/events.module';
import { guardConfig } from './shared/config/guard.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [guardConfig],
    }),
    ScheduleModule.forRoot(),
    EventsModule, // Provides EVENT_BUS globally
    TokenModule,
    VaultModule,
    GuardModule,
    HealthModule,
  ],
})
export class AppModule {}
