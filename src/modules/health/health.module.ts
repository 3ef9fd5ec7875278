import { Module } from '@nestjs/common';
import { GuardModule } from '../guard/guard.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [GuardModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
