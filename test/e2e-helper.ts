import { Test } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from '../src/app.module';
import { closeWhenGuardStops, configureApp } from '../src/app.setup';
import request from 'supertest';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { CLOCK } from '../src/shared/domain/clock.port';
import { UNLOCK_PORT } from '../src/modules/vault/domain/unlock.port';
import type { UnlockPort } from '../src/modules/vault/domain/unlock.port';
import { GUARD_CONFIG } from '../src/shared/config/guard.config';
import type { GuardConfig } from '../src/shared/config/guard.config';
import type { FakeClock } from './fake-clock';

// Load .env.test BEFORE anything else
dotenv.config({ path: path.join(__dirname, '../.env.test') });

export interface E2EOptions {
  clock?: FakeClock;
  unlockPort?: UnlockPort;
  config?: GuardConfig;
  /** Apply the single-shot shutdown wiring from main.ts */
  closeWhenGuardStops?: boolean;
  /** Listen on an ephemeral port instead of letting supertest bind one per request */
  listen?: boolean;
}

/**
 * E2E Test Helper
 * Provides utilities for E2E testing with a real Nest application instance
 */
export class E2ETestHelper {
  private app: NestExpressApplication | null = null;

  constructor(private readonly options: E2EOptions = {}) {}

  async setup(): Promise<void> {
    const builder = Test.createTestingModule({
      imports: [AppModule],
    });
    if (this.options.clock) {
      builder.overrideProvider(CLOCK).useValue(this.options.clock);
    }
    if (this.options.unlockPort) {
      builder.overrideProvider(UNLOCK_PORT).useValue(this.options.unlockPort);
    }
    if (this.options.config) {
      builder.overrideProvider(GUARD_CONFIG).useValue(this.options.config);
    }
    const moduleFixture = await builder.compile();

    const app = moduleFixture.createNestApplication<NestExpressApplication>({
      bodyParser: false,
    });

    // Same configuration as main.ts
    configureApp(app);
    if (this.options.closeWhenGuardStops) {
      closeWhenGuardStops(app);
    }

    if (this.options.listen) {
      await app.listen(0, '127.0.0.1');
    } else {
      await app.init();
    }
    this.app = app;
  }

  async teardown(): Promise<void> {
    await this.app?.close();
    this.app = null;
  }

  getApp(): NestExpressApplication {
    if (!this.app) {
      throw new Error('E2ETestHelper.setup() has not been called');
    }
    return this.app;
  }

  request() {
    return request(this.getApp().getHttpServer());
  }
}
