import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { closeWhenGuardStops, configureApp } from './app.setup';
import { GUARD_CONFIG } from './shared/config/guard.config';
import type { GuardConfig } from './shared/config/guard.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  // Configuration is validated while the module graph is built;
  // a bad setting rejects here, before anything listens.
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
  });
  app.enableShutdownHooks();

  configureApp(app);

  const guardConfig = app.get<GuardConfig>(GUARD_CONFIG);

  // Single-shot mode ends the process after the first unlock attempt
  closeWhenGuardStops(app);

  logger.log({
    message: 'Guard configured',
    tokenMode: guardConfig.token.mode,
    gateMode: guardConfig.gate.mode,
    vaultDriver: guardConfig.vault.driver,
    display: guardConfig.display.enabled,
  });

  await app.listen(guardConfig.port, '0.0.0.0');

  logger.log(`Guard listening on http://localhost:${guardConfig.port}/api`);
  logger.log(`Swagger docs at http://localhost:${guardConfig.port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Guard failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
