import { Logger, ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { EVENT_BUS } from './shared/events';
import type { IEventBus } from './shared/events';
import { GUARD_EVENTS } from './modules/guard/domain/events/guard.events';

/**
 * Largest JSON body accepted. Candidates up to this size are evaluated (and
 * rejected) like any other string; larger bodies are refused with 413 before
 * they reach the guard.
 */
export const REQUEST_BODY_LIMIT = '2mb';

/**
 * HTTP configuration shared by main.ts and the e2e suite.
 * The application must be created with `bodyParser: false`.
 */
export function configureApp(app: NestExpressApplication): void {
  app.useBodyParser('json', { limit: REQUEST_BODY_LIMIT });

  app.setGlobalPrefix('api');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('QR Vault Guard')
    .setDescription(
      'Validates rotating optical proofs and issues rate-limited vault unlocks',
    )
    .setVersion('1.0')
    .addTag('guard', 'Candidate evaluation and gate status')
    .addTag('health', 'Liveness')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);
}

/**
 * Close the application once a single-shot guard has stopped.
 *
 * The stop event is published while the triggering request is still being
 * handled, and close() waits for in-flight requests; the close is therefore
 * deferred until the handler chain has returned.
 */
export function closeWhenGuardStops(app: NestExpressApplication): void {
  const logger = new Logger('Bootstrap');
  const eventBus = app.get<IEventBus>(EVENT_BUS);

  eventBus.subscribe(GUARD_EVENTS.STOPPED, () => {
    logger.log('Shutting down after single-shot unlock');
    setImmediate(() => {
      app.close().catch((error: unknown) => {
        logger.error(
          'Shutdown after single-shot unlock failed',
          error instanceof Error ? error.stack : String(error),
        );
      });
    });
  });
}
