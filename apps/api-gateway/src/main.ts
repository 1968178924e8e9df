import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>(
    'API_GATEWAY_CORS_ORIGIN',
    'http://localhost:3000',
  );
  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });

  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('API_GATEWAY_PORT', 4000);
  await app.listen(port);

  logger.log(`API Gateway running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'API Gateway failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
