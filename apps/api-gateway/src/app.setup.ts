import { INestApplication, ValidationPipe } from '@nestjs/common';

/**
 * Global request pipeline shared by the real bootstrap and e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  return app;
}
