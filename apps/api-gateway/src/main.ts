import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
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

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>('API_GATEWAY_CORS_ORIGIN', '*'),
  });

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('API_GATEWAY_PORT', 8000);
  await app.listen(port);

  logger.log(`🚀 API Gateway running on http://localhost:${port}`);
  logger.log(`📄 Upload documents at POST http://localhost:${port}/uploadfile/`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'API Gateway failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
