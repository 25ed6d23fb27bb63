import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import {
  DOCEXTRACT_PACKAGE_NAME,
  EXTRACTION_PROTO_PATH,
} from '@docextract/proto';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Hybrid application: HTTP for health checks + gRPC for job control
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  if (configService.get<string>('TASK_STORE_BACKEND', 'memory') !== 'redis') {
    logger.warn(
      'TASK_STORE_BACKEND is not redis: jobs submitted through the gateway will not be visible to this worker',
    );
  }

  const grpcHost = configService.get<string>('WORKER_GRPC_HOST', '0.0.0.0');
  const grpcPort = configService.get<number>('WORKER_GRPC_PORT', 50051);

  // ── gRPC Microservice ───────────────────────────────────
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: DOCEXTRACT_PACKAGE_NAME,
      protoPath: EXTRACTION_PROTO_PATH,
      url: `${grpcHost}:${grpcPort}`,
    },
  });

  // Start all microservices, then the HTTP server for health checks
  await app.startAllMicroservices();

  const httpPort = configService.get<number>('WORKER_HTTP_PORT', 50052);
  await app.listen(httpPort);

  logger.log(`🔧 Worker gRPC server listening on ${grpcHost}:${grpcPort}`);
  logger.log(`💓 Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Worker failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
