import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { JobsModule } from '@docextract/jobs';
import {
  DOCEXTRACT_PACKAGE_NAME,
  EXTRACTION_PROTO_PATH,
  WORKER_GRPC_CLIENT,
} from '@docextract/proto';
import { GrpcJobDispatcher } from './grpc-job-dispatcher';
import { DispatchMode, JobDispatcher } from './job-dispatcher';
import { JobDispatcherHealthIndicator } from './job-dispatcher.health';
import { LocalJobDispatcher } from './local-job-dispatcher';

export interface JobDispatchModuleOptions {
  /** Defaults to JOB_DISPATCH_MODE, then 'local' */
  mode?: DispatchMode;
}

function resolveMode(options: JobDispatchModuleOptions): DispatchMode {
  const mode = options.mode ?? process.env.JOB_DISPATCH_MODE ?? 'local';
  if (mode !== 'local' && mode !== 'grpc') {
    throw new Error(`Unknown JOB_DISPATCH_MODE "${mode}" (expected local or grpc)`);
  }
  return mode;
}

/**
 * JobDispatchModule — provides the JobDispatcher for the chosen mode.
 *
 * The mode decides which modules get imported, so it is read when the
 * module graph is built: list this after ConfigModule.forRoot() so .env
 * values are already in process.env.
 *
 *   local → JobsModule (worker pool in this process) + LocalJobDispatcher
 *   grpc  → ClientsModule gRPC client + GrpcJobDispatcher
 *           (WORKER_GRPC_HOST, WORKER_GRPC_PORT)
 */
@Module({})
export class JobDispatchModule {
  static forRoot(options: JobDispatchModuleOptions = {}): DynamicModule {
    const mode = resolveMode(options);
    new Logger(JobDispatchModule.name).log(`Dispatching jobs in ${mode} mode`);

    if (mode === 'local') {
      return {
        module: JobDispatchModule,
        global: true,
        imports: [JobsModule],
        providers: [
          { provide: JobDispatcher, useClass: LocalJobDispatcher },
          JobDispatcherHealthIndicator,
        ],
        exports: [JobDispatcher, JobDispatcherHealthIndicator],
      };
    }

    return {
      module: JobDispatchModule,
      global: true,
      imports: [
        ClientsModule.registerAsync([
          {
            name: WORKER_GRPC_CLIENT,
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
              transport: Transport.GRPC,
              options: {
                package: DOCEXTRACT_PACKAGE_NAME,
                protoPath: EXTRACTION_PROTO_PATH,
                url: `${configService.get<string>('WORKER_GRPC_HOST', 'localhost')}:${configService.get<number>('WORKER_GRPC_PORT', 50051)}`,
              },
            }),
          },
        ]),
      ],
      providers: [
        { provide: JobDispatcher, useClass: GrpcJobDispatcher },
        JobDispatcherHealthIndicator,
      ],
      exports: [JobDispatcher, JobDispatcherHealthIndicator],
    };
  }
}
