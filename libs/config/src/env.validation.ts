import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

/**
 * Environment schema shared by the api-gateway and the worker.
 *
 * Every variable is optional here; defaults live next to the code that
 * reads them (`configService.get(KEY, default)`). Validation only rejects
 * values that are present but malformed, and converts numeric strings to
 * numbers so `configService.get<number>()` is honest.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  // ── HTTP ───────────────────────────────────────────────

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  API_GATEWAY_PORT?: number;

  @IsOptional()
  @IsString()
  API_GATEWAY_CORS_ORIGIN?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  THROTTLE_LIMIT?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  THROTTLE_TTL_MS?: number;

  // ── Dispatch ───────────────────────────────────────────

  @IsOptional()
  @IsIn(['local', 'grpc'])
  JOB_DISPATCH_MODE?: string;

  @IsOptional()
  @IsString()
  WORKER_GRPC_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  WORKER_GRPC_PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  WORKER_HTTP_PORT?: number;

  // ── Task store ─────────────────────────────────────────

  @IsOptional()
  @IsIn(['memory', 'redis'])
  TASK_STORE_BACKEND?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  TASK_RETENTION_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  TASK_STORE_SWEEP_INTERVAL_MS?: number;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  REDIS_DB?: number;

  // ── Uploads ────────────────────────────────────────────

  @IsOptional()
  @IsString()
  @MinLength(1)
  UPLOAD_DIR?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  MAX_UPLOAD_BYTES?: number;

  // ── Workers ────────────────────────────────────────────

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(64)
  WORKER_CONCURRENCY?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  MAX_QUEUE_DEPTH?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  EXTRACTION_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  JOB_RECOVERY_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  PENDING_REDISPATCH_AFTER_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  STALE_JOB_GRACE_MS?: number;

  // ── Extraction provider ────────────────────────────────

  @IsOptional()
  @IsString()
  @MinLength(1)
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  OPENAI_MODEL?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot(). Throws with every
 * offending variable listed; returns the converted values otherwise.
 */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
  problems.push(...crossFieldProblems(validated));

  if (problems.length > 0) {
    const details = problems.map((problem) => `  - ${problem}`).join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}

/** Rules spanning more than one variable. */
function crossFieldProblems(env: EnvironmentVariables): string[] {
  const problems: string[] = [];
  // The remote worker can only see jobs through a shared store.
  if (env.JOB_DISPATCH_MODE === 'grpc' && env.TASK_STORE_BACKEND !== 'redis') {
    problems.push('TASK_STORE_BACKEND must be redis when JOB_DISPATCH_MODE is grpc');
  }
  return problems;
}
