/**
 * @docextract/proto
 *
 * Protobuf contract between the api-gateway and worker processes.
 *
 * - extraction.proto is consumed at runtime by @grpc/proto-loader
 * - interfaces.ts mirrors it for compile-time safety
 * - grpc-exceptions.ts is the shared error contract
 */
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

/** Absolute path to the extraction job proto file */
export const EXTRACTION_PROTO_PATH: string = join(__dirname, 'extraction.proto');

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const DOCEXTRACT_PACKAGE_NAME = 'docextract';

export const EXTRACTION_JOB_SERVICE_NAME = 'ExtractionJobService';

/** NestJS injection token for the worker gRPC client */
export const WORKER_GRPC_CLIENT = 'WORKER_GRPC_CLIENT';

// ── TypeScript Interfaces ───────────────────────────────

export type {
  SubmitJobRequest,
  SubmitJobResponse,
  CancelJobRequest,
  CancelJobResponse,
  QueueStatsRequest,
  QueueStatsMessage,
  ExtractionJobServiceClient,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcNotFoundException,
  GrpcInvalidArgumentException,
  GrpcResourceExhaustedException,
  GrpcUnavailableException,
  GrpcInternalException,
} from './grpc-exceptions';
