/**
 * gRPC exception classes shared by the worker (thrower) and the
 * api-gateway (catcher), so both agree on the status code contract.
 *
 * @see https://grpc.github.io/grpc/core/md_doc_statuscodes.html
 */
import { RpcException } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';

export class GrpcNotFoundException extends RpcException {
  constructor(message: string) {
    super({ code: GrpcStatus.NOT_FOUND, message });
  }
}

export class GrpcInvalidArgumentException extends RpcException {
  constructor(message: string) {
    super({ code: GrpcStatus.INVALID_ARGUMENT, message });
  }
}

/** Worker queue is at MAX_QUEUE_DEPTH. */
export class GrpcResourceExhaustedException extends RpcException {
  constructor(message: string) {
    super({ code: GrpcStatus.RESOURCE_EXHAUSTED, message });
  }
}

export class GrpcUnavailableException extends RpcException {
  constructor(message: string) {
    super({ code: GrpcStatus.UNAVAILABLE, message });
  }
}

export class GrpcInternalException extends RpcException {
  constructor(message: string) {
    super({ code: GrpcStatus.INTERNAL, message });
  }
}
