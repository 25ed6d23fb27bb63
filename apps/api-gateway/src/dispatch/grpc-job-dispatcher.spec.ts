import { Test } from '@nestjs/testing';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { of, throwError } from 'rxjs';
import { WORKER_GRPC_CLIENT } from '@docextract/proto';
import { JobNotFoundError } from '@docextract/task-store';
import { GrpcJobDispatcher } from './grpc-job-dispatcher';
import { JobDispatchError } from './job-dispatch.errors';

const JOB_ID = '3f2c8a9e-4b1d-4c6e-9a7f-2d5e8b1c0a34';

function grpcError(code: number, details: string): Error {
  return Object.assign(new Error(`${code} ${details}`), { code, details });
}

describe('GrpcJobDispatcher', () => {
  const service = {
    submitJob: jest.fn(),
    cancelJob: jest.fn(),
    getQueueStats: jest.fn(),
  };
  let dispatcher: GrpcJobDispatcher;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        GrpcJobDispatcher,
        { provide: WORKER_GRPC_CLIENT, useValue: { getService: () => service } },
      ],
    }).compile();
    await moduleRef.init();
    dispatcher = moduleRef.get(GrpcJobDispatcher);
  });

  it('forwards the payload to SubmitJob', async () => {
    service.submitJob.mockReturnValue(of({ jobId: JOB_ID, accepted: true, queueDepth: 1 }));

    await dispatcher.submit({
      jobId: JOB_ID,
      storagePath: '/srv/uploads/report.pdf',
      mediaType: 'application/pdf',
    });

    expect(service.submitJob).toHaveBeenCalledWith({
      jobId: JOB_ID,
      storagePath: '/srv/uploads/report.pdf',
      mediaType: 'application/pdf',
    });
  });

  it('wraps an unreachable worker in JobDispatchError', async () => {
    service.getQueueStats.mockReturnValue(
      throwError(() => grpcError(GrpcStatus.UNAVAILABLE, 'No connection established')),
    );

    await expect(dispatcher.stats()).rejects.toThrow(
      new JobDispatchError('stats', new Error('14 No connection established')),
    );
  });

  it('maps NOT_FOUND from CancelJob to JobNotFoundError', async () => {
    service.cancelJob.mockReturnValue(
      throwError(() => grpcError(GrpcStatus.NOT_FOUND, 'Job not found')),
    );

    await expect(dispatcher.cancel(JOB_ID)).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('returns the worker verdict on cancel', async () => {
    service.cancelJob.mockReturnValue(of({ jobId: JOB_ID, cancelled: true }));

    await expect(dispatcher.cancel(JOB_ID)).resolves.toBe(true);
    expect(service.cancelJob).toHaveBeenCalledWith({ jobId: JOB_ID });
  });
});
