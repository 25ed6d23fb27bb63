import { Test } from '@nestjs/testing';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { JobQueueService, QueueFullError } from '@docextract/jobs';
import { JobNotFoundError } from '@docextract/task-store';
import { ExtractionJobsController } from './extraction-jobs.controller';

const JOB_ID = '3f2c8a9e-4b1d-4c6e-9a7f-2d5e8b1c0a34';

describe('ExtractionJobsController', () => {
  const jobQueue = {
    submit: jest.fn(),
    cancel: jest.fn(),
    stats: jest.fn(),
  };
  let controller: ExtractionJobsController;

  beforeEach(async () => {
    jest.resetAllMocks();
    jobQueue.stats.mockReturnValue({ queued: 3, running: 2, concurrency: 2, maxDepth: 100 });

    const moduleRef = await Test.createTestingModule({
      controllers: [ExtractionJobsController],
      providers: [{ provide: JobQueueService, useValue: jobQueue }],
    }).compile();
    controller = moduleRef.get(ExtractionJobsController);
  });

  it('queues a job and reports the queue depth', () => {
    const response = controller.submitJob({
      jobId: JOB_ID,
      storagePath: '/tmp/docextract-uploads/x.pdf',
      mediaType: 'application/pdf',
    });

    expect(jobQueue.submit).toHaveBeenCalledWith({
      jobId: JOB_ID,
      storagePath: '/tmp/docextract-uploads/x.pdf',
      mediaType: 'application/pdf',
    });
    expect(response).toEqual({ jobId: JOB_ID, accepted: true, queueDepth: 3 });
  });

  it('rejects malformed job ids with INVALID_ARGUMENT', () => {
    expect.assertions(1);
    try {
      controller.submitJob({ jobId: 'nope', storagePath: '/x', mediaType: 'image/png' });
    } catch (error) {
      expect(error).toMatchObject({
        error: { code: GrpcStatus.INVALID_ARGUMENT, message: 'job_id must be a UUID v4' },
      });
    }
  });

  it('maps a full queue to RESOURCE_EXHAUSTED', () => {
    jobQueue.submit.mockImplementation(() => {
      throw new QueueFullError(100);
    });

    expect.assertions(1);
    try {
      controller.submitJob({ jobId: JOB_ID, storagePath: '/x', mediaType: 'image/png' });
    } catch (error) {
      expect(error).toMatchObject({
        error: { code: GrpcStatus.RESOURCE_EXHAUSTED, message: 'Job queue is full (100 jobs waiting)' },
      });
    }
  });

  it('cancels through the pool', async () => {
    jobQueue.cancel.mockResolvedValue(true);

    await expect(controller.cancelJob({ jobId: JOB_ID })).resolves.toEqual({
      jobId: JOB_ID,
      cancelled: true,
    });
  });

  it('maps unknown jobs to NOT_FOUND', async () => {
    jobQueue.cancel.mockRejectedValue(new JobNotFoundError(JOB_ID));

    await expect(controller.cancelJob({ jobId: JOB_ID })).rejects.toMatchObject({
      error: { code: GrpcStatus.NOT_FOUND, message: `Job ${JOB_ID} not found or expired` },
    });
  });

  it('maps unexpected failures to INTERNAL without leaking details', async () => {
    jobQueue.cancel.mockRejectedValue(new Error('socket hang up'));

    await expect(controller.cancelJob({ jobId: JOB_ID })).rejects.toMatchObject({
      error: { code: GrpcStatus.INTERNAL, message: 'Failed to cancel job' },
    });
  });

  it('returns queue stats', () => {
    expect(controller.getQueueStats()).toEqual({
      queued: 3,
      running: 2,
      concurrency: 2,
      maxDepth: 100,
    });
  });
});
