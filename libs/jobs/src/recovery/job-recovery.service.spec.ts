import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JobStatus, MemoryTaskStore } from '@docextract/task-store';
import {
  ScriptedProvider,
  eventually,
  gate,
  textReply,
} from '../../../../test/fixtures/scripted-provider';
import { samplePdf } from '../../../../test/fixtures/sample-files';
import { JobQueueService } from '../queue/job-queue.service';
import { UploadStorageService } from '../storage/upload-storage.service';
import { ExtractionWorkerService } from '../worker/extraction-worker.service';
import { JobRecoveryService } from './job-recovery.service';

describe('JobRecoveryService', () => {
  let uploadDir: string;
  let store: MemoryTaskStore;
  let storage: UploadStorageService;
  let queue: JobQueueService;
  let recovery: JobRecoveryService;
  let held: ReturnType<typeof gate>;

  async function seed(id: string, ageMs: number): Promise<string> {
    const storagePath = await storage.save(id, `${id}.pdf`, samplePdf());
    await store.create({
      id,
      sourceName: `${id}.pdf`,
      mediaType: 'application/pdf',
      sizeBytes: 4096,
      storagePath,
      submittedAt: new Date(Date.now() - ageMs).toISOString(),
    });
    return storagePath;
  }

  beforeEach(async () => {
    uploadDir = await mkdtemp(join(tmpdir(), 'recovery-spec-'));
    const config = new ConfigService({
      UPLOAD_DIR: uploadDir,
      WORKER_CONCURRENCY: 1,
      MAX_QUEUE_DEPTH: 1,
      EXTRACTION_TIMEOUT_MS: 10,
      STALE_JOB_GRACE_MS: 0,
      PENDING_REDISPATCH_AFTER_MS: 60_000,
      JOB_RECOVERY_INTERVAL_MS: 0,
    });
    store = new MemoryTaskStore(60 * 60 * 1000, 0);
    storage = new UploadStorageService(config);
    await storage.onModuleInit();

    held = gate();
    const provider = new ScriptedProvider(async () => {
      await held.opened;
      return textReply('Recovered');
    });
    const worker = new ExtractionWorkerService(store, storage, provider, config);
    queue = new JobQueueService(store, storage, worker, config);
    recovery = new JobRecoveryService(store, queue, storage, config);
  });

  afterEach(async () => {
    held.open();
    await eventually(async () => {
      const { queued, running } = queue.stats();
      return queued === 0 && running === 0 ? true : undefined;
    });
    recovery.onModuleDestroy();
    queue.onModuleDestroy();
    await rm(uploadDir, { recursive: true, force: true });
  });

  it('re-dispatches orphaned PENDING jobs oldest first while the pool has room', async () => {
    await seed('newer', 1_000);
    await seed('older', 5_000);

    const report = await recovery.sweep(0);

    expect(report).toEqual({ redispatched: ['older'], failed: [] });
    expect(queue.isTracked('older')).toBe(true);
    expect(queue.isTracked('newer')).toBe(false);
  });

  it('leaves young PENDING jobs to their original dispatch', async () => {
    await seed('fresh', 1_000);

    const report = await recovery.sweep();

    expect(report.redispatched).toEqual([]);
    expect(queue.isTracked('fresh')).toBe(false);
  });

  it('fails STARTED jobs abandoned by a dead worker', async () => {
    const storagePath = await seed('abandoned', 0);
    await store.updateStatus('abandoned', { status: JobStatus.STARTED });
    await new Promise((resolve) => setTimeout(resolve, 30));

    const report = await recovery.sweep();

    const job = await store.get('abandoned');
    expect(report.failed).toEqual(['abandoned']);
    expect(job?.status).toBe(JobStatus.FAILURE);
    expect(job?.error).toBe('Extraction did not finish within 0.01 seconds');
    await expect(stat(storagePath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('sweeps once at bootstrap when the timer is disabled', async () => {
    await seed('left-over', 10);

    await recovery.onApplicationBootstrap();

    expect(queue.isTracked('left-over')).toBe(true);
  });
});
