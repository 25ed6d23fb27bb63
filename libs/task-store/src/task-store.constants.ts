/** Redis key layout: {namespace}:{entity}:{id} */
export const TASK_KEY_PREFIX = 'docextract:task:';
export const TASK_INDEX_KEY = 'docextract:task-index';

export const DEFAULT_RETENTION_SECONDS = 3600;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export type TaskStoreBackend = 'memory' | 'redis';
