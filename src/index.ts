// Queue-driven worker topology for personal-data ingestion.
export * from './errors.js';
export * from './logger.js';
export * from './config/types.js';
export { parseConfig, loadConfig, CONNECTION_TAG, QUEUE_TAG } from './config/loader.js';
export { loadEnv, type SkrodeEnv } from './config/schema.js';
export * from './topology/types.js';
export { WorkerRegistry, loadTopology } from './topology/registry.js';
export { validateWorkers, type ValidationError } from './topology/validator.js';
export * from './queue/types.js';
export { MemoryQueueBackend } from './queue/memory.js';
export { RedisQueueBackend, RedisQueueClient, listCommands, type ListCommands } from './queue/redis.js';
export * from './targets/types.js';
export { TargetRegistry, type BoundTarget } from './targets/registry.js';
export { createDefaultTargets } from './targets/builtin.js';
export { TopologyRunner, resolveRunnerSettings, type RunnerDeps } from './runner/runner.js';
export { withRetry, backoffDelay, DEFAULT_RETRY_CONFIG, type RetryConfig } from './runner/retry.js';
export type { RunReport, TaskStats, RunnerOverrides } from './runner/types.js';
export { ensureService, insertUser, mergePersonas, normalizeUrl, type ServiceDefinition } from './services/index.js';
export { github, githubExternalId } from './services/github.js';
