/**
 * Tasks module - intake, storage and execution of forecast tasks
 */

export { TaskStore, DuplicateTaskError, isTerminal, type TaskStoreOptions, type TaskPatch } from './store.js';
export { TaskService, type SubmitResult, type TaskServiceDeps, type InputRequiredResponse } from './service.js';
export { runForecastTask, computeTimeoutSeconds, summarize, type WorkerDeps } from './worker.js';
export { WorkerPool, type WorkerPoolState } from './worker-pool.js';
