export type { Capability, WorkerRole, WorkerSet } from './capability.js'
export { WORKER_ROLES } from './capability.js'
export { PromptWorker } from './prompt-worker.js'
export { CoderWorker } from './coder-worker.js'
export { QaWorker } from './qa-worker.js'
export type { QaWorkerDeps } from './qa-worker.js'
export { createWorkerSet } from './worker-set.js'
export type { WorkerSetDeps } from './worker-set.js'
export * from './prompts.js'
