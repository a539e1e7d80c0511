export { loadWorkerConfig, workerEnvSchema, type WorkerConfig, type WorkerEnv } from './config.js';
