export { BoundedWorkerPool, type WorkerPool, type Job } from './worker-pool.js';
