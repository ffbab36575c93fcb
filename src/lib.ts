export * from './types.js';
export * from './errors.js';
export * from './clock.js';
export * from './rate-limiter.js';
export * from './concurrency-gate.js';
export * from './work-queue.js';
export * from './connection.js';
export * from './executor.js';
export * from './classifier.js';
export * from './dispatcher.js';
export * from './sink.js';
export * from './statistics.js';
export * from './runner.js';
export * from './logger.js';
export * from './export/csv.js';
export * from './export/files.js';
export * from './targets/index.js';
