export { loadConfig, DEFAULT_MODEL } from './env.js';
export type { AppConfig, RunMode, CacheBackend } from './env.js';
export { createReportCache } from './cache-backend.js';
