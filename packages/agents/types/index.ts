export * from './stages.js';
export * from './report.js';
export * from './errors.js';
export * from './events.js';
