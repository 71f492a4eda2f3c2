export * from './tasks.js';
export * from './errors.js';
export * from './dates.js';
export * from './api.js';
