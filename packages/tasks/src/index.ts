export * from './schemas.js';
export * from './service.js';
export * from './scheduling.js';
