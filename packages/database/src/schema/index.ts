export * from './users.js';
export * from './tasks.js';
export * from './tags.js';
export * from './conversation.js';
export * from './user-contexts.js';
