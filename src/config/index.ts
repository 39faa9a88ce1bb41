export * from './schemas.js';
export * from './rulebook.js';
export * from './env.js';
