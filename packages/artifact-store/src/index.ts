export * from './types.js';
export * from './local-file-system.js';
