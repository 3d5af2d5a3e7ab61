// Types
export * from './types/server.js';

// Constants
export * from './constants/status.js';
export * from './constants/errors.js';
