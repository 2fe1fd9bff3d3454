export * from './types.js';
export * from './errors.js';
export * from './call-status.js';
export * from './slug.js';
export * from './voice-command.js';
