export * from './responses.js';
export * from './status.js';
