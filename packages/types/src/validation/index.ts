export * from './settings.js';
export * from './events.js';
