export * from './message.js';
export * from './settings.js';
