// Export route factories
export { createStreamRouter } from './streamRoutes.ts';
export { createEventRouter } from './eventRoutes.ts';
export { createStatusRouter } from './statusRoutes.ts';
