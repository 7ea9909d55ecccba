import express from 'express';
import type { Router } from 'express';
import type { EventsController } from '../controllers/eventsController.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { eventValidationSchemas } from '../validation/eventSchemas.ts';

/**
 * GET /events - long-lived event stream
 * Mounted outside /api so JSON compression never wraps it.
 */
export function createStreamRouter(controller: EventsController): Router {
  const router = express.Router();

  router.get(
    '/events',
    validateRequest(eventValidationSchemas.connect),
    asyncHandler(controller.connect, 'open event stream'),
  );

  return router;
}
