import express from 'express';
import type { Router } from 'express';
import type { EventsController } from '../controllers/eventsController.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { eventValidationSchemas } from '../validation/eventSchemas.ts';

export function createEventRouter(controller: EventsController): Router {
  const router = express.Router();

  router.post(
    '/',
    validateRequest(eventValidationSchemas.publishEvent),
    asyncHandler(controller.publishEvent, 'publish event'),
  );

  router.post(
    '/retry',
    validateRequest(eventValidationSchemas.publishRetry),
    asyncHandler(controller.publishRetry, 'publish retry interval'),
  );

  return router;
}
