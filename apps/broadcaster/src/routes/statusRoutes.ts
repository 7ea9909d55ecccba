import express from 'express';
import type { Router } from 'express';
import type { StatusController } from '../controllers/statusController.ts';
import { asyncHandler } from '../utils/asyncHandler.ts';
import { validateRequest } from '../middleware/validateRequest.ts';
import { statusValidationSchemas } from '../validation/statusSchemas.ts';

export function createStatusRouter(controller: StatusController): Router {
  const router = express.Router();

  router.get(
    '/',
    validateRequest(statusValidationSchemas.getStatus),
    asyncHandler(controller.getStatus, 'get status'),
  );

  return router;
}
