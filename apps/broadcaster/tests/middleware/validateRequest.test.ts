import { describe, it, expect } from 'vitest';
import express, { type Request, type Response } from 'express';
import request from 'supertest';
import { z } from 'zod';
import {
  mapZodErrors,
  validateRequest,
} from '../../src/middleware/validateRequest.ts';

function createApp(): express.Application {
  const app = express();
  app.use(express.json());

  app.post(
    '/items',
    validateRequest({
      body: z
        .object({ name: z.string().min(1), tags: z.array(z.string()).default([]) })
        .strict(),
    }),
    (req: Request, res: Response) => {
      res.json({ body: req.body });
    },
  );

  app.get(
    '/items',
    validateRequest({ query: z.object({ limit: z.coerce.number().int().max(50) }) }),
    (req: Request, res: Response) => {
      res.json({ query: req.query });
    },
  );

  app.get(
    '/items/:id',
    validateRequest({ params: z.object({ id: z.string().regex(/^\d+$/) }) }),
    (_req: Request, res: Response) => {
      res.json({ ok: true });
    },
  );

  return app;
}

describe('validateRequest middleware', () => {
  it('should pass parsed body with defaults to the handler', async () => {
    const response = await request(createApp())
      .post('/items')
      .send({ name: 'first' })
      .expect(200);

    expect(response.body).toEqual({ body: { name: 'first', tags: [] } });
  });

  it('should reject an invalid body', async () => {
    const response = await request(createApp())
      .post('/items')
      .send({ name: '' })
      .expect(400);

    expect(response.body).toEqual({
      error: 'Validation error',
      code: 'INVALID_REQUEST_BODY',
      details: [
        {
          path: 'name',
          message: expect.any(String),
          code: 'too_small',
        },
      ],
    });
  });

  it('should replace the query with parsed values', async () => {
    const response = await request(createApp())
      .get('/items')
      .query({ limit: '20' })
      .expect(200);

    expect(response.body).toEqual({ query: { limit: 20 } });
  });

  it('should reject an invalid query', async () => {
    const response = await request(createApp())
      .get('/items')
      .query({ limit: '500' })
      .expect(400);

    expect(response.body.code).toBe('INVALID_QUERY_PARAMETERS');
    expect(response.body.details).toEqual([
      expect.objectContaining({ path: 'limit', code: 'too_big' }),
    ]);
  });

  it('should reject invalid route parameters', async () => {
    const response = await request(createApp()).get('/items/abc').expect(400);

    expect(response.body.code).toBe('INVALID_ROUTE_PARAMETERS');
    expect(response.body.details).toEqual([
      expect.objectContaining({ path: 'id', code: 'invalid_format' }),
    ]);
  });

  describe('mapZodErrors', () => {
    it('should join nested paths with dots', () => {
      const result = z
        .object({ outer: z.object({ inner: z.array(z.number()) }) })
        .safeParse({ outer: { inner: [1, 'two'] } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(mapZodErrors(result.error)).toEqual([
          {
            path: 'outer.inner.1',
            message: expect.any(String),
            code: 'invalid_type',
          },
        ]);
      }
    });
  });
});
