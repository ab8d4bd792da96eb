/**
 * Integration Tests — Global Error Handler
 *
 * A bare Express app with routes that throw, so each branch of the handler
 * is reached through Express's own error forwarding.
 */
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { AppError, NotFoundError } from '@shared/errors/AppError';
import express from 'express';
import request from 'supertest';

describe('errorHandler', () => {
  const app = express();

  app.get('/not-found', () => {
    throw new NotFoundError('Run', 'r-1');
  });
  app.get('/internal', () => {
    throw new AppError('connection string host=db.internal', 500, false);
  });
  app.get('/crash', () => {
    throw new TypeError('cannot read properties of undefined');
  });
  app.get('/thrown-string', () => {
    throw 'plain string failure';
  });
  app.use(errorHandler);

  it('should expose the message of an operational error with its status', async () => {
    const res = await request(app).get('/not-found');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Run not found: r-1' });
  });

  it('should hide the message of a non-operational AppError', async () => {
    const res = await request(app).get('/internal');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
  });

  it('should answer an unexpected error with a generic 500', async () => {
    const res = await request(app).get('/crash');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
  });

  it('should answer a thrown non-Error value with a generic 500', async () => {
    const res = await request(app).get('/thrown-string');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal server error' });
  });
});
