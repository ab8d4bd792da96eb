/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call so integration tests can build one after
 * overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer  — stamps the arrival time for meta.totalTimeMs.
 *   2. helmet()      — security headers.
 *   3. cors()        — cross-origin access for a browser front end.
 *   4. compression() — gzips JSON and workbook downloads.
 *   5. express.json()— parses request bodies.
 *   6. requestLogger — one log line per request.
 *   7. Routes.
 *   8. errorHandler  — last, catches everything above.
 *
 * The side-effect import of '@core/container' bootstraps the DI container
 * before any controller resolves a service.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { runRoutes } from '@interfaces/http/routes/runRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', runRoutes);

  app.use(errorHandler);

  return app;
}
