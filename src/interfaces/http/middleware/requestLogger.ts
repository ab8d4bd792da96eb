/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on top of the shared Pino logger: one line per request with
 * method, URL, status and response time. Client errors log at `warn`, server
 * errors at `error`. Run polling is chatty, so successful GETs log at `debug`.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  customLogLevel: (req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    if (req.method === 'GET') return 'debug';
    return 'info';
  },
});
