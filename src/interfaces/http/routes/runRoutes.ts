/**
 * Run Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1` in app.ts:
 *
 *   GET  /api/v1/company-types          →  controller.companyTypes
 *   POST /api/v1/runs                   →  controller.start     (202)
 *   GET  /api/v1/runs/:id               →  controller.get
 *   GET  /api/v1/runs/:id/files/:step   →  controller.download  (step1 | step2)
 */
import { RunController } from '@interfaces/http/controllers/RunController';
import { withValidated } from '@interfaces/http/middleware/validation';
import { runFileParamsSchema, runParamsSchema, scrapeRequestSchema } from '@shared/schemas';
import { Router } from 'express';

const router = Router();
const controller = new RunController();

router.get('/company-types', controller.companyTypes);
router.post('/runs', withValidated(scrapeRequestSchema, 'body', controller.start));
router.get('/runs/:id', withValidated(runParamsSchema, 'params', controller.get));
router.get(
  '/runs/:id/files/:step',
  withValidated(runFileParamsSchema, 'params', controller.download),
);

export { router as runRoutes };
