/**
 * Operator Input Schemas
 * Layer: Shared
 *
 * The HTTP `withValidated()` wrapper and the CLI both parse a scrape request
 * through this one schema, so the bounds on the target count and the list of
 * company types cannot drift between the two surfaces. `z.coerce` lets the
 * CLI hand in raw argv strings.
 */
import { config } from '@core/config';
import { z } from 'zod';

import { ALL_COMPANY_TYPES, COMPANY_TYPES, EXPORT_STEPS } from './constants';

const { minTarget, maxTarget, defaultTarget } = config.scrape;

export const scrapeRequestSchema = z.object({
  targetCount: z.coerce
    .number()
    .int('targetCount must be a whole number')
    .min(minTarget, `targetCount must be at least ${minTarget}`)
    .max(maxTarget, `targetCount must be at most ${maxTarget}`)
    .default(defaultTarget),
  companyType: z
    .enum(COMPANY_TYPES, { error: `companyType must be one of: ${COMPANY_TYPES.join(', ')}` })
    .default(ALL_COMPANY_TYPES),
});

export type ScrapeRequest = z.infer<typeof scrapeRequestSchema>;

export const runParamsSchema = z.object({
  id: z.string().min(1),
});

export const runFileParamsSchema = z.object({
  id: z.string().min(1),
  step: z.enum(EXPORT_STEPS, { error: `step must be one of: ${EXPORT_STEPS.join(', ')}` }),
});
