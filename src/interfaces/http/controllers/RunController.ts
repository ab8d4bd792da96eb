/**
 * Run Controller — HTTP Boundary for Scrape Runs
 * Layer: Interfaces (HTTP)
 *
 * Thin: every handler receives already-validated input, calls
 * ScrapeRunService and sends JSON (or the workbook bytes). Handlers are
 * arrow functions so `this` stays bound when Express invokes them.
 */
import type { ScrapeRunService } from '@application/services/ScrapeRunService';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { elapsedMs } from '@interfaces/http/middleware/requestTimer';
import { COMPANY_TYPES, type ExportStep, XLSX_MIME_TYPE } from '@shared/constants';
import type { ScrapeRequest } from '@shared/schemas';
import type { Request, Response } from 'express';

export class RunController {
  private service: ScrapeRunService;

  constructor() {
    this.service = container.resolve<ScrapeRunService>(TOKENS.ScrapeRunService);
  }

  companyTypes = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json({
      status: 'success',
      data: {
        companyTypes: COMPANY_TYPES,
        targetCount: {
          min: config.scrape.minTarget,
          max: config.scrape.maxTarget,
          default: config.scrape.defaultTarget,
        },
      },
      meta: { totalTimeMs: elapsedMs(res) },
    });
  };

  start = async (input: ScrapeRequest, req: Request, res: Response): Promise<void> => {
    const run = this.service.start(input);
    res
      .status(202)
      .location(`${req.baseUrl}/runs/${run.id}`)
      .json({ status: 'success', data: run, meta: { totalTimeMs: elapsedMs(res) } });
  };

  get = async (input: { id: string }, _req: Request, res: Response): Promise<void> => {
    const run = this.service.get(input.id);
    res.status(200).json({ status: 'success', data: run, meta: { totalTimeMs: elapsedMs(res) } });
  };

  download = async (
    input: { id: string; step: ExportStep },
    _req: Request,
    res: Response,
  ): Promise<void> => {
    const file = this.service.getFile(input.id, input.step);
    res
      .status(200)
      .type(XLSX_MIME_TYPE)
      .attachment(file.fileName)
      .send(file.content);
  };
}
