import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ReportResponse } from '@protocol-scout/shared';
import { validate, ReportRequestSchema } from '../middleware/validate.middleware.js';
import { runReport } from '../services/research.service.js';
import { log } from '../logger.js';

export const reportRouter = Router();

reportRouter.post(
  '/',
  validate(ReportRequestSchema),
  async (req: Request, res: Response, next: NextFunction) => {
    const { protocol, days } = req.body as { protocol: string; days: number };

    try {
      log.info('report', `Building report for "${protocol}" (${days} days)`);
      const report = await runReport(protocol, { days });
      const body: ReportResponse = { report };
      res.json(body);
    } catch (err) {
      next(err);
    }
  }
);
