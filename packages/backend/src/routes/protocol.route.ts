import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { ResolveResponse } from '@protocol-scout/shared';
import { validateQuery, ResolveQuerySchema } from '../middleware/validate.middleware.js';
import { resolveProtocolName } from '../services/registry.service.js';

export const protocolRouter = Router();

protocolRouter.get(
  '/resolve',
  validateQuery(ResolveQuerySchema),
  async (_req: Request, res: Response, next: NextFunction) => {
    const { q } = res.locals['query'] as { q: string };

    try {
      const result = await resolveProtocolName(q);
      const body: ResolveResponse = { result };
      res.json(body);
    } catch (err) {
      next(err);
    }
  }
);
