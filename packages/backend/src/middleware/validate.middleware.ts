import type { Request, Response, NextFunction } from 'express';
import { z, ZodSchema } from 'zod';
import { config } from '../config.js';

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function validate<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: formatIssues(result.error),
      });
      return;
    }
    req.body = result.data;
    next();
  };
}

/** Validated query parameters are stored on `res.locals.query`. */
export function validateQuery<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      res.status(400).json({
        error: 'Invalid query parameters',
        details: formatIssues(result.error),
      });
      return;
    }
    res.locals['query'] = result.data;
    next();
  };
}

const ProtocolInput = z.string().trim().min(1, 'protocol name is required').max(200);

export const ResolveQuerySchema = z.object({
  q: ProtocolInput,
});

export const ReportRequestSchema = z.object({
  protocol: ProtocolInput,
  days: z.number().int().min(1).max(config.report.maxDays).default(config.report.defaultDays),
});
