// src/middleware/correlation.ts
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.header('x-request-id') || uuidv4();
  res.locals.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}

export function getRequestId(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'unknown';
}
