import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuditContext } from '../services/audit.service.js';
import { AppError } from './errorHandler.js';

// The upstream proxy authenticates the caller and forwards the numeric user id
declare global {
  namespace Express {
    interface Request {
      actorId?: number;
    }
  }
}

const ACTOR_ID = /^[1-9]\d{0,9}$/;
// Actor ids are stored in INTEGER columns
const MAX_ACTOR_ID = 2147483647;

export const identifyActor =
  (headerName: string): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction) => {
    const raw = req.get(headerName);
    if (raw === undefined || raw.trim() === '') return next();
    const value = raw.trim();
    if (!ACTOR_ID.test(value) || Number(value) > MAX_ACTOR_ID) {
      return next(new AppError(`Malformed ${headerName} header`, 400, 'INVALID_ACTOR'));
    }
    req.actorId = Number(value);
    next();
  };

export const requireActor = (req: Request, _res: Response, next: NextFunction) => {
  if (req.actorId === undefined) {
    return next(new AppError('Authentication required', 401, 'UNAUTHENTICATED'));
  }
  next();
};

export const auditContext = (req: Request): AuditContext => ({
  actorId: req.actorId ?? null,
  ipAddress: req.ip ?? null,
  userAgent: req.get('user-agent') ?? null,
});
